import { isValid, parse, startOfDay } from "date-fns";
import {
  TrackingRecord,
  TrackingTable,
  emptyRecord,
  findColumn,
} from "../entities/tracking-record.entity.js";

/** Cell contents the export uses for "no value". */
export const MISSING_TOKENS: ReadonlySet<string> = new Set([
  "",
  "nan",
  "NaN",
  "None",
  "N/A",
  "n/a",
  "(en blanco)",
]);

// Tried in order; the first that consumes the whole cell wins. Two-digit
// tokens also accept a single digit (5/6/2024). `yy` only ever consumes two
// digits, so four-digit years fall through to the `yyyy` formats.
const DATE_FORMATS = [
  "dd/MM/yy",
  "dd/MM/yy HH:mm",
  "dd/MM/yy HH:mm:ss",
  "dd-MM-yy",
  "dd.MM.yy",
  "dd/MM/yyyy",
  "dd/MM/yyyy HH:mm",
  "dd/MM/yyyy HH:mm:ss",
  "dd-MM-yyyy",
  "dd.MM.yyyy",
  "yyyy-MM-dd",
  "yyyy-MM-dd HH:mm:ss",
  "yyyy-MM-dd'T'HH:mm:ss",
];

export class RecordNormalizer {
  static normalizeCell(raw: string | null | undefined): string | null {
    if (raw === null || raw === undefined) return null;
    const trimmed = String(raw).trim();
    return MISSING_TOKENS.has(trimmed) ? null : trimmed;
  }

  /**
   * Day-first calendar date. The time of day, when present, is dropped so the
   * result is always local midnight. Two-digit years resolve to the century
   * that puts them within 50 years of today.
   */
  static parseDate(raw: string | null | undefined): Date | null {
    const cell = RecordNormalizer.normalizeCell(raw);
    if (cell === null) return null;
    const today = new Date();
    for (const fmt of DATE_FORMATS) {
      const d = parse(cell, fmt, today);
      if (isValid(d)) return startOfDay(d);
    }
    return null;
  }

  /** 1900-01-01 is how the export writes "not entered yet". */
  static isEntrySentinel(d: Date): boolean {
    return d.getFullYear() === 1900 && d.getMonth() === 0 && d.getDate() === 1;
  }

  static parseEntryDate(raw: string | null | undefined): Date | null {
    const d = RecordNormalizer.parseDate(raw);
    if (d === null || RecordNormalizer.isEntrySentinel(d)) return null;
    return d;
  }

  /** Repeated headers get a numeric suffix: NP, NP.1, NP.2. */
  static uniqueHeaders(headers: string[]): string[] {
    const seen = new Set<string>();
    return headers.map((header) => {
      let name = header;
      for (let n = 1; seen.has(name); n++) name = `${header}.${n}`;
      seen.add(name);
      return name;
    });
  }

  static normalizeRow(headers: string[], row: string[]): TrackingRecord {
    const record = emptyRecord();
    headers.forEach((header, i) => {
      const raw = row[i];
      const column = findColumn(header);
      if (!column) {
        record.extra[header] = RecordNormalizer.normalizeCell(raw);
      } else if (column.kind === "text") {
        record[column.field] = RecordNormalizer.normalizeCell(raw);
      } else if (column.field === "entryDate") {
        record.entryDate = RecordNormalizer.parseEntryDate(raw);
      } else {
        record[column.field] = RecordNormalizer.parseDate(raw);
      }
    });
    return record;
  }

  /**
   * Builds the typed table from a CSV matrix whose first row is the header.
   * Columns missing from the source stay `null` on every record.
   */
  static normalizeTable(matrix: string[][]): TrackingTable {
    const [headerRow, ...rows] = matrix;
    if (!headerRow) return { columns: [], records: [] };
    const columns = RecordNormalizer.uniqueHeaders(headerRow.map((h) => h.trim()));
    return {
      columns,
      records: rows.map((row) => RecordNormalizer.normalizeRow(columns, row)),
    };
  }
}
