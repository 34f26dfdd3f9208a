import Papa from "papaparse";
import { DisplayTable } from "../../core/domain/entities/tracking-record.entity.js";

const BOM = "\uFEFF";

/**
 * Parses the export into a string matrix, header row first. Throws when the
 * text has unbalanced quotes or a row wider than the header.
 */
export function parseCsv(text: string): string[][] {
  const input = text.startsWith(BOM) ? text.slice(BOM.length) : text;
  const result = Papa.parse<string[]>(input, {
    delimiter: ",",
    skipEmptyLines: true,
  });
  if (result.errors.length > 0) {
    const first = result.errors[0];
    throw new Error(`Invalid CSV at row ${first.row}: ${first.message}`);
  }
  const [header, ...rows] = result.data;
  if (header) {
    rows.forEach((row, i) => {
      if (row.length > header.length) {
        throw new Error(
          `Invalid CSV at row ${i + 1}: expected ${header.length} fields, saw ${row.length}`,
        );
      }
    });
  }
  return result.data;
}

/** UTF-8 with BOM, comma-delimited, CRLF, header row, no index column. */
export function toCsv(table: DisplayTable): string {
  const body = Papa.unparse(
    {
      fields: table.columns,
      data: table.rows.map((row) => table.columns.map((c) => row[c] ?? "")),
    },
    { newline: "\r\n" },
  );
  return BOM + body;
}
