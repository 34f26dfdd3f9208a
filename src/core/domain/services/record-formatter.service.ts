import { format } from "date-fns";
import {
  DisplayTable,
  TrackingRecord,
  TrackingTable,
  findColumn,
} from "../entities/tracking-record.entity.js";
import { Messages } from "../messages.js";

export const DISPLAY_DATE_FORMAT = "dd/MM/yyyy";

export class RecordFormatter {
  static formatDate(d: Date | null, missing = ""): string {
    return d === null ? missing : format(d, DISPLAY_DATE_FORMAT);
  }

  static formatCell(record: TrackingRecord, header: string): string {
    const column = findColumn(header);
    if (!column) return record.extra[header] ?? "";
    if (column.kind === "text") return record[column.field] ?? "";
    if (column.field === "entryDate") {
      return RecordFormatter.formatDate(record.entryDate, Messages.pendingEntry);
    }
    return RecordFormatter.formatDate(record[column.field]);
  }

  /**
   * Renders every cell to its display string. Output is terminal: the rows are
   * plain strings and must not be fed back into the normalizer.
   */
  static formatTable(table: TrackingTable): DisplayTable {
    const columns = [...table.columns];
    return {
      columns,
      rows: table.records.map((record) => {
        const row: Record<string, string> = {};
        for (const header of columns) {
          row[header] = RecordFormatter.formatCell(record, header);
        }
        return row;
      }),
    };
  }
}
