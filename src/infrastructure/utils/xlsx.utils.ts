import ExcelJS from "exceljs";
import { DisplayTable } from "../../core/domain/entities/tracking-record.entity.js";

export const RESULTS_SHEET_NAME = "Resultados";

const headerFill: ExcelJS.Fill = {
  type: "pattern",
  pattern: "solid",
  fgColor: { argb: "FF216C6D" },
};
const headerFont: Partial<ExcelJS.Font> = {
  bold: true,
  color: { argb: "FFFFFFFF" },
};

/** Widest cell per column, header included, plus padding. */
export function columnWidths(table: DisplayTable): number[] {
  return table.columns.map(
    (header) =>
      table.rows.reduce(
        (width, row) => Math.max(width, (row[header] ?? "").length),
        header.length,
      ) + 2,
  );
}

/**
 * Single sheet, header row, one row per record. Cells are written as the
 * display strings so dates keep the DD/MM/YYYY rendering.
 */
export async function toXlsx(table: DisplayTable): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(RESULTS_SHEET_NAME);

  const widths = columnWidths(table);
  sheet.columns = table.columns.map((header, i) => ({
    header,
    key: header,
    width: widths[i],
  }));

  const headerRow = sheet.getRow(1);
  headerRow.eachCell((cell) => {
    cell.fill = headerFill;
    cell.font = headerFont;
  });

  for (const row of table.rows) {
    sheet.addRow(table.columns.map((c) => row[c] ?? ""));
  }

  const data = await workbook.xlsx.writeBuffer();
  return Buffer.from(data);
}
