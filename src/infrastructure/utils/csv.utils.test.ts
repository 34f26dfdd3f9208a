import { describe, it, expect } from "vitest";
import { parseCsv, toCsv } from "./csv.utils.js";
import { DisplayTable } from "../../core/domain/entities/tracking-record.entity.js";

describe("parseCsv", () => {
  it("strips the BOM, honours quotes and skips blank lines", () => {
    const text = '\uFEFFA,B\r\n"x, y",2\r\n\r\n"say ""hi""",\r\n';
    expect(parseCsv(text)).toEqual([
      ["A", "B"],
      ["x, y", "2"],
      ['say "hi"', ""],
    ]);
  });

  it("keeps rows shorter than the header", () => {
    expect(parseCsv("A,B,C\n1\n")).toEqual([["A", "B", "C"], ["1"]]);
  });

  it("rejects rows wider than the header", () => {
    expect(() => parseCsv("A,B\n1,2,3\n")).toThrow(
      "Invalid CSV at row 1: expected 2 fields, saw 3",
    );
  });

  it("rejects unbalanced quotes", () => {
    expect(() => parseCsv('A,B\n"x,2\n')).toThrow(/^Invalid CSV/);
  });
});

describe("toCsv", () => {
  const table: DisplayTable = {
    columns: ["REFERENCIA", "DESCRIPCION", "FECHA_INGRESO"],
    rows: [
      { REFERENCIA: "NI1025M", DESCRIPCION: "Tornillo, 3/8", FECHA_INGRESO: "Pendiente" },
      { REFERENCIA: "NI1026", DESCRIPCION: "", FECHA_INGRESO: "15/03/2025" },
    ],
  };

  it("writes a BOM, a header and CRLF rows without an index column", () => {
    expect(toCsv(table)).toBe(
      "\uFEFFREFERENCIA,DESCRIPCION,FECHA_INGRESO\r\n" +
        'NI1025M,"Tornillo, 3/8",Pendiente\r\n' +
        "NI1026,,15/03/2025",
    );
  });

  it("reads back the displayed values", () => {
    const [header, ...rows] = parseCsv(toCsv(table));
    expect(header).toEqual(table.columns);
    expect(rows).toEqual(
      table.rows.map((r) => table.columns.map((c) => r[c])),
    );
  });
});
