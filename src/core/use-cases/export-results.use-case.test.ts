import { describe, it, expect } from "vitest";
import ExcelJS from "exceljs";
import { LoadTrackingDataUseCase } from "./load-tracking-data.use-case.js";
import { SearchRecordsUseCase } from "./search-records.use-case.js";
import { ExportResultsUseCase } from "./export-results.use-case.js";
import { parseCsv } from "../../infrastructure/utils/csv.utils.js";
import {
  PART_NUMBER,
  buildExportCsv,
  fakeLogger,
  fakeSource,
} from "../../test/fixtures.js";

function setup() {
  const { source } = fakeSource(buildExportCsv());
  const { logger, log } = fakeLogger();
  const load = new LoadTrackingDataUseCase(source, logger, 300_000);
  const exportResults = new ExportResultsUseCase(
    new SearchRecordsUseCase(load),
    logger,
    () => new Date(2026, 0, 2, 3, 4, 5),
  );
  return { exportResults, log };
}

describe("ExportResultsUseCase", () => {
  it("writes the displayed rows as a BOM-prefixed CSV", async () => {
    const { exportResults } = setup();
    const outcome = await exportResults.execute({ partNumber: PART_NUMBER }, "csv");

    expect(outcome.status).toBe("ok");
    if (outcome.status !== "ok") return;
    expect(outcome.filename).toBe("resultados_20260102_030405.csv");
    expect(outcome.contentType).toBe("text/csv; charset=utf-8");
    expect([...outcome.body.subarray(0, 3)]).toEqual([0xef, 0xbb, 0xbf]);

    const matrix = parseCsv(outcome.body.toString("utf-8"));
    expect(matrix).toHaveLength(4);
    expect(matrix[0]).toEqual([
      "ORIGEN",
      "NP",
      "CLIENTE",
      "REFERENCIA",
      "ESTADO",
      "ETD",
      "FECHA_INGRESO",
    ]);
    expect(matrix[1]).toEqual([
      "MX",
      PART_NUMBER,
      "ACME",
      "REF10",
      "ENTREGADO",
      "01/02/2025",
      "Pendiente",
    ]);
  });

  it("builds an xlsx workbook", async () => {
    const { exportResults } = setup();
    const outcome = await exportResults.execute({ partNumber: PART_NUMBER }, "xlsx");

    expect(outcome.status).toBe("ok");
    if (outcome.status !== "ok") return;
    expect(outcome.filename).toBe("resultados_20260102_030405.xlsx");
    expect(outcome.contentType).toBe(
      "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
    );

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.load(outcome.body);
    const sheet = workbook.getWorksheet("Resultados");
    expect(sheet?.rowCount).toBe(4);
    expect(sheet?.getCell("D4").text).toBe("REF90");
  });

  it("refuses to export the whole dataset", async () => {
    const { exportResults, log } = setup();
    const outcome = await exportResults.execute({ client: "ACME" }, "csv");

    expect(outcome).toEqual({
      status: "forbidden",
      message: "No se permite descargar el dataset completo",
    });
    expect(log).toHaveBeenCalledWith({
      level: "warn",
      event: "export",
      message: "Refused csv export of 100/100 records",
    });
  });

  it("passes search failures through", async () => {
    const { exportResults } = setup();
    expect((await exportResults.execute({}, "csv")).status).toBe("rejected");
    expect((await exportResults.execute({ reference: "ZZZ" }, "csv")).status).toBe(
      "empty",
    );
  });
});
