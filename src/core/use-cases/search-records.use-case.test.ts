import { describe, it, expect } from "vitest";
import { LoadTrackingDataUseCase } from "./load-tracking-data.use-case.js";
import { SearchRecordsUseCase } from "./search-records.use-case.js";
import {
  PART_NUMBER,
  buildExportCsv,
  fakeLogger,
  fakeSource,
} from "../../test/fixtures.js";

function setup(raw: string | Error = buildExportCsv()) {
  const { source, fetchRaw } = fakeSource(raw);
  const load = new LoadTrackingDataUseCase(source, fakeLogger().logger, 300_000);
  return { search: new SearchRecordsUseCase(load), fetchRaw };
}

describe("SearchRecordsUseCase", () => {
  it("finds the three rows of a part number out of 100 and allows export", async () => {
    const { search } = setup();
    const outcome = await search.execute({ partNumber: PART_NUMBER });

    expect(outcome.status).toBe("ok");
    if (outcome.status !== "ok") return;
    expect(outcome.total).toBe(100);
    expect(outcome.records.map((r) => r.reference)).toEqual(["REF10", "REF50", "REF90"]);
    expect(outcome.exportAllowed).toBe(true);
    expect(outcome.message).toBe("Se encontraron 3 registros");
    expect(outcome.display.rows[0]).toEqual({
      ORIGEN: "MX",
      NP: PART_NUMBER,
      CLIENTE: "ACME",
      REFERENCIA: "REF10",
      ESTADO: "ENTREGADO",
      ETD: "01/02/2025",
      FECHA_INGRESO: "Pendiente",
    });
    expect(outcome.display.rows[1].FECHA_INGRESO).toBe("15/03/2025");
  });

  it("rejects a query without criteria before loading anything", async () => {
    const { search, fetchRaw } = setup();
    const outcome = await search.execute({ reference: " ", partNumber: "", client: "\t" });

    expect(outcome).toEqual({
      status: "rejected",
      message: "Debes ingresar al menos un criterio de búsqueda",
    });
    expect(fetchRaw).not.toHaveBeenCalled();
  });

  it("reports no results without offering export", async () => {
    const { search } = setup();
    expect(await search.execute({ reference: "NO-EXISTE" })).toEqual({
      status: "empty",
      message: "No se encontraron resultados",
      total: 100,
    });
  });

  it("does not allow export when every row matches", async () => {
    const { search } = setup();
    const outcome = await search.execute({ client: "acme" });

    expect(outcome.status).toBe("ok");
    if (outcome.status !== "ok") return;
    expect(outcome.records).toHaveLength(100);
    expect(outcome.exportAllowed).toBe(false);
  });

  it("matches reference prefixes as substrings", async () => {
    const { search } = setup();
    const outcome = await search.execute({ reference: "ref1" });

    expect(outcome.status).toBe("ok");
    if (outcome.status !== "ok") return;
    // REF1, REF10..REF19, REF100
    expect(outcome.records).toHaveLength(12);
  });

  it("passes through an unavailable source", async () => {
    const { search } = setup(new Error("timeout"));
    expect(await search.execute({ client: "x" })).toEqual({
      status: "unavailable",
      message: "No se pudieron cargar los datos.",
    });
  });
});
