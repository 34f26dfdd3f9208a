import { vi } from "vitest";
import { ITrackingSource } from "../core/domain/repositories/tracking-source.repository.js";
import { ILogger } from "../core/domain/services/logger.service.js";
import {
  TrackingRecord,
  emptyRecord,
} from "../core/domain/entities/tracking-record.entity.js";

export const PART_NUMBER = "110445RB0A";
/** Rows whose NP column holds PART_NUMBER. */
export const PART_ROWS = [10, 50, 90];

/**
 * 100-row export. Every row belongs to client ACME; row 10 carries the
 * 1900-01-01 "not entered" date; odd rows are EN TRANSITO, even ENTREGADO.
 */
export function buildExportCsv(rowCount = 100): string {
  const lines = ["ORIGEN,NP,CLIENTE,REFERENCIA,ESTADO,ETD,FECHA_INGRESO"];
  for (let i = 1; i <= rowCount; i++) {
    const np = PART_ROWS.includes(i) ? PART_NUMBER : `NP-${i}`;
    const state = i % 2 === 1 ? "EN TRANSITO" : "ENTREGADO";
    const entry = i === 10 ? "1900-01-01" : "15/03/2025";
    lines.push(`MX,${np},ACME,REF${i},${state},01/02/2025,${entry}`);
  }
  return lines.join("\r\n") + "\r\n";
}

export function fakeSource(raw: string | Error, location = "memory://bol02") {
  const fetchRaw = vi.fn(async () => {
    if (raw instanceof Error) throw raw;
    return raw;
  });
  const source: ITrackingSource = { location, fetchRaw };
  return { source, fetchRaw };
}

export function fakeLogger() {
  const log = vi.fn();
  const close = vi.fn();
  const logger: ILogger = { log, close };
  return { logger, log, close };
}

export function record(overrides: Partial<TrackingRecord> = {}): TrackingRecord {
  return { ...emptyRecord(), ...overrides };
}
