import {
  DisplayTable,
  TrackingRecord,
  TrackingTable,
} from "./entities/tracking-record.entity.js";

export interface SearchQuery {
  reference?: string;
  partNumber?: string;
  client?: string;
}

export interface TrackingSnapshot {
  table: TrackingTable;
  loadedAt: Date;
}

export type LoadOutcome =
  | { status: "ok"; snapshot: TrackingSnapshot }
  | { status: "unavailable"; message: string };

export type SearchOutcome =
  | { status: "unavailable"; message: string }
  | { status: "rejected"; message: string }
  | { status: "empty"; message: string; total: number }
  | {
      status: "ok";
      message: string;
      records: TrackingRecord[];
      display: DisplayTable;
      total: number;
      exportAllowed: boolean;
    };

export type ExportFormat = "csv" | "xlsx";

export interface ExportFile {
  filename: string;
  contentType: string;
  body: Buffer;
}

export type ExportOutcome =
  | Exclude<SearchOutcome, { status: "ok" }>
  | { status: "forbidden"; message: string }
  | ({ status: "ok" } & ExportFile);

export interface StateCount {
  state: string;
  count: number;
}

export interface DatasetSummary {
  totalRecords: number;
  uniqueReferences: number;
  uniquePartNumbers: number;
  uniqueClients: number;
  /** Absent when the source has no ESTADO column. */
  topStates?: StateCount[];
  loadedAt: string;
}

export type SummaryOutcome =
  | { status: "ok"; summary: DatasetSummary }
  | { status: "unavailable"; message: string };
