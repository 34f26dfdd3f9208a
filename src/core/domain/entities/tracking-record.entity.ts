export type TextField =
  | "origin"
  | "partNumber"
  | "acceptedPartNumber"
  | "description"
  | "model"
  | "status"
  | "client"
  | "requestedBy"
  | "reference"
  | "state";

export type DateField = "etd" | "shipDate" | "entryDate" | "requestedDate";

/**
 * One row of the BOL02 export. `null` is the single missing marker for every
 * field, whatever the source cell held ("", "nan", "(en blanco)", ...).
 */
export type TrackingRecord = {
  [K in TextField]: string | null;
} & {
  [K in DateField]: Date | null;
} & {
  /** Source columns outside the known schema, keyed by header. */
  extra: Record<string, string | null>;
};

export type ColumnDefinition =
  | { header: string; field: TextField; kind: "text" }
  | { header: string; field: DateField; kind: "date" };

export const TEXT_COLUMNS = [
  { header: "ORIGEN", field: "origin", kind: "text" },
  { header: "NP", field: "partNumber", kind: "text" },
  { header: "NP_ACEPTADA", field: "acceptedPartNumber", kind: "text" },
  { header: "DESCRIPCION", field: "description", kind: "text" },
  { header: "MOD", field: "model", kind: "text" },
  { header: "STATUS", field: "status", kind: "text" },
  { header: "CLIENTE", field: "client", kind: "text" },
  { header: "SOLICITADO", field: "requestedBy", kind: "text" },
  { header: "REFERENCIA", field: "reference", kind: "text" },
  { header: "ESTADO", field: "state", kind: "text" },
] as const satisfies readonly ColumnDefinition[];

export const DATE_COLUMNS = [
  { header: "ETD", field: "etd", kind: "date" },
  { header: "SHIP_DATE", field: "shipDate", kind: "date" },
  { header: "FECHA_INGRESO", field: "entryDate", kind: "date" },
  { header: "FECHA_SOLICITADO", field: "requestedDate", kind: "date" },
] as const satisfies readonly ColumnDefinition[];

export const KNOWN_COLUMNS: readonly ColumnDefinition[] = [
  ...TEXT_COLUMNS,
  ...DATE_COLUMNS,
];

export function findColumn(header: string): ColumnDefinition | undefined {
  return KNOWN_COLUMNS.find((c) => c.header === header);
}

export function emptyRecord(): TrackingRecord {
  return {
    origin: null,
    partNumber: null,
    acceptedPartNumber: null,
    description: null,
    model: null,
    status: null,
    client: null,
    requestedBy: null,
    reference: null,
    state: null,
    etd: null,
    shipDate: null,
    entryDate: null,
    requestedDate: null,
    extra: {},
  };
}

/** Normalized snapshot: records plus the source's column order. */
export interface TrackingTable {
  columns: string[];
  records: TrackingRecord[];
}

/** Display/export copy: every cell already rendered to its final string. */
export interface DisplayTable {
  columns: string[];
  rows: Record<string, string>[];
}
