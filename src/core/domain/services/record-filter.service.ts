import { TextField, TrackingRecord } from "../entities/tracking-record.entity.js";
import { SearchQuery } from "../types.js";

const SEARCH_FIELDS: ReadonlyArray<[keyof SearchQuery, TextField]> = [
  ["reference", "reference"],
  ["partNumber", "partNumber"],
  ["client", "client"],
];

interface Criterion {
  field: TextField;
  needle: string;
}

export class RecordFilter {
  static criteria(query: SearchQuery): Criterion[] {
    const out: Criterion[] = [];
    for (const [key, field] of SEARCH_FIELDS) {
      const needle = (query[key] ?? "").trim();
      if (needle) out.push({ field, needle: needle.toLowerCase() });
    }
    return out;
  }

  static hasCriteria(query: SearchQuery): boolean {
    return RecordFilter.criteria(query).length > 0;
  }

  /**
   * Case-insensitive literal substring match, AND across the supplied fields.
   * Callers must reject a query without criteria first: an empty query would
   * otherwise select the whole table.
   */
  static filter(
    records: readonly TrackingRecord[],
    query: SearchQuery,
  ): TrackingRecord[] {
    const criteria = RecordFilter.criteria(query);
    if (criteria.length === 0) {
      throw new Error("At least one search criterion is required");
    }
    return records.filter((r) =>
      criteria.every(({ field, needle }) =>
        (r[field] ?? "").toLowerCase().includes(needle),
      ),
    );
  }
}
