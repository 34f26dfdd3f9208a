import { LoadTrackingDataUseCase } from "./load-tracking-data.use-case.js";
import { TrackingRecord } from "../domain/entities/tracking-record.entity.js";
import {
  DatasetSummary,
  StateCount,
  SummaryOutcome,
  TrackingSnapshot,
} from "../domain/types.js";

const TOP_STATES = 5;

function countDistinct(values: (string | null)[]): number {
  return new Set(values.filter((v): v is string => v !== null)).size;
}

/** Most frequent ESTADO values; ties keep first-appearance order. */
export function topStates(records: TrackingRecord[], limit = TOP_STATES): StateCount[] {
  const counts = new Map<string, number>();
  for (const r of records) {
    if (r.state === null) continue;
    counts.set(r.state, (counts.get(r.state) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([state, count]) => ({ state, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

export class DatasetSummaryUseCase {
  constructor(private loadData: LoadTrackingDataUseCase) {}

  async execute(): Promise<SummaryOutcome> {
    const loaded = await this.loadData.execute();
    if (loaded.status === "unavailable") return loaded;
    return { status: "ok", summary: this.summarize(loaded.snapshot) };
  }

  summarize({ table, loadedAt }: TrackingSnapshot): DatasetSummary {
    const { records } = table;
    return {
      totalRecords: records.length,
      uniqueReferences: countDistinct(records.map((r) => r.reference)),
      uniquePartNumbers: countDistinct(records.map((r) => r.partNumber)),
      uniqueClients: countDistinct(records.map((r) => r.client)),
      topStates: table.columns.includes("ESTADO") ? topStates(records) : undefined,
      loadedAt: loadedAt.toISOString(),
    };
  }
}
