import { ITrackingSource } from "../domain/repositories/tracking-source.repository.js";
import { ILogger } from "../domain/services/logger.service.js";
import { RecordNormalizer } from "../domain/services/record-normalizer.service.js";
import { LoadOutcome, TrackingSnapshot } from "../domain/types.js";
import { Messages } from "../domain/messages.js";
import { parseCsv } from "../../infrastructure/utils/csv.utils.js";

/**
 * Fetches and normalizes the export, keeping the last good snapshot for
 * `refreshIntervalMs`. Failures are reported as "unavailable" and never cached.
 */
export class LoadTrackingDataUseCase {
  private snapshot: TrackingSnapshot | null = null;
  private inFlight: Promise<LoadOutcome> | null = null;

  constructor(
    private source: ITrackingSource,
    private logger: ILogger,
    private refreshIntervalMs: number,
    private now: () => number = Date.now,
  ) {}

  async execute(): Promise<LoadOutcome> {
    if (this.snapshot && !this.isStale(this.snapshot)) {
      return { status: "ok", snapshot: this.snapshot };
    }
    if (!this.inFlight) {
      this.inFlight = this.refresh().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private isStale(snapshot: TrackingSnapshot): boolean {
    return this.now() - snapshot.loadedAt.getTime() >= this.refreshIntervalMs;
  }

  private async refresh(): Promise<LoadOutcome> {
    const start = this.now();
    try {
      const raw = await this.source.fetchRaw();
      const table = RecordNormalizer.normalizeTable(parseCsv(raw));
      if (table.records.length === 0) {
        throw new Error("Source contains no records");
      }
      const snapshot: TrackingSnapshot = {
        table,
        loadedAt: new Date(this.now()),
      };
      this.snapshot = snapshot;
      this.logger.log({
        level: "info",
        event: "source",
        message: `Loaded ${table.records.length} records from ${this.source.location}`,
        details: {
          records: table.records.length,
          columns: table.columns.length,
          durationMs: this.now() - start,
        },
      });
      return { status: "ok", snapshot };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.log({
        level: "error",
        event: "source",
        message: `Failed to load ${this.source.location}: ${message}`,
      });
      return { status: "unavailable", message: Messages.unavailable };
    }
  }
}
