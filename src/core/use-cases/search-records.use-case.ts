import { LoadTrackingDataUseCase } from "./load-tracking-data.use-case.js";
import { RecordFilter } from "../domain/services/record-filter.service.js";
import { RecordFormatter } from "../domain/services/record-formatter.service.js";
import { SearchOutcome, SearchQuery, TrackingSnapshot } from "../domain/types.js";
import { Messages } from "../domain/messages.js";

export class SearchRecordsUseCase {
  constructor(private loadData: LoadTrackingDataUseCase) {}

  async execute(query: SearchQuery): Promise<SearchOutcome> {
    // Checked before loading: an empty query never touches the data.
    if (!RecordFilter.hasCriteria(query)) {
      return { status: "rejected", message: Messages.noCriteria };
    }

    const loaded = await this.loadData.execute();
    if (loaded.status === "unavailable") return loaded;
    return this.searchSnapshot(loaded.snapshot, query);
  }

  /** Searches an already loaded snapshot. */
  searchSnapshot(snapshot: TrackingSnapshot, query: SearchQuery): SearchOutcome {
    if (!RecordFilter.hasCriteria(query)) {
      return { status: "rejected", message: Messages.noCriteria };
    }

    const { table } = snapshot;
    const total = table.records.length;
    const records = RecordFilter.filter(table.records, query);
    if (records.length === 0) {
      return { status: "empty", message: Messages.noResults, total };
    }

    return {
      status: "ok",
      message: Messages.found(records.length),
      records,
      display: RecordFormatter.formatTable({ columns: table.columns, records }),
      total,
      exportAllowed: records.length > 0 && records.length < total,
    };
  }
}
