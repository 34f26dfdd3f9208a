import { ServerResponse } from "node:http";
import { SearchRecordsUseCase } from "../../core/use-cases/search-records.use-case.js";
import { DatasetSummaryUseCase } from "../../core/use-cases/dataset-summary.use-case.js";
import { SearchOutcome } from "../../core/domain/types.js";
import { SearchParamsSchema, paramsFromUrl, toSearchQuery } from "../validation.js";

const STATUS_CODES: Record<SearchOutcome["status"], number> = {
  ok: 200,
  empty: 200,
  rejected: 400,
  unavailable: 503,
};

function sendJson(res: ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

export class SearchDataController {
  constructor(
    private searchRecords: SearchRecordsUseCase,
    private datasetSummary: DatasetSummaryUseCase,
  ) {}

  ping(res: ServerResponse) {
    sendJson(res, 200, { status: "pong" });
  }

  async getSearchJson(url: string, res: ServerResponse) {
    try {
      const parse = SearchParamsSchema.safeParse(paramsFromUrl(url));
      if (!parse.success) {
        sendJson(res, 400, { error: parse.error.issues[0]?.message });
        return;
      }

      const outcome = await this.searchRecords.execute(toSearchQuery(parse.data));
      const status = STATUS_CODES[outcome.status];
      if (outcome.status !== "ok") {
        sendJson(res, status, outcome);
        return;
      }
      sendJson(res, status, {
        status: outcome.status,
        message: outcome.message,
        total: outcome.total,
        count: outcome.records.length,
        exportAllowed: outcome.exportAllowed,
        columns: outcome.display.columns,
        rows: outcome.display.rows,
      });
    } catch (e: unknown) {
      const message = e instanceof Error ? e.message : "Unknown error";
      sendJson(res, 500, { error: message });
    }
  }

  async getSummaryJson(res: ServerResponse) {
    try {
      const outcome = await this.datasetSummary.execute();
      if (outcome.status === "unavailable") {
        sendJson(res, 503, outcome);
        return;
      }
      sendJson(res, 200, outcome.summary);
    } catch (e: unknown) {
      const message = e instanceof Error ? e.message : "Unknown error";
      sendJson(res, 500, { error: message });
    }
  }
}
