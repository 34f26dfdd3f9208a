import { ServerResponse } from "node:http";
import { ExportResultsUseCase } from "../../core/use-cases/export-results.use-case.js";
import { ExportOutcome } from "../../core/domain/types.js";
import { ExportParamsSchema, paramsFromUrl, toSearchQuery } from "../validation.js";

const STATUS_CODES: Record<ExportOutcome["status"], number> = {
  ok: 200,
  rejected: 400,
  forbidden: 403,
  empty: 404,
  unavailable: 503,
};

export class ExportController {
  constructor(private exportResults: ExportResultsUseCase) {}

  async exportFile(url: string, res: ServerResponse, method?: string) {
    try {
      const parse = ExportParamsSchema.safeParse(paramsFromUrl(url));
      if (!parse.success) {
        res.writeHead(400, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ error: parse.error.issues[0]?.message }));
        return;
      }

      const { format, ...params } = parse.data;
      const outcome = await this.exportResults.execute(
        toSearchQuery(params),
        format,
      );
      if (outcome.status !== "ok") {
        res.writeHead(STATUS_CODES[outcome.status], {
          "Content-Type": "application/json",
        });
        res.end(JSON.stringify({ error: outcome.message }));
        return;
      }

      res.writeHead(200, {
        "Content-Type": outcome.contentType,
        "Content-Disposition": `attachment; filename="${outcome.filename}"`,
        "Content-Length": outcome.body.byteLength,
      });
      if (method === "HEAD") {
        res.end();
        return;
      }
      res.end(outcome.body);
    } catch (e: unknown) {
      if (!res.writableEnded) {
        const message = e instanceof Error ? e.message : "Unknown error";
        res.writeHead(500, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ error: message }));
      }
    }
  }
}
