import { format } from "date-fns";
import { SearchRecordsUseCase } from "./search-records.use-case.js";
import { ExportFormat, ExportOutcome, SearchQuery } from "../domain/types.js";
import { Messages } from "../domain/messages.js";
import { ILogger } from "../domain/services/logger.service.js";
import { toCsv } from "../../infrastructure/utils/csv.utils.js";
import { toXlsx } from "../../infrastructure/utils/xlsx.utils.js";

const CONTENT_TYPES: Record<ExportFormat, string> = {
  csv: "text/csv; charset=utf-8",
  xlsx: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
};

export class ExportResultsUseCase {
  constructor(
    private search: SearchRecordsUseCase,
    private logger: ILogger,
    private now: () => Date = () => new Date(),
  ) {}

  /**
   * Re-runs the search and serializes the displayed rows. A result set as
   * large as the source is refused, whatever the criteria were.
   */
  async execute(query: SearchQuery, fmt: ExportFormat): Promise<ExportOutcome> {
    const outcome = await this.search.execute(query);
    if (outcome.status !== "ok") return outcome;

    if (!outcome.exportAllowed) {
      this.logger.log({
        level: "warn",
        event: "export",
        message: `Refused ${fmt} export of ${outcome.records.length}/${outcome.total} records`,
      });
      return { status: "forbidden", message: Messages.exportForbidden };
    }

    const body =
      fmt === "csv"
        ? Buffer.from(toCsv(outcome.display), "utf-8")
        : await toXlsx(outcome.display);
    const filename = `resultados_${format(this.now(), "yyyyMMdd_HHmmss")}.${fmt}`;

    this.logger.log({
      level: "info",
      event: "export",
      message: `Exported ${outcome.records.length} records as ${filename}`,
    });
    return { status: "ok", filename, contentType: CONTENT_TYPES[fmt], body };
  }
}
