import { format } from "date-fns";
import { LoadTrackingDataUseCase } from "../../core/use-cases/load-tracking-data.use-case.js";
import { SearchRecordsUseCase } from "../../core/use-cases/search-records.use-case.js";
import { DatasetSummaryUseCase } from "../../core/use-cases/dataset-summary.use-case.js";
import { PageLayout } from "../../infrastructure/views/page-layout.js";
import { SearchView, SearchFormValues } from "../../infrastructure/views/search.view.js";
import { SearchParams, toSearchQuery } from "../validation.js";

export interface DashboardPage {
  status: number;
  html: string;
}

const TITLE = "Tracking BOL02";

export class DashboardController {
  constructor(
    private loadTrackingData: LoadTrackingDataUseCase,
    private searchRecords: SearchRecordsUseCase,
    private datasetSummary: DatasetSummaryUseCase,
  ) {}

  /**
   * Renders the dashboard. `submitted` is true when the request came from the
   * search form, so an empty form is reported instead of silently ignored.
   * Sidebar and results are built from one snapshot.
   */
  async getSearchPage(
    params: SearchParams,
    submitted: boolean,
  ): Promise<DashboardPage> {
    const loaded = await this.loadTrackingData.execute();
    if (loaded.status === "unavailable") {
      return {
        status: 503,
        html: PageLayout({
          title: TITLE,
          content: SearchView.renderUnavailable(loaded.message),
          sidebar: SearchView.renderSidebar(null),
          styles: SearchView.getStyles(),
        }),
      };
    }

    const form: SearchFormValues = {
      reference: params.reference ?? "",
      np: params.np ?? "",
      client: params.client ?? "",
    };
    const { snapshot } = loaded;
    const outcome = submitted
      ? this.searchRecords.searchSnapshot(snapshot, toSearchQuery(params))
      : null;
    const summary = this.datasetSummary.summarize(snapshot);
    const loadedAt = format(snapshot.loadedAt, "dd/MM/yyyy HH:mm:ss");
    return {
      status: 200,
      html: PageLayout({
        title: TITLE,
        content: SearchView.render({ form, outcome }),
        sidebar: SearchView.renderSidebar(summary),
        styles: SearchView.getStyles(),
        footer: `Última actualización: ${loadedAt}`,
      }),
    };
  }
}
