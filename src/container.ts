import { ITrackingSource } from "./core/domain/repositories/tracking-source.repository.js";
import { ILogger } from "./core/domain/services/logger.service.js";
import { LoadTrackingDataUseCase } from "./core/use-cases/load-tracking-data.use-case.js";
import { SearchRecordsUseCase } from "./core/use-cases/search-records.use-case.js";
import { ExportResultsUseCase } from "./core/use-cases/export-results.use-case.js";
import { DatasetSummaryUseCase } from "./core/use-cases/dataset-summary.use-case.js";
import { DashboardController } from "./adapters/controllers/dashboard.controller.js";
import { SearchPageController } from "./adapters/controllers/search-page.controller.js";
import { SearchDataController } from "./adapters/controllers/search-data.controller.js";
import { ExportController } from "./adapters/controllers/export.controller.js";
import { Router } from "./adapters/router.js";

export interface ContainerOptions {
  source: ITrackingSource;
  logger: ILogger;
  refreshIntervalMs: number;
}

/** Wires use cases and controllers around one tracking source. */
export function buildContainer({ source, logger, refreshIntervalMs }: ContainerOptions) {
  // Use Cases
  const loadTrackingData = new LoadTrackingDataUseCase(
    source,
    logger,
    refreshIntervalMs,
  );
  const searchRecords = new SearchRecordsUseCase(loadTrackingData);
  const exportResults = new ExportResultsUseCase(searchRecords, logger);
  const datasetSummary = new DatasetSummaryUseCase(loadTrackingData);

  // Controllers
  const dashboardController = new DashboardController(
    loadTrackingData,
    searchRecords,
    datasetSummary,
  );
  const router = new Router(
    new SearchPageController(dashboardController),
    new SearchDataController(searchRecords, datasetSummary),
    new ExportController(exportResults),
    logger,
  );

  return {
    loadTrackingData,
    searchRecords,
    exportResults,
    datasetSummary,
    router,
  };
}

export type Container = ReturnType<typeof buildContainer>;
