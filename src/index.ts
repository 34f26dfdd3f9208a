#!/usr/bin/env node
/**
 * BOL02 Tracking – CLI
 * Commands: serve | search | summary
 */

import { writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { program } from "commander";
import { ConfigService, getConfigPath } from "./infrastructure/services/config.service.js";
import { JsonLogger } from "./infrastructure/services/json-logger.service.js";
import { TrackingSourceService } from "./infrastructure/services/tracking-source.service.js";
import { buildContainer, Container } from "./container.js";
import { startServer } from "./server.js";
import { ExportFormat, SearchQuery } from "./core/domain/types.js";
import { DisplayTable } from "./core/domain/entities/tracking-record.entity.js";

interface SearchOptions {
  reference?: string;
  np?: string;
  client?: string;
  export?: string;
  out?: string;
}

// ─── Shared helpers ───────────────────────────────────────────────────────────

async function withContainer(run: (container: Container) => Promise<void>) {
  const config = new ConfigService(program.opts().config).getConfig();
  const logger = new JsonLogger(config.logging.dir, config.logging.file, false);
  const source = new TrackingSourceService(
    config.source.location,
    config.source.timeoutMs,
  );
  try {
    await run(
      buildContainer({
        source,
        logger,
        refreshIntervalMs: config.source.refreshIntervalMs,
      }),
    );
  } finally {
    logger.close();
    await source.close();
  }
}

function parseExportFormat(value: string | undefined): ExportFormat | undefined {
  if (value === undefined) return undefined;
  if (value === "csv" || value === "xlsx") return value;
  throw new Error(`Unknown export format "${value}" (expected csv or xlsx)`);
}

function printTable(table: DisplayTable) {
  console.log(table.columns.join("\t"));
  for (const row of table.rows) {
    console.log(table.columns.map((c) => row[c] ?? "").join("\t"));
  }
}

// ─── program ──────────────────────────────────────────────────────────────────

program
  .name("bol02-tracking")
  .description("Search dashboard over the BOL02 tracking export")
  .option("-c, --config <path>", "Config file path", getConfigPath());

// ─── serve ────────────────────────────────────────────────────────────────────

program
  .command("serve")
  .description("Start the HTTP dashboard")
  .option("-p, --port <n>", "Port to listen on", Number.parseInt)
  .action((opts: { port?: number }) => {
    try {
      const port =
        opts.port === undefined || Number.isNaN(opts.port) ? undefined : opts.port;
      startServer({ configPath: program.opts().config, port });
    } catch (e) {
      console.error("Serve failed:", e instanceof Error ? e.message : String(e));
      process.exit(1);
    }
  });

// ─── search ───────────────────────────────────────────────────────────────────

program
  .command("search")
  .description("Search records by reference, part number and/or client")
  .option("--reference <text>", "Reference contains")
  .option("--np <text>", "Part number contains")
  .option("--client <text>", "Client contains")
  .option("--export <format>", "Write results as csv or xlsx")
  .option("-o, --out <path>", "Output file for --export (default: generated name)")
  .action(async (opts: SearchOptions) => {
    try {
      const query: SearchQuery = {
        reference: opts.reference,
        partNumber: opts.np,
        client: opts.client,
      };
      const exportFormat = parseExportFormat(opts.export);

      await withContainer(async ({ searchRecords, exportResults }) => {
        if (exportFormat) {
          const outcome = await exportResults.execute(query, exportFormat);
          if (outcome.status !== "ok") {
            console.error(outcome.message);
            process.exitCode = 1;
            return;
          }
          const path = resolve(opts.out ?? outcome.filename);
          writeFileSync(path, outcome.body);
          console.log(`Wrote ${path}`);
          return;
        }

        const outcome = await searchRecords.execute(query);
        if (outcome.status !== "ok") {
          console.error(outcome.message);
          process.exitCode = outcome.status === "empty" ? 0 : 1;
          return;
        }
        printTable(outcome.display);
        console.error(outcome.message);
      });
    } catch (e) {
      console.error("Search failed:", e instanceof Error ? e.message : String(e));
      process.exit(1);
    }
  });

// ─── summary ──────────────────────────────────────────────────────────────────

program
  .command("summary")
  .description("Print record counts and the most frequent states")
  .action(async () => {
    try {
      await withContainer(async ({ datasetSummary }) => {
        const outcome = await datasetSummary.execute();
        if (outcome.status === "unavailable") {
          console.error(outcome.message);
          process.exitCode = 1;
          return;
        }
        const { summary } = outcome;
        console.log(`Total de registros: ${summary.totalRecords}`);
        console.log(`Referencias únicas: ${summary.uniqueReferences}`);
        console.log(`NPs únicos: ${summary.uniquePartNumbers}`);
        console.log(`Clientes únicos: ${summary.uniqueClients}`);
        if (summary.topStates) {
          console.log("Distribución por Estado:");
          for (const s of summary.topStates) {
            console.log(`  • ${s.state}: ${s.count}`);
          }
        }
      });
    } catch (e) {
      console.error("Summary failed:", e instanceof Error ? e.message : String(e));
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
});
