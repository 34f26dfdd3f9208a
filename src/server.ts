import { createServer } from "node:http";
import { ConfigService } from "./infrastructure/services/config.service.js";
import { JsonLogger } from "./infrastructure/services/json-logger.service.js";
import { TrackingSourceService } from "./infrastructure/services/tracking-source.service.js";
import { buildContainer } from "./container.js";

export interface StartServerOptions {
  configPath?: string;
  port?: number;
}

export function startServer(options: StartServerOptions = {}) {
  // 1. Configuration and Logging
  const configService = new ConfigService(options.configPath);
  const sourceConfig = configService.getSourceConfig();
  const loggingConfig = configService.getLoggingConfig();
  const port = options.port ?? configService.getServerConfig().port;
  const logger = new JsonLogger(loggingConfig.dir, loggingConfig.file);

  // 2. Source, Use Cases and Router
  const source = new TrackingSourceService(
    sourceConfig.location,
    sourceConfig.timeoutMs,
  );
  const { router } = buildContainer({
    source,
    logger,
    refreshIntervalMs: sourceConfig.refreshIntervalMs,
  });

  // 3. HTTP Server
  const server = createServer(async (req, res) => {
    await router.handleRequest(req, res);
  });
  server.on("close", () => {
    logger.close();
    source.close().catch((err: unknown) => {
      console.error("[server] Failed to close source dispatcher:", err);
    });
  });
  server.listen(port, () => {
    logger.log({
      level: "info",
      event: "server",
      message: `Tracking BOL02: http://localhost:${port}/`,
    });
  });
  return server;
}
