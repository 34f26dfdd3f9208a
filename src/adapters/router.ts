import { IncomingMessage, ServerResponse } from "node:http";
import { SearchPageController } from "./controllers/search-page.controller.js";
import { SearchDataController } from "./controllers/search-data.controller.js";
import { ExportController } from "./controllers/export.controller.js";
import { ILogger } from "../core/domain/services/logger.service.js";

export class Router {
  constructor(
    private searchPageController: SearchPageController,
    private searchDataController: SearchDataController,
    private exportController: ExportController,
    private logger: ILogger,
  ) {}

  // ──────────────────────────────────────────────
  // Access logger
  // ──────────────────────────────────────────────
  private logAccess(
    method: string,
    url: string,
    status: number,
    durationMs: number,
  ) {
    // Page loads and liveness probes are not logged
    if (!url.startsWith("/api/") && url !== "/search") return;
    if (url === "/api/ping") return;

    this.logger.log({
      level: status >= 500 ? "error" : "info",
      event: "http",
      message: `${method} ${url} → ${status} (${durationMs}ms)`,
      details: { method, url, status, durationMs },
    });
  }

  // ──────────────────────────────────────────────
  // Request handler
  // ──────────────────────────────────────────────
  async handleRequest(req: IncomingMessage, res: ServerResponse) {
    const url = req.url?.split("?")[0] || "/";
    const method = req.method || "GET";
    const start = Date.now();

    res.on("finish", () => {
      this.logAccess(method, url, res.statusCode, Date.now() - start);
    });

    try {
      await this.route(method, url, req.url || url, res);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      if (!res.writableEnded) {
        res.writeHead(500, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ error: message }));
      }
    }
  }

  private async route(
    method: string,
    url: string,
    fullUrl: string,
    res: ServerResponse,
  ) {
    // 1. Ping
    if (method === "GET" && url === "/api/ping") {
      return this.searchDataController.ping(res);
    }

    // 2. Dashboard
    if (method === "GET" && (url === "/" || url === "/index.html")) {
      return this.searchPageController.getSearchPage(fullUrl, res, false);
    }
    if (method === "GET" && url === "/search") {
      return this.searchPageController.getSearchPage(fullUrl, res, true);
    }

    // 3. JSON API
    if (method === "GET" && url === "/api/search") {
      return this.searchDataController.getSearchJson(fullUrl, res);
    }
    if (method === "GET" && url === "/api/summary") {
      return this.searchDataController.getSummaryJson(res);
    }

    // 4. Exports
    if ((method === "GET" || method === "HEAD") && url === "/api/export") {
      return this.exportController.exportFile(fullUrl, res, method);
    }

    // 404 Fallback
    res.writeHead(404, { "Content-Type": "application/json" });
    res.end(JSON.stringify({ error: "Not Found" }));
  }
}
