import { createServer, Server } from "node:http";
import { mkdtempSync, writeFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { TrackingSourceService } from "./tracking-source.service.js";

const CSV = "NP,CLIENTE\r\nA1,ACME\r\n";

describe("TrackingSourceService", () => {
  describe("file locations", () => {
    let dir: string;

    beforeAll(() => {
      dir = mkdtempSync(join(tmpdir(), "bol02-source-"));
      writeFileSync(join(dir, "bol02.csv"), CSV);
    });

    afterAll(() => rmSync(dir, { recursive: true, force: true }));

    it("reads a local file", async () => {
      const source = new TrackingSourceService(join(dir, "bol02.csv"), 1000);
      expect(await source.fetchRaw()).toBe(CSV);
    });

    it("rejects a missing file", async () => {
      const source = new TrackingSourceService(join(dir, "missing.csv"), 1000);
      await expect(source.fetchRaw()).rejects.toThrow(/ENOENT/);
    });
  });

  describe("http locations", () => {
    let server: Server;
    let baseUrl: string;

    beforeAll(async () => {
      server = createServer((req, res) => {
        if (req.url === "/bol02.csv") {
          res.writeHead(200, { "Content-Type": "text/csv" });
          res.end(CSV);
          return;
        }
        res.writeHead(500, { "Content-Type": "text/plain" });
        res.end("boom");
      });
      await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
      const address = server.address();
      if (address === null || typeof address === "string") {
        throw new Error("Server is not listening on a TCP port");
      }
      baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterAll(
      () =>
        new Promise<void>((resolve, reject) =>
          server.close((err) => (err ? reject(err) : resolve())),
        ),
    );

    it("downloads the export", async () => {
      const source = new TrackingSourceService(`${baseUrl}/bol02.csv`, 1000);
      try {
        expect(await source.fetchRaw()).toBe(CSV);
      } finally {
        await source.close();
      }
    });

    it("rejects an error response", async () => {
      const source = new TrackingSourceService(`${baseUrl}/broken.csv`, 1000);
      try {
        await expect(source.fetchRaw()).rejects.toThrow(
          `Failed to fetch ${baseUrl}/broken.csv: Source responded 500 Internal Server Error`,
        );
      } finally {
        await source.close();
      }
    });
  });
});
