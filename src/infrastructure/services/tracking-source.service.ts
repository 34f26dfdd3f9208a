import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { fetch, Agent } from "undici";
import { ITrackingSource } from "../../core/domain/repositories/tracking-source.repository.js";

const HTTP_LOCATION = /^https?:\/\//i;

/**
 * Reads the export from an `http(s)://` URL with undici, or from a local
 * file for any other location.
 */
export class TrackingSourceService implements ITrackingSource {
  private dispatcher: Agent | null = null;

  constructor(
    readonly location: string,
    private timeoutMs: number,
  ) {}

  async fetchRaw(): Promise<string> {
    if (!HTTP_LOCATION.test(this.location)) {
      return readFile(resolve(this.location), "utf-8");
    }

    if (!this.dispatcher) {
      this.dispatcher = new Agent({
        connectTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
      });
    }
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const res = await fetch(this.location, {
        headers: { Accept: "text/csv, text/plain, */*" },
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });
      if (!res.ok) {
        throw new Error(`Source responded ${res.status} ${res.statusText}`);
      }
      return await res.text();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Failed to fetch ${this.location}: ${message}`, {
        cause: err,
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  async close(): Promise<void> {
    if (this.dispatcher) {
      await this.dispatcher.close();
      this.dispatcher = null;
    }
  }
}
