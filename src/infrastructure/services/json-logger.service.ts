import { createWriteStream, mkdirSync, existsSync, WriteStream } from "node:fs";
import { join } from "node:path";
import { ILogger, LogEntry } from "../../core/domain/services/logger.service.js";

/**
 * JSON-lines log file plus a one-line console echo per entry.
 * Pass `dir: null` to log to the console only.
 */
export class JsonLogger implements ILogger {
  private logStream: WriteStream | null = null;

  constructor(
    private logDir: string | null,
    private fileName: string = "tracking.jsonl",
    private echo: boolean = true,
  ) {
    if (this.logDir) {
      if (!existsSync(this.logDir)) mkdirSync(this.logDir, { recursive: true });
      this.logStream = createWriteStream(join(this.logDir, this.fileName), {
        flags: "a",
      });
    }
  }

  log(entry: LogEntry): void {
    const full = { timestamp: new Date().toISOString(), ...entry };
    if (this.logStream?.writable) {
      this.logStream.write(JSON.stringify(full) + "\n");
    }
    if (!this.echo) return;
    const line = `[${entry.event}] ${entry.message}`;
    if (entry.level === "error") console.error(line);
    else if (entry.level === "warn") console.warn(line);
    else console.log(line);
  }

  close(): void {
    if (this.logStream) {
      this.logStream.end();
      this.logStream = null;
    }
  }
}
