export type LogLevel = "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  /** Short tag such as "source", "http" or "export". */
  event: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface ILogger {
  log(entry: LogEntry): void;
  close(): void;
}
