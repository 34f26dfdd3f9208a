export interface SourceConfig {
  /** `http(s)://` URL or local file path of the CSV export. */
  location: string;
  refreshIntervalMs: number;
  timeoutMs: number;
}

export interface ServerConfig {
  port: number;
}

export interface LoggingConfig {
  dir: string;
  file: string;
}

export interface Config {
  source: SourceConfig;
  server: ServerConfig;
  logging: LoggingConfig;
}
