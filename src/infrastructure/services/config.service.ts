import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import { IConfigService } from "../../core/domain/services/config.service.js";
import { Config } from "../../core/domain/entities/config.entity.js";

const ConfigSchema = z.object({
  source: z.object({
    location: z
      .string()
      .min(1, "source.location is required")
      .refine((v) => !v.startsWith("${"), {
        message: "source.location references an unset environment variable",
      }),
    refreshIntervalMs: z.number().int().min(0).default(300_000),
    timeoutMs: z.number().int().positive().default(30_000),
  }),
  server: z
    .object({ port: z.number().int().min(0).max(65535).default(8080) })
    .default({}),
  logging: z
    .object({
      dir: z.string().min(1).default("./output/logs"),
      file: z.string().min(1).default("tracking.jsonl"),
    })
    .default({}),
});

// Simple env substitution for "${VAR}" values
function substituteEnv(value: unknown): unknown {
  if (typeof value === "string" && value.startsWith("${") && value.endsWith("}")) {
    const key = value.slice(2, -1);
    return process.env[key] ?? value;
  }
  if (Array.isArray(value)) return value.map(substituteEnv);
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = substituteEnv(v);
    return out;
  }
  return value;
}

export function getConfigPath(): string {
  return (
    process.env.CONFIG_PATH || resolve(process.cwd(), "config", "config.yaml")
  );
}

export class ConfigService implements IConfigService {
  private config: Config;

  constructor(configPath?: string) {
    loadEnv();
    this.config = ConfigService.load(configPath || getConfigPath());
  }

  static load(path: string): Config {
    let raw: string;
    try {
      raw = readFileSync(path, "utf-8");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new Error(`Failed to load config from ${path}. ${msg}`, { cause: e });
    }
    return ConfigService.parse(raw, path);
  }

  static parse(raw: string, path = "<inline>"): Config {
    let parsed: unknown;
    try {
      parsed = yaml.load(raw);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new Error(`Invalid YAML in ${path}. ${msg}`, { cause: e });
    }
    if (!parsed || typeof parsed !== "object") {
      throw new Error(`Config at ${path} must be a YAML object.`);
    }

    const withEnv = substituteEnv(parsed);
    const result = ConfigSchema.safeParse(withEnv);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join(", ");
      throw new Error(`Invalid config at ${path}. ${issues}.`);
    }

    const config: Config = result.data;
    // Environment overrides
    if (process.env.TRACKING_SOURCE_URL) {
      config.source.location = process.env.TRACKING_SOURCE_URL;
    }
    const envPort = Number.parseInt(process.env.PORT ?? "", 10);
    if (!Number.isNaN(envPort)) config.server.port = envPort;
    return config;
  }

  getConfig(): Config {
    return this.config;
  }
  getSourceConfig(): Config["source"] {
    return this.config.source;
  }
  getServerConfig(): Config["server"] {
    return this.config.server;
  }
  getLoggingConfig(): Config["logging"] {
    return this.config.logging;
  }
}
