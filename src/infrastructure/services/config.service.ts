import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { config as loadEnv } from "dotenv";
import type { IConfigService } from "../../core/domain/services/config.service.js";
import type { Config } from "../../core/domain/entities/config.entity.js";
import { ConfigurationError, errorMessage } from "../../core/domain/errors.js";
import { FileConfigSchema, formatIssues } from "../../adapters/validation.js";

/**
 * Resolves the configuration file path from CONFIG_PATH or the default location.
 */
export function getConfigPath(): string {
  return (
    process.env.CONFIG_PATH || resolve(process.cwd(), "config", "config.yaml")
  );
}

/** `${VAR}` string values are replaced from the environment when set. */
export function substituteEnv(value: unknown): unknown {
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

/**
 * Loads the YAML (or JSON) config file, applies `.env` and environment
 * overrides, and validates the result.
 */
export class ConfigService implements IConfigService {
  private config: Config;
  private sourcePath: string;

  /** Without `configPath`, CONFIG_PATH is read after `.env` is loaded. */
  constructor(configPath?: string) {
    loadEnv();
    this.sourcePath = configPath || getConfigPath();
    this.config = this.loadConfig(this.sourcePath);
  }

  private loadConfig(path: string): Config {
    let raw: string;
    try {
      raw = readFileSync(path, "utf-8");
    } catch (e) {
      throw new ConfigurationError(
        `Failed to load config from ${path}. ${errorMessage(e)}`,
        { cause: e },
      );
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(raw);
    } catch (e) {
      throw new ConfigurationError(
        `Invalid YAML in ${path}. ${errorMessage(e)}`,
        { cause: e },
      );
    }
    if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
      throw new ConfigurationError(`Config at ${path} must be a YAML object.`);
    }

    const withEnv = substituteEnv(parsed);
    const overridden: Record<string, unknown> = {
      ...(withEnv !== null && typeof withEnv === "object" ? withEnv : {}),
    };
    if (process.env.GROBID_SERVER) overridden.grobid_server = process.env.GROBID_SERVER;
    if (process.env.GROBID_PORT !== undefined) overridden.grobid_port = process.env.GROBID_PORT;

    const result = FileConfigSchema.safeParse(overridden);
    if (!result.success) {
      throw new ConfigurationError(
        `Invalid config at ${path}. ${formatIssues(result.error)}.`,
      );
    }
    const file = result.data;
    const apiToken = process.env.GROBID_API_TOKEN?.trim();

    return {
      server: {
        host: file.grobid_server,
        port: file.grobid_port,
        timeoutMs: file.timeout_ms,
        ...(apiToken ? { apiToken } : {}),
      },
      run: {
        batchSize: file.batch_size,
        concurrency: file.number_of_processes,
        sleepTimeMs: Math.round(file.sleep_time * 1000),
        maxRetries: file.max_retries,
        coordinates: file.coordinates,
      },
      logging: {
        dir: file.logging.dir,
        requestLog: file.logging.request_log,
      },
    };
  }

  getSourcePath(): string {
    return this.sourcePath;
  }
  getConfig(): Config {
    return this.config;
  }
  getServerConfig(): Config["server"] {
    return this.config.server;
  }
  getRunConfig(): Config["run"] {
    return this.config.run;
  }
  getLoggingConfig(): Config["logging"] {
    return this.config.logging;
  }
}
