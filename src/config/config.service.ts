import { Injectable, Logger } from "@nestjs/common";

export const CONFIG_DEFAULTS = {
  PORT: 3000,
  DIRECTORY_FILE: "./data/directory.json",
  TEAM_LIMIT: 1000,
  UPSTREAM_TIMEOUT: "30s",
  UPSTREAM_TIMEOUT_MS: 30 * 1000,
  // Large-model generation routinely takes tens of seconds
  INFERENCE_TIMEOUT: "120s",
  INFERENCE_TIMEOUT_MS: 120 * 1000,
} as const;

export interface Config {
  port: number;
  directoryFile: string;
  /** When set, tenant credentials are read from this file instead of TENANT_CREDENTIALS */
  credentialsFile: string | undefined;
  teamLimit: number;
  upstreamTimeout: number; // in milliseconds
  inferenceTimeout: number; // in milliseconds
}

@Injectable()
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private readonly config: Config;

  constructor() {
    this.config = {
      port: this.parsePort(),
      directoryFile: process.env["DIRECTORY_FILE"] ?? CONFIG_DEFAULTS.DIRECTORY_FILE,
      credentialsFile: process.env["CREDENTIALS_FILE"] || undefined,
      teamLimit: this.parseTeamLimit(),
      upstreamTimeout: this.parseDuration(
        "UPSTREAM_TIMEOUT",
        CONFIG_DEFAULTS.UPSTREAM_TIMEOUT,
        CONFIG_DEFAULTS.UPSTREAM_TIMEOUT_MS,
      ),
      inferenceTimeout: this.parseDuration(
        "INFERENCE_TIMEOUT",
        CONFIG_DEFAULTS.INFERENCE_TIMEOUT,
        CONFIG_DEFAULTS.INFERENCE_TIMEOUT_MS,
      ),
    };
  }

  get<K extends keyof Config>(key: K): Config[K] {
    return this.config[key];
  }

  private parsePort(): number {
    const port = process.env["PORT"];
    if (!port) return CONFIG_DEFAULTS.PORT;
    const parsed = Number.parseInt(port, 10);
    if (Number.isNaN(parsed)) return CONFIG_DEFAULTS.PORT;
    return parsed;
  }

  private parseTeamLimit(): number {
    const limit = process.env["TEAM_LIMIT"];
    if (!limit) return CONFIG_DEFAULTS.TEAM_LIMIT;
    const parsed = Number.parseInt(limit, 10);
    if (Number.isNaN(parsed) || parsed <= 0) {
      this.logger.warn(`Invalid TEAM_LIMIT: ${limit}, using default ${CONFIG_DEFAULTS.TEAM_LIMIT}`);
      return CONFIG_DEFAULTS.TEAM_LIMIT;
    }
    return parsed;
  }

  private parseDuration(envKey: string, defaultValue: string, defaultMs: number): number {
    const value = process.env[envKey] ?? defaultValue;
    const match = value.match(/^(\d+)(s|m|h|d)$/);
    if (!match) {
      this.logger.warn(`Invalid ${envKey} format: ${value}, using default ${defaultValue}`);
      return defaultMs;
    }
    const num = Number.parseInt(match[1] ?? "0", 10);
    const unit = match[2];
    switch (unit) {
      case "s":
        return num * 1000;
      case "m":
        return num * 60 * 1000;
      case "h":
        return num * 60 * 60 * 1000;
      case "d":
        return num * 24 * 60 * 60 * 1000;
      default:
        return defaultMs;
    }
  }
}
