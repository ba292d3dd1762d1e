import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import { existsSync } from "node:fs";
import { DEFAULT_CONFIG, TOKEN_PLACEHOLDER } from "../models/config";
import type { AppConfig, LogLevelName } from "../models/config";
import { ConfigError } from "./errors";
import { isLogLevelName } from "./logger";
import { isRecord } from "../utils/validation";

const CONFIG_DIR = join(homedir(), ".gitlab-facade");
const CONFIG_FILE = join(CONFIG_DIR, "config.json");

export interface ConfigManagerOptions {
  env?: NodeJS.ProcessEnv;
  /** Overrides both GITLAB_FACADE_CONFIG and the file in the home directory. */
  configFile?: string;
  /** Use defaults and environment only. */
  skipFile?: boolean;
}

type RawSection = Record<string, unknown>;

const section = (raw: RawSection, key: string): RawSection => {
  const value = raw[key];
  return isRecord(value) ? value : {};
};

const stringOr = (value: unknown, fallback: string): string =>
  typeof value === "string" ? value : fallback;

const numberOr = (value: unknown, fallback: number): number =>
  typeof value === "number" ? value : fallback;

const booleanOr = (value: unknown, fallback: boolean): boolean =>
  typeof value === "boolean" ? value : fallback;

const parseInteger = (name: string, value: string): number => {
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(`${name} must be a positive integer, got '${value}'`);
  }
  return parseInt(value, 10);
};

const parseBoolean = (value: string): boolean => ["1", "true", "yes"].includes(value.trim().toLowerCase());

export class ConfigManager {
  private config: Readonly<AppConfig> | null = null;

  constructor(private readonly options: ConfigManagerOptions = {}) {}

  async load(): Promise<Readonly<AppConfig>> {
    if (this.config) {
      return this.config;
    }

    const env = this.options.env ?? process.env;
    const fileConfig = await this.readConfigFile();
    const merged = this.applyEnv(this.mergeConfig(fileConfig, DEFAULT_CONFIG), env);
    merged.gitlab.host = merged.gitlab.host.trim().replace(/\/+$/, "");
    this.validateConfig(merged);

    this.config = Object.freeze({
      version: merged.version,
      gitlab: Object.freeze({ ...merged.gitlab }),
      server: Object.freeze({ ...merged.server }),
      items: Object.freeze({ ...merged.items }),
      logging: Object.freeze({ ...merged.logging }),
    });
    return this.config;
  }

  getConfigPath(): string {
    const env = this.options.env ?? process.env;
    return this.options.configFile ?? env.GITLAB_FACADE_CONFIG ?? CONFIG_FILE;
  }

  getConfig(): Readonly<AppConfig> {
    if (!this.config) {
      throw new Error("Config not loaded. Call load() first.");
    }
    return this.config;
  }

  private async readConfigFile(): Promise<RawSection> {
    if (this.options.skipFile) {
      return {};
    }

    const path = this.getConfigPath();
    const explicit = path !== CONFIG_FILE;

    if (!existsSync(path)) {
      if (explicit) {
        throw new ConfigError(`Config file not found: ${path}`);
      }
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(path, "utf-8"));
    } catch (err) {
      throw new ConfigError(
        `Failed to read config file ${path}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file ${path} must contain a JSON object`);
    }
    return parsed;
  }

  private mergeConfig(config: RawSection, defaults: AppConfig): AppConfig {
    const gitlab = section(config, "gitlab");
    const server = section(config, "server");
    const items = section(config, "items");
    const logging = section(config, "logging");
    const level = stringOr(logging.level, defaults.logging.level);

    return {
      version: stringOr(config.version, defaults.version),
      gitlab: {
        host: stringOr(gitlab.host, defaults.gitlab.host),
        token: stringOr(gitlab.token, defaults.gitlab.token),
        timeoutMs: numberOr(gitlab.timeoutMs, defaults.gitlab.timeoutMs),
        perPage: numberOr(gitlab.perPage, defaults.gitlab.perPage),
      },
      server: {
        host: stringOr(server.host, defaults.server.host),
        port: numberOr(server.port, defaults.server.port),
      },
      items: {
        minYear: numberOr(items.minYear, defaults.items.minYear),
      },
      logging: {
        level: this.toLevel(level, "logging.level"),
        toFile: booleanOr(logging.toFile, defaults.logging.toFile),
      },
    };
  }

  private applyEnv(config: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
    const next: AppConfig = {
      ...config,
      gitlab: { ...config.gitlab },
      server: { ...config.server },
      items: { ...config.items },
      logging: { ...config.logging },
    };

    if (env.GITLAB_URL) next.gitlab.host = env.GITLAB_URL;
    if (env.GITLAB_TOKEN) next.gitlab.token = env.GITLAB_TOKEN;
    if (env.GITLAB_TIMEOUT_MS) next.gitlab.timeoutMs = parseInteger("GITLAB_TIMEOUT_MS", env.GITLAB_TIMEOUT_MS);
    if (env.GITLAB_PER_PAGE) next.gitlab.perPage = parseInteger("GITLAB_PER_PAGE", env.GITLAB_PER_PAGE);
    if (env.HOST) next.server.host = env.HOST;
    if (env.PORT) next.server.port = parseInteger("PORT", env.PORT);
    if (env.ITEMS_MIN_YEAR) next.items.minYear = parseInteger("ITEMS_MIN_YEAR", env.ITEMS_MIN_YEAR);
    if (env.LOG_LEVEL) next.logging.level = this.toLevel(env.LOG_LEVEL.toLowerCase(), "LOG_LEVEL");
    if (env.LOG_TO_FILE) next.logging.toFile = parseBoolean(env.LOG_TO_FILE);

    return next;
  }

  private toLevel(value: string, source: string): LogLevelName {
    if (!isLogLevelName(value)) {
      throw new ConfigError(`${source} must be one of debug, info, warn, error, got '${value}'`);
    }
    return value;
  }

  private validateConfig(config: AppConfig): void {
    if (!config.gitlab.host) {
      throw new ConfigError("GitLab host is required");
    }
    let url: URL;
    try {
      url = new URL(config.gitlab.host);
    } catch {
      throw new ConfigError(`GitLab host is not a valid URL: ${config.gitlab.host}`);
    }
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      throw new ConfigError(`GitLab host must use http or https: ${config.gitlab.host}`);
    }
    if (!config.gitlab.token.trim() || config.gitlab.token === TOKEN_PLACEHOLDER) {
      throw new ConfigError(
        `GitLab token is not configured. Set GITLAB_TOKEN or edit ${this.getConfigPath()}`,
      );
    }
    if (!Number.isInteger(config.gitlab.timeoutMs) || config.gitlab.timeoutMs <= 0) {
      throw new ConfigError("gitlab.timeoutMs must be a positive integer");
    }
    if (!Number.isInteger(config.gitlab.perPage) || config.gitlab.perPage < 1 || config.gitlab.perPage > 100) {
      throw new ConfigError("gitlab.perPage must be an integer between 1 and 100");
    }
    if (!Number.isInteger(config.server.port) || config.server.port < 1 || config.server.port > 65535) {
      throw new ConfigError(`Invalid port: ${config.server.port}`);
    }
    if (!Number.isInteger(config.items.minYear) || config.items.minYear < 1000 || config.items.minYear > 9999) {
      throw new ConfigError("items.minYear must be a 4-digit year");
    }
  }
}

export const configManager = new ConfigManager();
