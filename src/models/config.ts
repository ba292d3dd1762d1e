export type LogLevelName = "debug" | "info" | "warn" | "error";

export interface AppConfig {
  version: string;
  gitlab: GitLabConfig;
  server: ServerConfig;
  items: ItemsConfig;
  logging: LoggingConfig;
}

export interface GitLabConfig {
  host: string;
  token: string;
  /** Per-call timeout against the GitLab API, in milliseconds. */
  timeoutMs: number;
  perPage: number;
}

export interface ServerConfig {
  host: string;
  port: number;
}

export interface ItemsConfig {
  minYear: number;
}

export interface LoggingConfig {
  level: LogLevelName;
  toFile: boolean;
}

export const TOKEN_PLACEHOLDER = "YOUR_PERSONAL_ACCESS_TOKEN_HERE";

export const DEFAULT_CONFIG: AppConfig = {
  version: "1.0.0",
  gitlab: {
    host: "https://gitlab.com",
    token: TOKEN_PLACEHOLDER,
    timeoutMs: 10000,
    perPage: 100,
  },
  server: {
    host: "0.0.0.0",
    port: 5000,
  },
  items: {
    minYear: 2010,
  },
  logging: {
    level: "info",
    toFile: false,
  },
};
