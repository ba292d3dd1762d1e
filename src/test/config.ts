import type { AppConfig } from "../models/config";

export const testConfig: Readonly<AppConfig> = Object.freeze<AppConfig>({
  version: "0.0.0-test",
  gitlab: { host: "https://gitlab.example.com", token: "test-token", timeoutMs: 1000, perPage: 100 },
  server: { host: "127.0.0.1", port: 5000 },
  items: { minYear: 2010 },
  logging: { level: "error", toFile: false },
});
