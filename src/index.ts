import "dotenv/config";
import { FacadeServer } from "./api/server";
import { configManager } from "./core/config-manager";
import { logger, toLogLevel } from "./core/logger";
import { GitLabService } from "./services/gitlab.service";
import { ItemService } from "./services/item.service";
import { PermissionService } from "./services/permission.service";

async function main(): Promise<void> {
  const config = await configManager.load();
  logger.setLevel(toLogLevel(config.logging.level));
  logger.setLogToFile(config.logging.toFile);
  logger.info("Configuration loaded", { gitlab: config.gitlab.host, port: config.server.port });

  // One client for the whole process; requests share its connections.
  const gitlab = new GitLabService(config.gitlab);

  const server = new FacadeServer({
    permissions: new PermissionService(gitlab),
    items: new ItemService(gitlab, {
      perPage: config.gitlab.perPage,
      minYear: config.items.minYear,
    }),
    version: config.version,
  });

  await server.start(config.server.port, config.server.host);

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`${signal} received, shutting down`);
    await server.stop();
    await logger.flush();
    process.exit(0);
  };

  process.once("SIGTERM", () => {
    shutdown("SIGTERM").catch((err: unknown) => {
      logger.error("Shutdown failed", err);
      process.exit(1);
    });
  });
  process.once("SIGINT", () => {
    shutdown("SIGINT").catch((err: unknown) => {
      logger.error("Shutdown failed", err);
      process.exit(1);
    });
  });
}

main().catch((error: unknown) => {
  logger.error("Fatal error starting gitlab-facade", error);
  process.exit(1);
});
