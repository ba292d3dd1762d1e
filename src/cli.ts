import "dotenv/config";
import { cliParser } from "./utils/cli-parser";
import { commandRegistry } from "./commands/index";
import { configManager } from "./core/config-manager";
import { logger, LogLevel } from "./core/logger";
import { PermissionCommand } from "./commands/gitlab/permission";
import { ItemsCommand } from "./commands/gitlab/items";

const loadConfig = async () => {
  const config = await configManager.load();
  logger.setLogToFile(config.logging.toFile);
  return config;
};

async function main(): Promise<number> {
  const parsed = cliParser.parse(process.argv);
  const verbose = Boolean(parsed.flags.get("verbose") || parsed.flags.get("v"));

  // Informational logs would interleave with command output on stdout.
  logger.setLevel(verbose ? LogLevel.DEBUG : LogLevel.WARN);

  if (parsed.positional.length === 0) {
    commandRegistry.printGlobalHelp();
    return parsed.help ? 0 : 1;
  }

  const success = await commandRegistry.execute(parsed);
  await logger.flush();
  return success ? 0 : 1;
}

commandRegistry.register(new PermissionCommand({ loadConfig }));
commandRegistry.register(new ItemsCommand({ loadConfig }));

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
