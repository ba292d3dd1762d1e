import type { Command } from "./command.interface";
import type { ParsedArgs } from "../utils/cli-parser";
import type { CommandOutput } from "../types/command-output";
import { buildErrorOutput } from "../core/command-output-helpers";
import { logger } from "../core/logger";

export abstract class BaseCommand implements Command {
  abstract name: string;
  abstract description: string;
  category?: string;

  protected abstract executeInternal(args: ParsedArgs): Promise<CommandOutput>;

  async execute(args: ParsedArgs): Promise<CommandOutput> {
    const startTime = Date.now();

    try {
      const output = await this.executeInternal(args);
      logger.debug(`${this.name} finished`, {
        success: output.success,
        durationMs: Date.now() - startTime,
      });
      return output;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.debug(`${this.name} failed`, {
        error: error.message,
        durationMs: Date.now() - startTime,
      });
      return buildErrorOutput(error);
    }
  }

  printHelp(): string {
    let help = `\n${this.name}\n`;
    help += `${"=".repeat(this.name.length)}\n`;
    help += `${this.description}\n\n`;
    help += `Usage: gitlab-facade ${this.name} [options]\n\n`;

    return help;
  }
}
