import type { Command } from "./command.interface";
import type { ParsedArgs } from "../utils/cli-parser";
import type { CommandOutput } from "../types/command-output";
import { error } from "../core/colors";
import { outputFormatter } from "../core/output-formatter";

export type Printer = (line: string) => void;

export class CommandRegistry {
  private commands: Map<string, Command> = new Map();

  constructor(private readonly print: Printer = (line) => console.log(line)) {}

  register(command: Command): void {
    this.commands.set(command.name, command);
  }

  get(name: string): Command | undefined {
    return this.commands.get(name);
  }

  getAll(): Command[] {
    return Array.from(this.commands.values());
  }

  getByCategory(category: string): Command[] {
    return this.getAll().filter((cmd) => (cmd.category || "General") === category);
  }

  /** Runs the matching command and reports whether it succeeded. */
  async execute(parsed: ParsedArgs): Promise<boolean> {
    const match = this.resolveCommand(parsed);

    if (!match) {
      this.print(error(`Unknown command: ${parsed.positional[0] || ""}`));
      this.printGlobalHelp();
      return false;
    }

    const { command } = match;
    if (parsed.help) {
      this.print(command.printHelp?.() || `${command.name}: ${command.description}`);
      return true;
    }

    let output: CommandOutput;
    try {
      output = await command.execute(match.parsed);
    } catch (err) {
      output = {
        success: false,
        code: "InternalError",
        message: err instanceof Error ? err.message : String(err),
      };
    }

    this.print(outputFormatter.format(output, parsed.json));
    return output.success;
  }

  private resolveCommand(
    parsed: ParsedArgs
  ): { command: Command; parsed: ParsedArgs } | null {
    if (parsed.positional.length === 0) {
      return null;
    }

    const candidates = this.getAll()
      .map((cmd) => ({ cmd, tokens: cmd.name.split(" ") }))
      .sort((a, b) => b.tokens.length - a.tokens.length);

    for (const candidate of candidates) {
      const tokens = candidate.tokens;
      const matches = tokens.every((token, index) => parsed.positional[index] === token);
      if (matches) {
        const trimmed: ParsedArgs = {
          ...parsed,
          positional: parsed.positional.slice(tokens.length),
        };
        return { command: candidate.cmd, parsed: trimmed };
      }
    }

    return null;
  }

  printGlobalHelp(): void {
    this.print("\ngitlab-facade - manage GitLab memberships and list issues or merge requests by year\n");
    this.print("Usage: gitlab-facade <command> [options]\n");
    this.print("Commands:");

    const categories = new Set(this.getAll().map((cmd) => cmd.category || "General"));

    categories.forEach((category) => {
      this.print(`\n  ${category}:`);
      this.getByCategory(category).forEach((cmd) => {
        this.print(`    ${cmd.name.padEnd(20)} ${cmd.description}`);
      });
    });

    this.print("\nGlobal Options:");
    this.print("  --json               Output JSON format");
    this.print("  --verbose, -v        Debug logging");
    this.print("  --help, -h           Show help for command\n");
  }
}

export const commandRegistry = new CommandRegistry();
