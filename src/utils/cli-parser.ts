export interface ParsedArgs {
  flags: Map<string, boolean>;
  options: Map<string, string>;
  positional: string[];
  json: boolean;
  help: boolean;
}

export class CLIParser {
  /** Flags that never take a value, so `--verbose items` keeps `items` positional. */
  constructor(private readonly booleanFlags: ReadonlySet<string> = new Set(["verbose", "v"])) {}

  parse(argv: string[]): ParsedArgs {
    const args = argv.slice(2);

    const result: ParsedArgs = {
      flags: new Map(),
      options: new Map(),
      positional: [],
      json: false,
      help: false,
    };

    let i = 0;
    while (i < args.length) {
      const arg = args[i] ?? "";

      if (arg === "--json") {
        result.json = true;
      } else if (arg === "--help" || arg === "-h") {
        result.help = true;
      } else if (arg.startsWith("-")) {
        const key = arg.replace(/^--?/, "");
        const eq = key.indexOf("=");
        const nextArg = args[i + 1];

        if (eq > 0) {
          result.options.set(key.slice(0, eq), key.slice(eq + 1));
        } else if (this.booleanFlags.has(key)) {
          result.flags.set(key, true);
        } else if (nextArg !== undefined && !nextArg.startsWith("-")) {
          result.options.set(key, nextArg);
          i++;
        } else {
          result.flags.set(key, true);
        }
      } else {
        result.positional.push(arg);
      }

      i++;
    }

    return result;
  }
}

export const cliParser = new CLIParser();
