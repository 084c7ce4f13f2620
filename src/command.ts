export const USAGE = `Usage: import-latlong -f <file>

Populates latitude and longitude values in the locations table.

Options:
  -f, --file <path>  CSV file containing location information (required)
  -h, --help         Show this help`;

export type Command = { help: true } | { help: false; file: string };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function parseCommand(argv: string[]): Command {
  let file: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "-h" || arg === "--help") {
      return { help: true };
    } else if (arg === "-f" || arg === "--file") {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("-")) {
        throw new UsageError(`${arg} requires a file path`);
      }
      file = value;
      i++;
    } else if (arg.startsWith("--file=")) {
      file = arg.slice("--file=".length);
    } else {
      throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  if (!file) {
    throw new UsageError("Missing required -f/--file option");
  }
  return { help: false, file };
}
