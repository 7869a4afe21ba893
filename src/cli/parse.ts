export type Command = "ingest" | "ask" | "stats";

const COMMANDS: Command[] = ["ingest", "ask", "stats"];

/** Flags that take a value; every other flag is a boolean switch. */
const VALUE_FLAGS = new Set(["catalog", "dir", "urls"]);

export const USAGE = `Usage:
  sermon-qa ingest [--catalog <file>] [--dir <folder>] [--urls <file>] [--force] [--watch]
  sermon-qa ask <question>
  sermon-qa stats`;

export interface ParsedCli {
  command: Command;
  args: string[];
  flags: Record<string, string | true>;
}

function isCommand(value: string | undefined): value is Command {
  return value !== undefined && (COMMANDS as string[]).includes(value);
}

export function parseCli(argv: string[]): ParsedCli {
  const [, , command, ...rest] = argv;
  if (!isCommand(command)) {
    throw new Error(USAGE);
  }

  const args: string[] = [];
  const flags: Record<string, string | true> = {};
  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    if (!token.startsWith("--")) {
      args.push(token);
      continue;
    }
    const name = token.slice(2);
    if (VALUE_FLAGS.has(name)) {
      const value = rest[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new Error(`--${name} requires a value\n${USAGE}`);
      }
      flags[name] = value;
      i++;
    } else {
      flags[name] = true;
    }
  }
  return { command, args, flags };
}
