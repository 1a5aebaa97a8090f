export interface CliArgs {
  /** Directory to serve, as given. Resolved against the cwd by the caller. */
  root: string;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE = "Usage: dirhost [directory]";

/**
 * The CLI takes a single optional directory and nothing else; the listen
 * address and limits are fixed by `defaultConfig`.
 */
export function parseArgs(args: string[]): CliArgs {
  const positionals: string[] = [];
  for (const arg of args) {
    if (arg.startsWith("-") && arg !== "-") {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
    positionals.push(arg);
  }

  if (positionals.length > 1) {
    throw new CliUsageError(`Expected at most one directory, got ${positionals.length}`);
  }

  return { root: positionals[0] ?? "." };
}
