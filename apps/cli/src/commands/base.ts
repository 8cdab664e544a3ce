/**
 * Contract shared by every `ferryman` subcommand.
 */

export interface ParsedArgs {
  /** First non-flag argument, or "" when none was given. */
  command: string;
  flags: Record<string, string | boolean>;
  positional: string[];
}

export interface CliCommand {
  name: string;
  description: string;
  /** Resolves to the process exit code. */
  execute(args: ParsedArgs): Promise<number>;
}

/** Read a flag that must carry a value; a bare `--flag` counts as absent. */
export function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags[name];
  return typeof value === "string" ? value : undefined;
}
