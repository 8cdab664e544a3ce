#!/usr/bin/env -S node --import tsx

/**
 * ferryman CLI entry point.
 *
 *   ferryman chat [--config <path>] [--resume]
 *   ferryman version [--verbose]
 *   ferryman (no args) → chat
 */

import { parseArgs } from "./utils/args.js";
import { ChatCommand } from "./commands/chat.js";
import { VersionCommand } from "./commands/version.js";
import type { CliCommand } from "./commands/base.js";

const HELP = `ferryman - LLM agent runtime

Usage: ferryman <command> [options]

Commands:
  chat       Chat with an agent (default)
  version    Show version information

Options:
  --config <path>  JSON configuration file
  --resume         Continue an interrupted run (chat)
  --verbose        Show detailed output (version)
  --help, -h       Show this help message

Environment:
  FERRYMAN_PROVIDER, FERRYMAN_API_KEY, FERRYMAN_MODEL, FERRYMAN_BASE_URL
  override the provider section of the configuration.
  LOG_LEVEL and LOG_FORMAT control diagnostics on stderr.
`;

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));

  if (parsed.flags.help === true || parsed.flags.h === true) {
    process.stdout.write(HELP);
    return 0;
  }

  const commands: CliCommand[] = [new ChatCommand(), new VersionCommand()];
  const name = parsed.command || "chat";
  const command = commands.find((cmd) => cmd.name === name);
  if (!command) {
    process.stderr.write(`Unknown command: ${parsed.command}\n`);
    process.stderr.write(`Available commands: ${commands.map((cmd) => cmd.name).join(", ")}\n`);
    return 1;
  }
  return command.execute(parsed);
}

main()
  .then((exitCode) => process.exit(exitCode))
  .catch((err: unknown) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
