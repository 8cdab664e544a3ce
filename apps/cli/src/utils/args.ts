import type { ParsedArgs } from "../commands/base.js";

/**
 * Split argv into a command, flags and positional arguments.
 *
 *   parseArgs(["chat", "--config", "./ferryman.json", "--resume"])
 *     → { command: "chat", flags: { config: "./ferryman.json", resume: true }, positional: [] }
 *
 * `--key=value` and `--key value` both set a string flag. A flag followed by
 * another flag, or by nothing, is boolean. `-x` is always boolean.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];
  let command = "";

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith("--")) {
      const body = arg.slice(2);
      const eq = body.indexOf("=");
      if (eq >= 0) {
        flags[body.slice(0, eq)] = body.slice(eq + 1);
        continue;
      }
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith("-")) {
        flags[body] = next;
        i++;
      } else {
        flags[body] = true;
      }
      continue;
    }

    if (arg.startsWith("-") && arg.length === 2) {
      flags[arg.slice(1)] = true;
      continue;
    }

    if (!command) {
      command = arg;
    } else {
      positional.push(arg);
    }
  }

  return { command, flags, positional };
}
