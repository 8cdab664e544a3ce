/**
 * Version command - print the CLI version.
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { errorMessage } from "@ferryman/sdk";
import { isPlainObject } from "@ferryman/shared";
import type { CliCommand, ParsedArgs } from "./base.js";

const PACKAGE_JSON = fileURLToPath(new URL("../../package.json", import.meta.url));

export async function readVersion(path: string = PACKAGE_JSON): Promise<string> {
  const pkg: unknown = JSON.parse(await readFile(path, "utf-8"));
  if (!isPlainObject(pkg) || typeof pkg.version !== "string") {
    throw new Error(`No version field in ${path}`);
  }
  return pkg.version;
}

export class VersionCommand implements CliCommand {
  name = "version";
  description = "Display version information";

  constructor(private readonly output: NodeJS.WritableStream = process.stdout) {}

  async execute(args: ParsedArgs): Promise<number> {
    try {
      this.output.write(`ferryman v${await readVersion()}\n`);
      if (args.flags.verbose === true) {
        this.output.write(`Node.js ${process.version}\n`);
        this.output.write(`Platform: ${process.platform} ${process.arch}\n`);
      }
      return 0;
    } catch (err) {
      process.stderr.write(`Failed to read version information: ${errorMessage(err)}\n`);
      return 1;
    }
  }
}
