export { ChatCommand, PROMPT } from "./commands/chat.js";
export type { ChatCommandDeps, InterruptHook } from "./commands/chat.js";
export { VersionCommand, readVersion } from "./commands/version.js";
export type { CliCommand, ParsedArgs } from "./commands/base.js";
export { parseArgs } from "./utils/args.js";
export { loadRuntimeConfig, providerOverrides, ENV_KEYS } from "./utils/config-loader.js";
export type { LoadConfigOptions } from "./utils/config-loader.js";
export { createRuntime } from "./runtime.js";
export type { Runtime, RuntimeDeps } from "./runtime.js";
