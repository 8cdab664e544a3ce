/**
 * Chat command - interactive REPL against one agent.
 *
 *   ferryman chat [--config <path>] [--resume]
 *
 * Ctrl-C cancels the turn in flight; with no turn running it ends the
 * session. `/clear` forgets the conversation, `/exit` quits.
 */

import { createInterface } from "node:readline";
import {
  CancellationToken,
  CancelledError,
  ConfigError,
  errorMessage,
  type AgentStateCheckpoint,
  type LlmClient,
} from "@ferryman/sdk";
import { createLogger, type Logger, type ProviderConfig } from "@ferryman/shared";
import type { CliCommand, ParsedArgs } from "./base.js";
import { stringFlag } from "./base.js";
import { loadRuntimeConfig } from "../utils/config-loader.js";
import { createRuntime, type Runtime } from "../runtime.js";

export const PROMPT = "> ";

/** Registers an interrupt handler and returns the function that removes it. */
export type InterruptHook = (handler: () => void) => () => void;

export interface ChatCommandDeps {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  errorOutput?: NodeJS.WritableStream;
  env?: Record<string, string | undefined>;
  createClient?: (config: ProviderConfig) => LlmClient;
  logger?: Logger;
  onInterrupt?: InterruptHook;
}

const processInterrupt: InterruptHook = (handler) => {
  process.on("SIGINT", handler);
  return () => {
    process.off("SIGINT", handler);
  };
};

export class ChatCommand implements CliCommand {
  name = "chat";
  description = "Chat with an agent interactively";

  private current: CancellationToken | undefined;

  constructor(private readonly deps: ChatCommandDeps = {}) {}

  async execute(args: ParsedArgs): Promise<number> {
    const output = this.deps.output ?? process.stdout;
    const errorOutput = this.deps.errorOutput ?? process.stderr;
    // Warnings only unless LOG_LEVEL is set.
    const logger = this.deps.logger ?? createLogger("cli", process.env.LOG_LEVEL ? {} : { level: "warn" });

    let runtime: Runtime;
    try {
      const config = await loadRuntimeConfig({ configPath: stringFlag(args, "config"), env: this.deps.env });
      runtime = await createRuntime(config, {
        createClient: this.deps.createClient,
        logger,
      });
    } catch (err) {
      if (err instanceof ConfigError) {
        errorOutput.write(`[cli] ${err.message}\n`);
        return 1;
      }
      throw err;
    }

    const { config, agent, memory, client } = runtime;
    output.write(
      `Chatting with ${agent.name} (${config.provider.provider}/${config.provider.model}). Type /exit to quit, /clear to reset.\n`,
    );

    const rl = createInterface({ input: this.deps.input ?? process.stdin, terminal: false });
    // Created up front so lines typed during a resumed turn are buffered.
    const lines = rl[Symbol.asyncIterator]();
    const removeInterrupt = (this.deps.onInterrupt ?? processInterrupt)(() => {
      if (this.current) {
        this.current.cancel();
      } else {
        rl.close();
      }
    });

    try {
      if (args.flags.resume === true) {
        const checkpoint = await memory.loadCheckpoint();
        if (checkpoint) {
          output.write("Resuming interrupted run...\n");
          await this.runTurn(runtime, "", checkpoint, output, errorOutput);
        } else {
          output.write("No interrupted run to resume.\n");
        }
      }

      output.write(PROMPT);
      while (true) {
        const next = await lines.next();
        if (next.done) break;
        const input = next.value.trim();
        if (input === "/exit") break;

        if (input === "/clear") {
          await memory.clear();
          await memory.clearCheckpoint();
          output.write("Conversation cleared.\n");
        } else if (input !== "") {
          await this.runTurn(runtime, input, undefined, output, errorOutput);
        }
        output.write(PROMPT);
      }
      return 0;
    } finally {
      removeInterrupt();
      rl.close();
      client.close();
    }
  }

  private async runTurn(
    runtime: Runtime,
    prompt: string,
    resumeFrom: AgentStateCheckpoint | undefined,
    output: NodeJS.WritableStream,
    errorOutput: NodeJS.WritableStream,
  ): Promise<void> {
    const token = new CancellationToken();
    this.current = token;
    const options = { cancellation: token, resumeFrom };
    let lineOpen = false;

    try {
      if (!runtime.config.agent.streaming) {
        const final = await runtime.agent.run(prompt, options);
        output.write(`${final.text}\n`);
        return;
      }

      for await (const item of runtime.agent.runStreaming(prompt, options)) {
        switch (item.type) {
          case "text_delta":
            output.write(item.text);
            lineOpen = true;
            break;
          case "tool_calls":
            if (lineOpen) output.write("\n");
            output.write(`[tool] ${item.toolCalls.map((call) => call.name).join(", ")}\n`);
            lineOpen = false;
            break;
          case "final":
            // Streamed text is already on screen; only the fallback answer arrives here alone.
            output.write(lineOpen ? "\n" : `${item.text}\n`);
            lineOpen = false;
            break;
          case "usage":
            break;
        }
      }
    } catch (err) {
      if (lineOpen) output.write("\n");
      if (err instanceof CancelledError) {
        output.write("[cancelled]\n");
      } else {
        errorOutput.write(`Error: ${errorMessage(err)}\n`);
      }
    } finally {
      this.current = undefined;
    }
  }
}
