import { z } from "zod";
import { ToolExecutionError, type ITool } from "@ferryman/sdk";
import { validateInput } from "@ferryman/shared";

export const TRANSFER_TOOL_NAME = "transfer_to_agent";

const TransferArgsSchema = z.object({
  target_agent: z.string().min(1),
  reason: z.string(),
});

export type TransferArgs = z.infer<typeof TransferArgsSchema>;

export interface TransferTarget {
  /** Names of every agent that may take over, in registration order. */
  agentNames(): string[];
  /** Record the transfer; returns false when no agent has that name. */
  requestTransfer(target: string, reason: string): boolean;
}

/**
 * The handoff tool injected into every coordinated agent. It only records
 * the request; the coordinator switches agents once the current run ends.
 */
export function createTransferTool(target: TransferTarget): ITool<TransferArgs> {
  return {
    name: TRANSFER_TOOL_NAME,
    description:
      "Transfer the conversation to another specialized agent. Only do this if the user request requires the specific expertise of the other agent.",

    // Read on every access so the enum follows the coordinator's agent list.
    get parameters() {
      return {
        type: "object" as const,
        properties: {
          target_agent: {
            type: "string",
            description: "The exact name of the agent to transfer to.",
            enum: target.agentNames(),
          },
          reason: {
            type: "string",
            description: "Reason for transfer so the next agent understands context.",
          },
        },
        required: ["target_agent", "reason"],
      };
    },

    parseArgs(raw: Record<string, unknown>): TransferArgs {
      const result = validateInput(TransferArgsSchema, raw);
      if (!result.success) {
        throw new ToolExecutionError(TRANSFER_TOOL_NAME, `invalid arguments: ${result.error}`);
      }
      return result.data;
    },

    async execute({ target_agent, reason }: TransferArgs): Promise<string> {
      if (!target.requestTransfer(target_agent, reason)) {
        return `Error: Agent "${target_agent}" not found. Available agents: ${target.agentNames().join(", ")}`;
      }
      return `SUCCESS. You have transferred control to ${target_agent}. Stop responding and let the new agent take over for the next request. Reason provided: ${reason}`;
    },
  };
}
