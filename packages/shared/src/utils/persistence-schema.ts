/**
 * Schemas for data read back from storage. Stored files are untrusted input.
 */

import { z } from "zod";

export const ToolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  arguments: z.string(),
});

export const StoredMessageSchema = z.object({
  role: z.enum(["system", "user", "assistant", "tool"]),
  content: z.string(),
  isSummary: z.boolean(),
  toolCallId: z.string().optional(),
  toolCalls: z.array(ToolCallSchema).optional(),
});

export const AgentStateCheckpointSchema = z.object({
  isRunning: z.boolean(),
  currentStep: z.string(),
  iterationCount: z.number().int().nonnegative(),
  errorMessage: z.string().optional(),
  timestamp: z.string(),
});
