/**
 * Tolerant decoding of model-produced tool arguments.
 *
 * Models wrap JSON in markdown fences or surround it with prose. Decoding
 * tries the raw text, then the fenced body, then the outermost `{...}` span.
 */

import type { ToolArguments } from "@ferryman/sdk";

const FENCE_PATTERN = /```(?:[a-zA-Z]+)?\s*([\s\S]*?)```/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function tryParseObject(text: string): Record<string, unknown> | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    return isPlainObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

function outermostBraces(text: string): string | undefined {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  return start >= 0 && end > start ? text.slice(start, end + 1) : undefined;
}

export function decodeToolArguments(raw: string): ToolArguments {
  const trimmed = raw.trim();
  if (trimmed === "") {
    return { kind: "parsed", value: {} };
  }

  const direct = tryParseObject(trimmed);
  if (direct) return { kind: "parsed", value: direct };

  const fenced = FENCE_PATTERN.exec(trimmed)?.[1];
  for (const candidate of [fenced, trimmed]) {
    if (candidate === undefined) continue;
    const span = outermostBraces(candidate);
    const value = span === undefined ? undefined : tryParseObject(span);
    if (value) return { kind: "parsed", value };
  }

  return { kind: "malformed", raw, value: {} };
}

/** Parse a JSON object, or return `{}` when the text is not one. */
export function parseJsonObject(text: string): Record<string, unknown> {
  return tryParseObject(text) ?? {};
}

export { isPlainObject };
