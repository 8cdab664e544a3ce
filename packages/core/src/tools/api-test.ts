/**
 * api_test - send one HTTP request and report status, length and a short
 * body snippet.
 *
 * Requests to blocked hosts (loopback and cloud metadata endpoints by
 * default) are refused before any connection is made. Methods other than
 * GET go through the confirmation gate.
 */

import { z } from "zod";
import { errorMessage, type ITool } from "@ferryman/sdk";
import { defineTool, type ToolArgs } from "./define-tool.js";

export const DEFAULT_BLOCKED_HOSTS: readonly string[] = [
  "localhost",
  "127.0.0.1",
  "0.0.0.0",
  "[::1]",
  "169.254.169.254",
  "metadata.google.internal",
];

export const SNIPPET_LENGTH = 100;
const REQUEST_TIMEOUT_MS = 15_000;

const ApiTestSchema = z.object({
  url: z.string().describe("The URL of the API endpoint to test"),
  method: z.enum(["GET", "POST", "PUT", "DELETE"]).optional().describe("HTTP method to use (default: GET)"),
});

export type ApiTestArgs = ToolArgs<typeof ApiTestSchema.shape>;

export type RequestFn = (url: string, init: { method: string; signal: AbortSignal }) => Promise<Response>;

export interface ApiTestToolOptions {
  /** Hostnames refused outright, compared case-insensitively. */
  blockedHosts?: readonly string[];
  fetch?: RequestFn;
  timeoutMs?: number;
}

export function snippet(body: string): string {
  return body.length > SNIPPET_LENGTH ? `${body.slice(0, SNIPPET_LENGTH)}... [TRUNCATED]` : body;
}

export function createApiTestTool(options: ApiTestToolOptions = {}): ITool<ApiTestArgs> {
  const blocked = new Set((options.blockedHosts ?? DEFAULT_BLOCKED_HOSTS).map((host) => host.toLowerCase()));
  const request: RequestFn = options.fetch ?? ((url, init) => fetch(url, init));
  const timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;

  return defineTool({
    name: "api_test",
    description: "Tests an API endpoint by sending a request",
    schema: ApiTestSchema,
    timeoutMs,
    requiresConfirmation: (args) => (args.method ?? "GET") !== "GET",
    async execute({ url, method = "GET" }) {
      let target: URL;
      try {
        target = new URL(url);
      } catch {
        return `Error: "${url}" is not a valid URL.`;
      }
      if (target.protocol !== "http:" && target.protocol !== "https:") {
        return `Error: Only http and https URLs are supported, got "${target.protocol}".`;
      }
      if (blocked.has(target.hostname.toLowerCase())) {
        return `Error: Access to blocked hostname "${target.hostname}" is restricted.`;
      }

      try {
        const response = await request(target.href, { method, signal: AbortSignal.timeout(timeoutMs) });
        const body = await response.text();
        return `Status: ${response.status}, Length: ${body.length}, Body Snippet: ${snippet(body)}`;
      } catch (err) {
        return `Error testing API: ${errorMessage(err)}`;
      }
    },
  });
}
