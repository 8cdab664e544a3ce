import { lookup } from "node:dns/promises";
import { networkInterfaces } from "node:os";
import { z } from "zod";
import { errorMessage, type ITool } from "@ferryman/sdk";
import { defineTool, type ToolArgs } from "./define-tool.js";

export const DEFAULT_PROBE_HOST = "example.com";

const NetworkConnectivitySchema = z.object({});

export type NetworkConnectivityArgs = ToolArgs<typeof NetworkConnectivitySchema.shape>;

export interface InterfaceAddress {
  internal: boolean;
}

export interface NetworkConnectivityOptions {
  /** Interface name to addresses, shaped like `os.networkInterfaces()`. */
  interfaces?: () => Record<string, InterfaceAddress[] | undefined>;
  /** Resolves when `host` has an address. */
  resolve?: (host: string) => Promise<unknown>;
  probeHost?: string;
  timeoutMs?: number;
}

/** Names of interfaces with at least one external address, sorted. */
export function activeInterfaces(all: Record<string, InterfaceAddress[] | undefined>): string[] {
  return Object.entries(all)
    .filter(([, addresses]) => addresses?.some((address) => !address.internal))
    .map(([name]) => name)
    .sort();
}

/**
 * Internet availability is judged by resolving a well-known host name;
 * the interface list only describes the local side.
 */
export function createNetworkConnectivityTool(options: NetworkConnectivityOptions = {}): ITool<NetworkConnectivityArgs> {
  const listInterfaces = options.interfaces ?? networkInterfaces;
  const resolveHost = options.resolve ?? lookup;
  const probeHost = options.probeHost ?? DEFAULT_PROBE_HOST;

  return defineTool({
    name: "network_connectivity",
    description: "Checks the current network connectivity status",
    schema: NetworkConnectivitySchema,
    timeoutMs: options.timeoutMs ?? 10_000,
    async execute() {
      const active = activeInterfaces(listInterfaces());
      const status = active.length > 0 ? active.join(", ") : "none";

      let internet = false;
      let detail = "";
      if (active.length > 0) {
        try {
          await resolveHost(probeHost);
          internet = true;
        } catch (err) {
          detail = ` (${probeHost}: ${errorMessage(err)})`;
        }
      }
      return `Connectivity status: ${status}. Internet available: ${internet}${detail}`;
    },
  });
}
