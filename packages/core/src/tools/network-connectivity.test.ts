import { describe, it, expect, vi } from "vitest";
import { DEFAULT_PROBE_HOST, activeInterfaces, createNetworkConnectivityTool } from "./network-connectivity.js";

const loopbackOnly = { lo: [{ internal: true }] };
const wired = { lo: [{ internal: true }], wlan0: [{ internal: false }], eth0: [{ internal: false }] };

describe("activeInterfaces", () => {
  it("lists interfaces with an external address, sorted", () => {
    expect(activeInterfaces(wired)).toEqual(["eth0", "wlan0"]);
    expect(activeInterfaces({ ...loopbackOnly, down: undefined })).toEqual([]);
  });
});

describe("network_connectivity tool", () => {
  it("reports internet access when the probe host resolves", async () => {
    const resolve = vi.fn(async () => ({ address: "192.0.2.1", family: 4 }));
    const tool = createNetworkConnectivityTool({ interfaces: () => wired, resolve });

    await expect(tool.execute({})).resolves.toBe("Connectivity status: eth0, wlan0. Internet available: true");
    expect(resolve).toHaveBeenCalledWith(DEFAULT_PROBE_HOST);
  });

  it("reports the lookup failure when the probe host does not resolve", async () => {
    const tool = createNetworkConnectivityTool({
      interfaces: () => wired,
      probeHost: "probe.example.org",
      resolve: async () => {
        throw new Error("getaddrinfo ENOTFOUND probe.example.org");
      },
    });

    await expect(tool.execute({})).resolves.toBe(
      "Connectivity status: eth0, wlan0. Internet available: false (probe.example.org: getaddrinfo ENOTFOUND probe.example.org)",
    );
  });

  it("skips the lookup without an external interface", async () => {
    const resolve = vi.fn(async () => ({}));
    const tool = createNetworkConnectivityTool({ interfaces: () => loopbackOnly, resolve });

    await expect(tool.execute({})).resolves.toBe("Connectivity status: none. Internet available: false");
    expect(resolve).not.toHaveBeenCalled();
  });
});
