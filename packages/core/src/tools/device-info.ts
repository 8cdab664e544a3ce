import { arch, cpus, platform, release, totalmem } from "node:os";
import { z } from "zod";
import type { ITool } from "@ferryman/sdk";
import { defineTool, type ToolArgs } from "./define-tool.js";

const DeviceInfoSchema = z.object({});

export type DeviceInfoArgs = ToolArgs<typeof DeviceInfoSchema.shape>;

export interface DeviceInfo {
  platform: string;
  release: string;
  arch: string;
  cpuCount: number;
  totalMemoryBytes: number;
  nodeVersion: string;
}

export type DeviceInfoSource = () => DeviceInfo;

const PLATFORM_NAMES: Record<string, string> = {
  linux: "Linux",
  darwin: "macOS",
  win32: "Windows",
  android: "Android",
  freebsd: "FreeBSD",
};

export const readDeviceInfo: DeviceInfoSource = () => ({
  platform: platform(),
  release: release(),
  arch: arch(),
  cpuCount: cpus().length,
  totalMemoryBytes: totalmem(),
  nodeVersion: process.version,
});

export function formatDeviceInfo(info: DeviceInfo): string {
  const memoryGiB = (info.totalMemoryBytes / 1024 ** 3).toFixed(1);
  return [
    `Platform: ${PLATFORM_NAMES[info.platform] ?? info.platform}`,
    `Release: ${info.release}`,
    `Arch: ${info.arch}`,
    `CPUs: ${info.cpuCount}`,
    `Memory: ${memoryGiB} GiB`,
    `Node.js: ${info.nodeVersion}`,
  ].join(", ");
}

/** Host facts only; no hostname, user or network details. */
export function createDeviceInfoTool(source: DeviceInfoSource = readDeviceInfo): ITool<DeviceInfoArgs> {
  return defineTool({
    name: "device_info",
    description: "Retrieves basic device information",
    schema: DeviceInfoSchema,
    execute: () => formatDeviceInfo(source()),
  });
}
