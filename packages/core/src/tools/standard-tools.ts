import type { ITool } from "@ferryman/sdk";
import { createApiTestTool, type ApiTestToolOptions } from "./api-test.js";
import { createCalculatorTool } from "./calculator.js";
import { createDeviceInfoTool, type DeviceInfoSource } from "./device-info.js";
import { createNetworkConnectivityTool, type NetworkConnectivityOptions } from "./network-connectivity.js";

export interface StandardToolsOptions {
  apiTest?: ApiTestToolOptions;
  deviceInfo?: DeviceInfoSource;
  network?: NetworkConnectivityOptions;
}

/** calculator, network_connectivity, device_info and api_test, in that order. */
export function getStandardTools(options: StandardToolsOptions = {}): ITool[] {
  return [
    createCalculatorTool(),
    createNetworkConnectivityTool(options.network),
    createDeviceInfoTool(options.deviceInfo),
    createApiTestTool(options.apiTest),
  ];
}
