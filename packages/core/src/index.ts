// Agent loop
export {
  createAgent,
  CheckpointStep,
  DEFAULT_INSTRUCTIONS,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_MAX_PROMPT_LENGTH,
  NO_ANSWER_FALLBACK,
  CANCELLED_TOOL_RESULT,
} from "./execution/loop.js";
export type { Agent, AgentOptions, RunOptions } from "./execution/loop.js";
export {
  GUARDRAIL_SUFFIX,
  buildSystemPrompt,
  buildOutgoingMessages,
  dropOrphanToolResults,
  dropUnansweredToolCalls,
} from "./execution/prompt.js";
export {
  createToolExecutor,
  unknownToolMessage,
  confirmationMessage,
  toolErrorMessage,
} from "./execution/tool-executor.js";
export type { ToolExecutor, ToolOutcome, ToolOutcomeStatus, ToolErrorCallback } from "./execution/tool-executor.js";

// Coordinator
export { createCoordinator } from "./agents/coordinator.js";
export type { Coordinator, CoordinatorOptions, CoordinatorRunOptions } from "./agents/coordinator.js";
export { createTransferTool, TRANSFER_TOOL_NAME } from "./agents/transfer-tool.js";
export type { TransferArgs, TransferTarget } from "./agents/transfer-tool.js";

// EventBus
export { createEventBus } from "./bus/index.js";
export type { EventBusOptions } from "./bus/index.js";

// Memory & persistence
export {
  createMemoryManager,
  SUMMARY_PREFIX,
  SUMMARIZER_INSTRUCTION,
  fallbackSummary,
  isStorableMessage,
  toStoredMessage,
  fromStoredMessage,
} from "./memory/memory-manager.js";
export type { MemoryManager, MemoryManagerOptions, MemoryStats } from "./memory/memory-manager.js";
export { createInMemoryPersistence, pruneMessages } from "./persistence/in-memory.js";
export type { InMemoryPersistence } from "./persistence/in-memory.js";
export { FilePersistence } from "./persistence/file.js";
export type { FilePersistenceOptions } from "./persistence/file.js";

// Run state
export { createRunState, RunStep } from "./state/run-state.js";
export type { RunState, RunStateSnapshot, RunStateListener, RunStateOptions } from "./state/run-state.js";

// Tools
export { createToolRegistry } from "./infrastructure/tool-registry.js";
export type { ToolRegistry } from "./infrastructure/tool-registry.js";
export { defineTool } from "./tools/define-tool.js";
export type { ToolSpec, ToolArgs, ConfirmationPolicy } from "./tools/define-tool.js";
export { createCalculatorTool, calculate } from "./tools/calculator.js";
export type { CalculatorArgs } from "./tools/calculator.js";
export { createApiTestTool, DEFAULT_BLOCKED_HOSTS, snippet } from "./tools/api-test.js";
export type { ApiTestArgs, ApiTestToolOptions, RequestFn } from "./tools/api-test.js";
export { createDeviceInfoTool, formatDeviceInfo, readDeviceInfo } from "./tools/device-info.js";
export type { DeviceInfo, DeviceInfoArgs, DeviceInfoSource } from "./tools/device-info.js";
export {
  createNetworkConnectivityTool,
  activeInterfaces,
  DEFAULT_PROBE_HOST,
} from "./tools/network-connectivity.js";
export type {
  InterfaceAddress,
  NetworkConnectivityArgs,
  NetworkConnectivityOptions,
} from "./tools/network-connectivity.js";
export { getStandardTools } from "./tools/standard-tools.js";
export type { StandardToolsOptions } from "./tools/standard-tools.js";

// Observability
export { createMetricsCollector, MetricName } from "./observability/metrics.js";
export type { MetricsCollector, MetricsSnapshot } from "./observability/metrics.js";

// Testing
export { createScriptedClient } from "./testing/scripted-client.js";
export type { ScriptedClient, ScriptedReply, ScriptedTurn } from "./testing/scripted-client.js";
