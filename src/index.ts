export { Coordinator, withCoordinator } from "./coordinator/coordinator.js";
export type { CoordinatorLifecycle, CoordinatorOptions } from "./coordinator/coordinator.js";
export type { ConnectionSummary } from "./coordinator/connections.js";
export type { ScopeReleaseFailure, ScopeReleaseReport } from "./coordinator/resourceScope.js";
export { ToolRouter } from "./coordinator/toolRouter.js";

export { WorkerSession, COORDINATOR_CLIENT_INFO } from "./workers/workerSession.js";
export type { WorkerSessionOptions, WorkerSessionState, WorkerServerInfo } from "./workers/workerSession.js";
export { WorkerProcess, launchWorker } from "./workers/workerProcess.js";
export type {
  LaunchWorkerOptions,
  WorkerExitEvent,
  WorkerTerminateOptions,
  WorkerTerminationResult,
} from "./workers/workerProcess.js";

export {
  WorkerConfigSchema,
  WorkerManifestSchema,
  defaultWorkerConfigs,
  loadWorkerManifest,
  parseWorkerConfig,
  parseWorkerManifest,
} from "./config/workers.js";
export { DEFAULT_TIMEOUTS, createLoggerFromSettings, loadCoordinatorSettings } from "./config/settings.js";
export type { CallConcurrencyPolicy, CoordinatorSettings, CoordinatorTimeouts } from "./config/settings.js";

export * from "./errors.js";
export { StructuredLogger } from "./logger.js";
export type { LogLevel, LogEntry, LoggerOptions } from "./logger.js";
export { describeParameters } from "./types.js";
export type {
  JsonValue,
  ToolArguments,
  ToolDescriptor,
  ToolInputSchema,
  ToolParameter,
  ToolRecord,
  WorkerConfig,
} from "./types.js";
