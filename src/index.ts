// src/index.ts
export {
  SessionFacade,
  openSession,
  type SessionFacadeOptions,
  type OpenSessionOptions,
} from "./session-facade.js";
export {
  ExecutionSession,
  type ContextState,
  type StateChange,
  type SetupExecutor,
} from "./execution-session.js";
export { SyncCoordinator, type SyncOutcome } from "./session-sync.js";
export { DatabricksChannel, type DatabricksChannelOptions } from "./databricks.js";
export {
  okResult,
  errorResult,
  errorText,
  type ExecutionResult,
  type ExecutionStatus,
  type OutputChunk,
  type RichPayload,
  type RemoteChannel,
  type RemoteContext,
} from "./remote-channel.js";
export {
  loadConfig,
  validateConfig,
  requireValidConfig,
  type Config,
  type SyncConfig,
  type ValidConfig,
} from "./config.js";
export { compileExclusions, createIgnorer, type Ignorer } from "./ignore.js";
export { scanTree, type SyncPlan, type ScanResult } from "./scan.js";
export { packFiles } from "./pack.js";
export { ManifestStore, type Manifest } from "./manifest.js";
export { isContextLostMessage } from "./context-errors.js";
export { renderResult } from "./render.js";
export * from "./errors.js";
export {
  StructuredLogger,
  ConsoleLogger,
  NullLogger,
  type Logger,
  type LogLevel,
} from "./logger.js";
