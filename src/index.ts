// Supervisor
export {
  Supervisor,
  type SupervisorState,
  type RunOptions,
  type RunResult,
  type Spawner,
  type SupervisorDeps,
} from './core/supervisor.js';
export { RequestSerializer } from './core/request-serializer.js';
export {
  ResourceMonitor,
  readProcRssBytes,
  readProcTreeRssBytes,
  type ProcReader,
  type ResourceSample,
  type ResourceThresholds,
  type ResourceBreach,
  type BreachReason,
  type ResourceProbes,
  type MonitoredProcess,
} from './core/resource-monitor.js';
export { IdRegistry, type StateKind } from './core/id-registry.js';

// Session cache
export {
  SessionCache,
  ReplaySessionCache,
  PickleSessionCache,
  createSessionCache,
  sessionKeyFor,
  type SessionState,
  type StateSnapshot,
  type CacheContext,
  type ReplayContext,
  type ReplayOutcome,
  type EvictionReason,
} from './session/index.js';

// Protocol
export {
  parseRequest,
  encodeRequest,
  isPinnable,
  OptionValueSchema,
  ReplRequestSchema,
  type ReplRequest,
  type RequestKind,
  type PinnableRequest,
  type CommandRequest,
  type FileCommandRequest,
  type ProofStepRequest,
  type PickleEnvironmentRequest,
  type UnpickleEnvironmentRequest,
  type PickleProofStateRequest,
  type UnpickleProofStateRequest,
  type OptionValue,
  type OptionMap,
} from './protocol/requests.js';
export {
  parseResponse,
  isLeanError,
  errorCount,
  type ReplResponse,
  type CommandResponse,
  type ProofStepResponse,
  type LeanErrorResponse,
  type Message,
  type Sorry,
  type Tactic,
} from './protocol/responses.js';

// Config
export { loadConfig, parseConfig, ConfigLoadError, DEFAULT_CONFIG_FILE, type SupervisorConfig } from './config/loader.js';
export { SupervisorConfigSchema, type SupervisorConfigInput } from './config/schema.js';

// Errors
export {
  SupervisorError,
  MemoryLimitExceededError,
  CacheReplayFailureError,
  RestartAttemptsExhaustedError,
  InvalidRequestError,
  UnknownSessionStateError,
  SessionCacheError,
  SupervisorClosedError,
  toFailurePayload,
  type CacheReplayFailure,
  type FailurePayload,
} from './errors.js';
export {
  TransportError,
  ProtocolError,
  TimeoutError,
  TransportTaintedError,
  ProcessTerminatedError,
  killAllTrackedProcesses,
  type FailureStage,
} from '@leanward/repl-transport';

// Logging
export { Logger, type LoggerOptions } from './logging/logger.js';
export type { LogLevel, LogEntry, SupervisorEvent } from './logging/events.js';
