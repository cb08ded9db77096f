// errors
export {
  type FailureStage,
  type FailureContext,
  TransportError,
  ProtocolError,
  TimeoutError,
  TransportTaintedError,
  ProcessTerminatedError,
  isTransportError,
} from './errors.js';

// frame
export {
  type JsonObject,
  FRAME_TERMINATOR,
  encodeFrame,
  decodeFrame,
  isJsonObject,
  ResponseFramer,
} from './frame.js';

// process
export {
  type ExitInfo,
  type ProcessHandleInit,
  type SpawnReplOpts,
  ProcessHandle,
  buildLaunchCommand,
  spawnRepl,
  trackProcess,
  killAllTrackedProcesses,
  getTrackedProcessCount,
} from './process.js';

// transport
export { type TransportLogger, type SendOptions, Transport } from './transport.js';
