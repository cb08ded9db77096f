/**
 * Where in the supervision cycle a failure surfaced.
 */
export type FailureStage = 'dispatch' | 'restart' | 'replay' | 'pin';

export interface FailureContext {
  requestId?: string;
  stage?: FailureStage;
}

/**
 * Base class for failures of the pipe itself, as opposed to errors the REPL
 * reports in a well-formed response.
 */
export class TransportError extends Error {
  requestId?: string;
  stage?: FailureStage;

  constructor(message: string) {
    super(message);
    this.name = 'TransportError';
  }

  /**
   * Attach request context before the error is rethrown.
   */
  annotate(context: FailureContext): this {
    this.requestId = context.requestId ?? this.requestId;
    this.stage = context.stage ?? this.stage;
    return this;
  }
}

export class ProtocolError extends TransportError {
  /** The offending output, truncated. */
  output: string;

  constructor(message: string, output: string) {
    super(message);
    this.name = 'ProtocolError';
    this.output = output.length > 2000 ? `${output.slice(0, 2000)}…` : output;
  }
}

export class TimeoutError extends TransportError {
  timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Raised for every send after a timeout or protocol violation left unread
 * output on the pipe.
 */
export class TransportTaintedError extends TransportError {
  reason: string;

  constructor(message: string, reason: string) {
    super(message);
    this.name = 'TransportTaintedError';
    this.reason = reason;
  }
}

export class ProcessTerminatedError extends TransportError {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stderr: string;

  constructor(message: string, exitCode: number | null, signal: NodeJS.Signals | null, stderr: string) {
    super(message);
    this.name = 'ProcessTerminatedError';
    this.exitCode = exitCode;
    this.signal = signal;
    this.stderr = stderr;
  }
}

export function isTransportError(err: unknown): err is TransportError {
  return err instanceof TransportError;
}
