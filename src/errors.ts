import { isTransportError, type FailureContext, type FailureStage } from '@leanward/repl-transport';
import type { ResourceBreach } from './core/resource-monitor.js';
import type { StateKind } from './core/id-registry.js';

export type { FailureStage, FailureContext };

/**
 * Base class for failures raised by the supervisor and session cache.
 */
export class SupervisorError extends Error {
  requestId?: string;
  stage?: FailureStage;

  constructor(message: string, context: FailureContext = {}) {
    super(message);
    this.name = 'SupervisorError';
    this.requestId = context.requestId;
    this.stage = context.stage;
  }

  annotate(context: FailureContext): this {
    this.requestId = context.requestId ?? this.requestId;
    this.stage = context.stage ?? this.stage;
    return this;
  }
}

/**
 * A resource sample crossed a configured threshold. Recorded as the cause of
 * the deferred restart; never interrupts a request in flight.
 */
export class MemoryLimitExceededError extends SupervisorError {
  breach: ResourceBreach;

  constructor(message: string, breach: ResourceBreach, context?: FailureContext) {
    super(message, context);
    this.name = 'MemoryLimitExceededError';
    this.breach = breach;
  }
}

/**
 * Structured form of a pinned state that could not be rebuilt after a restart.
 * Attached to the next response as a warning.
 */
export interface CacheReplayFailure {
  key: string;
  id: number;
  error: string;
  message: string;
}

export class CacheReplayFailureError extends SupervisorError {
  key: string;
  stateId: number;

  constructor(message: string, key: string, stateId: number, context?: FailureContext) {
    super(message, { stage: 'replay', ...context });
    this.name = 'CacheReplayFailureError';
    this.key = key;
    this.stateId = stateId;
  }

  toWarning(): CacheReplayFailure {
    return { key: this.key, id: this.stateId, error: this.name, message: this.message };
  }
}

export class RestartAttemptsExhaustedError extends SupervisorError {
  attempts: number;
  lastError: Error;

  constructor(message: string, attempts: number, lastError: Error, context?: FailureContext) {
    super(message, context);
    this.name = 'RestartAttemptsExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/** Malformed caller input. Never retried. */
export class InvalidRequestError extends SupervisorError {
  field: string;

  constructor(message: string, field: string, context?: FailureContext) {
    super(message, context);
    this.name = 'InvalidRequestError';
    this.field = field;
  }
}

/**
 * An environment or proof state id that is not live in the current process:
 * minted before a restart, by another supervisor, or never minted at all.
 */
export class UnknownSessionStateError extends SupervisorError {
  stateId: number;
  kind: StateKind;

  constructor(message: string, stateId: number, kind: StateKind, context?: FailureContext) {
    super(message, context);
    this.name = 'UnknownSessionStateError';
    this.stateId = stateId;
    this.kind = kind;
  }
}

export class SessionCacheError extends SupervisorError {
  key?: string;

  constructor(message: string, key?: string, context?: FailureContext) {
    super(message, context);
    this.name = 'SessionCacheError';
    this.key = key;
  }
}

export class SupervisorClosedError extends SupervisorError {
  constructor(message = 'Supervisor is closed', context?: FailureContext) {
    super(message, context);
    this.name = 'SupervisorClosedError';
  }
}

// ── Failure payloads ──

export interface FailurePayload {
  error: string;
  message: string;
  stage: FailureStage | null;
  requestId: string | null;
  /** True for infrastructure failures worth retrying; false for rejected input. */
  transient: boolean;
}

function isTransient(err: Error): boolean {
  if (isTransportError(err)) return true;
  return (
    err instanceof MemoryLimitExceededError ||
    err instanceof CacheReplayFailureError ||
    err instanceof RestartAttemptsExhaustedError
  );
}

/**
 * Convert anything thrown by the engine into a serialisable failure payload.
 */
export function toFailurePayload(err: unknown): FailurePayload {
  if (!(err instanceof Error)) {
    return { error: 'Error', message: String(err), stage: null, requestId: null, transient: false };
  }
  const context = err instanceof SupervisorError || isTransportError(err) ? err : undefined;
  return {
    error: err.name,
    message: err.message,
    stage: context?.stage ?? null,
    requestId: context?.requestId ?? null,
    transient: isTransient(err),
  };
}
