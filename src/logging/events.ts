/**
 * Typed event definitions for structured supervisor logging.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  requestId?: string;
  stage?: string;
  attempt?: number;
  data?: Record<string, unknown>;
}

export interface LogEntry extends LogContext {
  timestamp: string;
  level: LogLevel;
  source: string;
  message: string;
}

// ── Process lifecycle ──

export interface ProcessStartedEvent {
  type: 'process-started';
  pid: number | null;
  command: string;
  args: string[];
}

export interface ProcessExitedEvent {
  type: 'process-exited';
  pid: number | null;
  exitCode: number | null;
  signal: string | null;
  expected: boolean;
}

export interface RestartStartedEvent {
  type: 'restart-started';
  reason: string;
  restartCount: number;
}

export interface RestartCompletedEvent {
  type: 'restart-completed';
  restartCount: number;
  restored: number;
  failed: number;
  duration: number;
}

export interface MemoryBreachEvent {
  type: 'memory-breach';
  reason: string;
  observed: number;
  limit: number;
}

// ── Requests ──

export interface RequestRetryEvent {
  type: 'request-retry';
  requestId: string;
  attempt: number;
  error: string;
}

export interface AttemptsExhaustedEvent {
  type: 'attempts-exhausted';
  requestId: string;
  attempts: number;
  error: string;
}

// ── Session cache ──

export interface StatePinnedEvent {
  type: 'state-pinned';
  key: string;
  id: number;
  kind: string;
}

export interface StateEvictedEvent {
  type: 'state-evicted';
  key: string;
  id: number;
  reason: 'max-entries' | 'max-age' | 'replay-failed' | 'dependency';
}

export interface ReplayFailedEvent {
  type: 'replay-failed';
  key: string;
  id: number;
  error: string;
}

export type SupervisorEvent =
  | ProcessStartedEvent
  | ProcessExitedEvent
  | RestartStartedEvent
  | RestartCompletedEvent
  | MemoryBreachEvent
  | RequestRetryEvent
  | AttemptsExhaustedEvent
  | StatePinnedEvent
  | StateEvictedEvent
  | ReplayFailedEvent;
