import { decodeFrame, encodeFrame, ResponseFramer, type JsonObject } from './frame.js';
import {
  ProcessTerminatedError,
  TimeoutError,
  TransportTaintedError,
} from './errors.js';
import type { ExitInfo, ProcessHandle } from './process.js';

/**
 * Minimal logger interface accepted by Transport.
 */
export interface TransportLogger {
  debug(message: string, context?: { data?: Record<string, unknown> }): void;
  warn(message: string, context?: { data?: Record<string, unknown> }): void;
}

export interface SendOptions {
  /** Bound on the wait for a complete response. Omit for no bound. */
  timeoutMs?: number;
}

interface PendingRead {
  resolve: (frame: JsonObject) => void;
  reject: (err: Error) => void;
  timer?: ReturnType<typeof setTimeout>;
}

/**
 * Request/response exchange over one REPL process's pipes.
 *
 * Exactly one request may be in flight. After a timeout or any protocol
 * violation the transport is tainted: unread output may still arrive, so the
 * process cannot be trusted and every later send fails until it is replaced.
 */
export class Transport {
  private readonly framer = new ResponseFramer();
  private pending: PendingRead | null = null;
  private taintReason: string | null = null;
  private closed = false;

  constructor(
    private readonly handle: ProcessHandle,
    private readonly logger?: TransportLogger,
  ) {
    handle.stdout.setEncoding('utf-8');
    handle.stdout.on('data', this.onData);
    void handle.exited.then(this.onExit);
  }

  /** The handle this transport reads and writes. */
  get process(): ProcessHandle {
    return this.handle;
  }

  get tainted(): boolean {
    return this.taintReason !== null;
  }

  get inFlight(): boolean {
    return this.pending !== null;
  }

  /** True when the next send can be written to a live, untainted process. */
  get healthy(): boolean {
    return !this.closed && this.taintReason === null && this.handle.alive;
  }

  /**
   * Write one request and resolve with the one response decoded for it.
   */
  async send(payload: JsonObject, opts: SendOptions = {}): Promise<JsonObject> {
    this.handle.assertOwner();

    if (this.closed) {
      throw new TransportTaintedError('Transport is closed', 'closed');
    }
    if (this.taintReason !== null) {
      throw new TransportTaintedError(`Transport is tainted: ${this.taintReason}`, this.taintReason);
    }
    const exit = this.handle.exit;
    if (exit) {
      throw this.terminatedError(exit, 'REPL process is not running');
    }
    if (this.pending) {
      throw new Error('A request is already in flight on this transport');
    }

    return new Promise<JsonObject>((resolve, reject) => {
      const pending: PendingRead = { resolve, reject };
      this.pending = pending;

      const timeoutMs = opts.timeoutMs;
      if (timeoutMs !== undefined && timeoutMs > 0) {
        pending.timer = setTimeout(() => {
          if (this.pending !== pending) return;
          this.pending = null;
          this.taint(`no response within ${timeoutMs}ms`);
          reject(new TimeoutError(`REPL did not respond within ${timeoutMs}ms`, timeoutMs));
        }, timeoutMs);
      }

      this.logger?.debug('Transport: writing request', { data: { pid: this.handle.pid } });
      this.handle.stdin.write(encodeFrame(payload), (err) => {
        if (!err || this.pending !== pending) return;
        this.clearPending(pending);
        this.taint(`write failed: ${err.message}`);
        reject(
          new ProcessTerminatedError(
            `Failed to write request to REPL: ${err.message}`,
            this.handle.exit?.exitCode ?? null,
            this.handle.exit?.signal ?? null,
            this.handle.stderrFragment,
          ),
        );
      });
    });
  }

  /**
   * Detach from the process. A pending read is rejected.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.handle.stdout.removeListener('data', this.onData);
    const pending = this.pending;
    if (pending) {
      this.clearPending(pending);
      pending.reject(new TransportTaintedError('Transport closed while a request was pending', 'closed'));
    }
  }

  private readonly onData = (chunk: string): void => {
    for (const text of this.framer.push(chunk)) {
      const pending = this.pending;
      if (!pending) {
        this.taint('unsolicited output');
        this.logger?.warn('Transport: REPL wrote output with no request pending', {
          data: { output: text.slice(0, 500) },
        });
        continue;
      }

      this.clearPending(pending);
      try {
        pending.resolve(decodeFrame(text));
      } catch (err) {
        this.taint('malformed response');
        pending.reject(err instanceof Error ? err : new Error(String(err)));
      }
    }
  };

  private readonly onExit = (info: ExitInfo): void => {
    const pending = this.pending;
    if (!pending) return;
    this.clearPending(pending);
    const partial = this.framer.hasPartial ? ' after partial output' : '';
    pending.reject(this.terminatedError(info, `REPL process exited${partial} while a request was pending`));
  };

  private clearPending(pending: PendingRead): void {
    if (pending.timer) clearTimeout(pending.timer);
    if (this.pending === pending) this.pending = null;
  }

  private taint(reason: string): void {
    if (this.taintReason === null) {
      this.taintReason = reason;
    }
  }

  private terminatedError(info: ExitInfo, message: string): ProcessTerminatedError {
    const detail = info.error
      ? `spawn error: ${info.error}`
      : `exit code ${info.exitCode ?? 'none'}, signal ${info.signal ?? 'none'}`;
    return new ProcessTerminatedError(
      `${message} (${detail})`,
      info.exitCode,
      info.signal,
      this.handle.stderrFragment,
    );
  }
}
