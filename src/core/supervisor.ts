import {
  ProcessTerminatedError,
  ProtocolError,
  TimeoutError,
  Transport,
  TransportError,
  TransportTaintedError,
  isTransportError,
  spawnRepl,
  type FailureStage,
  type ProcessHandle,
} from '@leanward/repl-transport';
import type { SupervisorConfig } from '../config/loader.js';
import { Logger } from '../logging/logger.js';
import {
  InvalidRequestError,
  MemoryLimitExceededError,
  RestartAttemptsExhaustedError,
  SupervisorClosedError,
  SupervisorError,
  UnknownSessionStateError,
  type CacheReplayFailure,
  type FailureContext,
} from '../errors.js';
import {
  encodeRequest,
  flagsOf,
  isPinnable,
  mapParentIds,
  optionNameSegments,
  producedKind,
  type EncodeDefaults,
  type OptionMap,
  type ParentRef,
  type ReplRequest,
} from '../protocol/requests.js';
import { mapResponseIds, mintedId, parseResponse, type ReplResponse } from '../protocol/responses.js';
import { createSessionCache, sessionKeyFor, type CacheContext, type SessionCache, type SessionState } from '../session/index.js';
import { IdRegistry } from './id-registry.js';
import { RequestSerializer } from './request-serializer.js';
import { ResourceMonitor } from './resource-monitor.js';

export type SupervisorState = 'idle' | 'active' | 'degraded' | 'crashed' | 'restarting' | 'closed';

export interface RunOptions {
  /** Keep the resulting state across restarts. */
  pin?: boolean;
  /** Overrides `timeouts.requestMs` for this request. */
  timeoutMs?: number;
}

export type RunResult = ReplResponse & {
  requestId: string;
  /** Pinned states that could not be rebuilt by a restart since the last response. */
  warnings: CacheReplayFailure[];
  /** Session cache key, when the result was pinned. */
  sessionKey?: string;
};

export type Spawner = () => ProcessHandle;

export interface SupervisorDeps {
  spawn?: Spawner;
  monitor?: ResourceMonitor;
  cache?: SessionCache;
  logger?: Logger;
}

function isRecoverable(err: unknown): err is TransportError {
  return (
    err instanceof ProcessTerminatedError ||
    err instanceof ProtocolError ||
    err instanceof TransportTaintedError ||
    err instanceof TimeoutError
  );
}

function annotate(err: unknown, context: FailureContext): unknown {
  if (isTransportError(err) || err instanceof SupervisorError) err.annotate(context);
  return err;
}

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Owns one REPL process: dispatches requests through it one at a time,
 * restarts it after crashes, timeouts and resource breaches, and replays
 * pinned session states into each new process.
 */
export class Supervisor {
  private readonly logger: Logger;
  private readonly cache: SessionCache;
  private readonly monitor: ResourceMonitor;
  private readonly spawner: Spawner;
  private readonly serializer = new RequestSerializer();
  private readonly registry = new IdRegistry();
  private readonly encodeDefaults: EncodeDefaults;

  private transport: Transport | null = null;
  private current: SupervisorState = 'idle';
  private restartCause: Error | null = null;
  private warnings: CacheReplayFailure[] = [];
  private cacheLoaded = false;
  private restarts = 0;
  private requestCounter = 0;

  constructor(
    private readonly config: SupervisorConfig,
    deps: SupervisorDeps = {},
  ) {
    this.logger =
      deps.logger ??
      new Logger({
        source: 'supervisor',
        logDir: config.logging.dir,
        level: config.logging.level,
        console: config.logging.console,
      });
    this.cache = deps.cache ?? createSessionCache(config.sessionCache, this.logger);
    this.monitor =
      deps.monitor ??
      new ResourceMonitor({
        maxTotalMemory: config.memory.maxTotalMemory,
        maxProcessMemory: config.memory.maxProcessMemory,
        hardLimitMb: config.memory.hardLimitMb,
        maxUptimeMs: config.restart.maxUptimeMs,
      });
    this.spawner =
      deps.spawn ??
      (() =>
        spawnRepl(config.repl.command, config.repl.args, {
          cwd: config.repl.cwd,
          env: config.repl.env,
          memoryHardLimitMb: config.memory.hardLimitMb,
        }));

    const options: OptionMap = { ...config.elaboration.defaultOptions };
    if (!config.elaboration.enableParallelElaboration) {
      options['Elab.async'] = { type: 'bool', value: false };
    }
    this.encodeDefaults = {
      options,
      incrementality: config.elaboration.enableIncrementalOptimization,
    };
  }

  // ── Introspection ──

  get state(): SupervisorState {
    return this.current;
  }

  get restartCount(): number {
    return this.restarts;
  }

  /** True when a restart will run before the next dispatch. */
  get restartPending(): boolean {
    return this.restartCause !== null;
  }

  /** Why the next dispatch will restart the process, if it will. */
  get pendingRestartCause(): Error | null {
    return this.restartCause;
  }

  get pid(): number | undefined {
    return this.transport?.process.pid;
  }

  get sessionCache(): SessionCache {
    return this.cache;
  }

  isAlive(): boolean {
    return this.current !== 'closed' && this.transport !== null && this.transport.healthy;
  }

  // ── Lifecycle ──

  /**
   * Spawn the process now and replay any states already in the cache
   * directory. Returns the states that failed to replay.
   */
  start(): Promise<CacheReplayFailure[]> {
    return this.serializer.run(async () => {
      this.assertOpen();
      await this.ensureReady();
      return this.takeWarnings();
    });
  }

  /**
   * Replace the process even if it is healthy. Returns the pinned states
   * that failed to replay.
   */
  restart(): Promise<CacheReplayFailure[]> {
    return this.serializer.run(async () => {
      this.assertOpen();
      this.restartCause = new Error('restart requested');
      await this.ensureReady();
      return this.takeWarnings();
    });
  }

  /**
   * Terminate the process. Every later call fails with SupervisorClosedError.
   */
  async close(): Promise<void> {
    if (this.current === 'closed') return;
    this.current = 'closed';
    const transport = this.transport;
    this.transport = null;
    this.registry.reset();
    if (transport) {
      await this.retire(transport);
    }
  }

  // ── Requests ──

  /**
   * Run one request. Concurrent calls are executed one after another.
   */
  run(request: ReplRequest, opts: RunOptions = {}): Promise<RunResult> {
    const requestId = `req-${++this.requestCounter}`;
    if (this.current === 'closed') {
      return Promise.reject(new SupervisorClosedError(undefined, { requestId }));
    }
    return this.serializer.run(() => this.execute(request, opts, requestId));
  }

  /** Pinned states, in creation order. */
  listPinned(): SessionState[] {
    return this.cache.list();
  }

  /**
   * Drop a pinned state and every state rebuilt on top of it. Returns the
   * logical ids removed.
   */
  removePinned(id: number): Promise<number[]> {
    return this.serializer.run(async () => {
      this.assertOpen();
      const state = this.cache.getById(id);
      if (!state) {
        throw new UnknownSessionStateError(`No pinned state with id ${id}`, id, 'env', { stage: 'pin' });
      }
      const removed = await this.cache.clear(state.key);
      for (const s of removed) this.registry.unbind(s.id);
      return removed.map((s) => s.id);
    });
  }

  /** Drop every pinned state, on disk included. */
  clearSessionCache(): Promise<number[]> {
    return this.serializer.run(async () => {
      const removed = await this.cache.clear();
      for (const s of removed) this.registry.unbind(s.id);
      return removed.map((s) => s.id);
    });
  }

  private async execute(request: ReplRequest, opts: RunOptions, requestId: string): Promise<RunResult> {
    this.assertOpen(requestId);
    this.validate(request, opts, requestId);

    const { maxAttempts, retryOnTimeout } = this.config.restart;
    let lastError: Error = new Error('no attempt made');
    let lastStage: FailureStage | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        await this.ensureReady(requestId);
        const raw = mapParentIds(request, (ref) => this.resolveParent(ref, requestId));
        const response = await this.dispatch(raw, 'dispatch', requestId, opts.timeoutMs ?? this.config.timeouts.requestMs);
        const result = await this.finish(request, response, opts, requestId);
        await this.sampleResources(requestId);
        return result;
      } catch (err) {
        if (this.isClosed()) {
          throw new SupervisorClosedError('Supervisor was closed while the request was running', { requestId });
        }
        if (!isRecoverable(err)) {
          throw annotate(err, { requestId });
        }

        err.annotate({ requestId });
        lastError = err;
        lastStage = err.stage;
        this.scheduleRestart(err);

        if (err instanceof TimeoutError && !retryOnTimeout) {
          throw err;
        }
        if (attempt < maxAttempts) {
          this.logger.event({ type: 'request-retry', requestId, attempt, error: err.message }, 'warn');
        }
      }
    }

    this.logger.event({ type: 'attempts-exhausted', requestId, attempts: maxAttempts, error: lastError.message }, 'error');
    throw new RestartAttemptsExhaustedError(
      `Request failed after ${maxAttempts} attempts: ${lastError.message}`,
      maxAttempts,
      lastError,
      { requestId, stage: lastStage },
    );
  }

  /**
   * Reject caller input that no restart could fix, before anything is sent.
   */
  private validate(request: ReplRequest, opts: RunOptions, requestId: string): void {
    const context: FailureContext = { requestId, stage: 'dispatch' };
    if ((request.kind === 'command' || request.kind === 'fileCommand') && request.options) {
      try {
        for (const name of Object.keys(request.options)) optionNameSegments(name);
      } catch (err) {
        throw annotate(err, context);
      }
    }
    if (!opts.pin) return;
    if (!isPinnable(request)) {
      throw new InvalidRequestError(`${request.kind} results cannot be pinned`, 'pin', { requestId, stage: 'pin' });
    }
    const restriction = this.cache.pinRestriction(request);
    if (restriction) {
      throw new InvalidRequestError(restriction, 'pin', { requestId, stage: 'pin' });
    }
  }

  private resolveParent(ref: ParentRef, requestId: string): number {
    const raw = this.registry.resolve(ref.id, ref.kind);
    if (raw !== undefined) return raw;

    const pinned = ref.id < 0 ? this.cache.getById(ref.id) : undefined;
    const message = pinned
      ? `Pinned ${ref.kind} ${ref.id} could not be restored in the current REPL process`
      : `Unknown ${ref.kind} id ${ref.id}: it is not live in the current REPL process`;
    throw new UnknownSessionStateError(message, ref.id, ref.kind, { requestId, stage: 'dispatch' });
  }

  private async dispatch(
    request: ReplRequest,
    stage: FailureStage,
    requestId: string | undefined,
    timeoutMs: number | undefined,
  ): Promise<ReplResponse> {
    const transport = this.liveTransport();
    const payload = encodeRequest(request, this.encodeDefaults);
    const expected = producedKind(request) === 'env' ? 'command' : 'proofStep';

    if (stage === 'dispatch') this.transition('active');
    try {
      const frame = await transport.send(payload, { timeoutMs });
      return parseResponse(frame, expected, flagsOf(request));
    } catch (err) {
      throw annotate(err, { requestId, stage });
    }
  }

  /**
   * Pin if asked, translate raw ids to caller ids and attach warnings.
   */
  private async finish(
    request: ReplRequest,
    response: ReplResponse,
    opts: RunOptions,
    requestId: string,
  ): Promise<RunResult> {
    if (response.kind === 'error') {
      this.transition('idle');
      return { ...response, requestId, warnings: this.takeWarnings() };
    }

    let pinned: SessionState | undefined;
    if (opts.pin && isPinnable(request)) {
      const rawId = mintedId(response);
      const kind = producedKind(request);
      pinned = await this.cache.put(sessionKeyFor(request), { request, kind, rawId }, this.cacheContext(requestId));
      this.registry.bindLogical(pinned.id, rawId, kind);
    }

    const mapped = mapResponseIds(response, (rawId, kind) => this.registry.bindPublic(rawId, kind));
    this.transition('idle');

    if (!pinned) {
      return { ...mapped, requestId, warnings: this.takeWarnings() };
    }
    const extras = { requestId, warnings: this.takeWarnings(), sessionKey: pinned.key };
    switch (mapped.kind) {
      case 'command':
        return { ...mapped, env: pinned.id, ...extras };
      case 'proofStep':
        return { ...mapped, proofState: pinned.id, ...extras };
      default:
        return { ...mapped, ...extras };
    }
  }

  // ── Restart ──

  private scheduleRestart(cause: Error): void {
    this.restartCause = cause;
    this.transition('crashed');
  }

  /**
   * Make sure a healthy process is running, restarting and replaying first
   * when a restart is pending.
   */
  private async ensureReady(requestId?: string): Promise<void> {
    if (this.transport && this.restartCause === null && this.transport.healthy) return;

    const reason = this.restartCause?.message ?? (this.transport ? 'REPL process is no longer healthy' : 'initial start');
    const started = Date.now();
    const previous = this.transport;
    this.transition('restarting');
    this.transport = null;
    this.registry.reset();

    try {
      if (previous) {
        this.restarts++;
        this.logger.event({ type: 'restart-started', reason, restartCount: this.restarts }, 'warn');
        await this.retire(previous);
        if (this.isClosed()) throw new SupervisorClosedError(undefined, { requestId, stage: 'restart' });
      }

      this.spawnProcess();

      if (!this.cacheLoaded) {
        await this.cache.load();
        this.cacheLoaded = true;
      }
      const outcome = await this.cache.replayAll({
        ...this.cacheContext(requestId),
        bind: (state, rawId) => this.registry.bindLogical(state.id, rawId, state.kind),
        respawn: (cause) => this.respawn(cause, requestId),
      });
      this.warnings.push(...outcome.failures.map((f) => f.toWarning()));

      this.restartCause = null;
      this.transition('idle');
      if (previous) {
        this.logger.event({
          type: 'restart-completed',
          restartCount: this.restarts,
          restored: outcome.restored.length,
          failed: outcome.failures.length,
          duration: Date.now() - started,
        });
      }
    } catch (err) {
      if (this.isClosed()) {
        throw err instanceof SupervisorClosedError ? err : new SupervisorClosedError(undefined, { requestId });
      }
      if (isRecoverable(err)) {
        this.scheduleRestart(err);
        throw err.annotate({ requestId, stage: err.stage === 'replay' ? 'replay' : 'restart' });
      }
      this.scheduleRestart(this.restartCause ?? asError(err));
      throw annotate(err, { requestId, stage: 'restart' });
    }
  }

  private spawnProcess(): void {
    const handle = this.spawner();
    this.transport = new Transport(handle, this.logger);
    this.watch(handle);
    this.logger.event({
      type: 'process-started',
      pid: handle.pid ?? null,
      command: this.config.repl.command,
      args: this.config.repl.args,
    });
  }

  /** Replace a process that a replay brought down, mid-restart. */
  private async respawn(cause: Error, requestId: string | undefined): Promise<void> {
    const previous = this.transport;
    this.transport = null;
    this.registry.reset();
    this.restarts++;
    this.logger.event({ type: 'restart-started', reason: cause.message, restartCount: this.restarts }, 'warn');
    if (previous) await this.retire(previous);
    if (this.isClosed()) throw new SupervisorClosedError(undefined, { requestId, stage: 'replay' });
    this.spawnProcess();
  }

  /** Detach from a process and terminate it. */
  private async retire(transport: Transport): Promise<void> {
    transport.close();
    const handle = transport.process;
    const info = await handle.terminate(this.config.restart.terminateGraceMs);
    this.logger.event({
      type: 'process-exited',
      pid: handle.pid ?? null,
      exitCode: info.exitCode,
      signal: info.signal,
      expected: true,
    });
  }

  /** Log exits of the current process that nobody asked for. */
  private watch(handle: ProcessHandle): void {
    void handle.exited.then((info) => {
      if (this.transport?.process !== handle) return;
      this.logger.event(
        {
          type: 'process-exited',
          pid: handle.pid ?? null,
          exitCode: info.exitCode,
          signal: info.signal,
          expected: false,
        },
        'warn',
      );
      if (this.current === 'idle' || this.current === 'degraded') this.transition('crashed');
    });
  }

  private async sampleResources(requestId: string): Promise<void> {
    const handle = this.transport?.process;
    if (!handle) return;
    const sample = await this.monitor.sample({ pid: handle.pid, startedAt: handle.startedAt });
    const breach = this.monitor.check(sample);
    if (!breach) return;

    this.logger.event(
      { type: 'memory-breach', reason: breach.reason, observed: breach.observed, limit: breach.limit },
      'warn',
    );
    this.restartCause = new MemoryLimitExceededError(
      `Resource limit exceeded (${breach.reason}: ${breach.observed.toFixed(2)} > ${breach.limit})`,
      breach,
      { requestId },
    );
    this.transition('degraded');
  }

  // ── Helpers ──

  private cacheContext(requestId: string | undefined): CacheContext {
    return {
      send: (request, stage) =>
        this.dispatch(
          request,
          stage,
          requestId,
          stage === 'replay' ? this.config.timeouts.replayMs : this.config.timeouts.requestMs,
        ),
      resolve: (id, kind) => this.registry.resolve(id, kind),
    };
  }

  private liveTransport(): Transport {
    if (!this.transport) {
      throw new TransportTaintedError('No REPL process is running', 'not started');
    }
    return this.transport;
  }

  private takeWarnings(): CacheReplayFailure[] {
    const taken = this.warnings;
    this.warnings = [];
    return taken;
  }

  private isClosed(): boolean {
    return this.current === 'closed';
  }

  /** Move to `next` unless closed; closed is final. */
  private transition(next: SupervisorState): void {
    if (this.current !== 'closed') this.current = next;
  }

  private assertOpen(requestId?: string): void {
    if (this.isClosed()) {
      throw new SupervisorClosedError(undefined, { requestId });
    }
  }
}
