import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { isTransportError, type TransportError } from '@leanward/repl-transport';
import { atomicWriteJSON, ensureDir, readJSON, removeFile } from '../util/fs.js';
import { canonicalJson, digestOf } from '../util/digest.js';
import type { Logger } from '../logging/logger.js';
import { SessionCacheError, CacheReplayFailureError, type FailureStage } from '../errors.js';
import {
  ReplRequestSchema,
  isPinnable,
  type PinnableRequest,
  type ReplRequest,
} from '../protocol/requests.js';
import type { ReplResponse } from '../protocol/responses.js';
import type { StateKind } from '../core/id-registry.js';

// ── Session state ──

const SessionStateSchema = z.object({
  id: z.number().int().negative(),
  key: z.string(),
  kind: z.enum(['env', 'proofState']),
  request: ReplRequestSchema.refine((r): r is PinnableRequest => isPinnable(r), {
    message: 'request kind cannot be pinned',
  }),
  requestDigest: z.string(),
  createdAt: z.string(),
  sizeEstimate: z.number().int().min(0),
  artifact: z.string().optional(),
  /** Keys of pinned states this one is rebuilt on top of. */
  dependsOn: z.array(z.string()).default([]),
});

export type SessionState = z.infer<typeof SessionStateSchema>;

/** A result to pin, as the live process just produced it. */
export interface StateSnapshot {
  /** The request as the caller issued it (caller-side ids). */
  request: PinnableRequest;
  kind: StateKind;
  /** Id minted by the live process. */
  rawId: number;
}

/**
 * Access to the live process, lent to the cache by the supervisor.
 */
export interface CacheContext {
  /** Send a request whose ids are already the live process's. */
  send(request: ReplRequest, stage: FailureStage): Promise<ReplResponse>;
  /** Live raw id for an id the caller holds. */
  resolve(id: number, kind: StateKind): number | undefined;
}

export interface ReplayContext extends CacheContext {
  /** Called as each state is rebuilt, before the next one replays. */
  bind(state: SessionState, rawId: number): void;
  /**
   * Replace a process that died or hung while replaying. Every binding made
   * so far is gone afterwards.
   */
  respawn(cause: Error): Promise<void>;
}

export interface ReplayOutcome {
  restored: SessionState[];
  failures: CacheReplayFailureError[];
}

export interface SessionCacheOptions {
  dir: string;
  logger: Logger;
  maxEntries?: number;
  maxAgeMs?: number;
  now?: () => number;
}

export type EvictionReason = 'max-entries' | 'max-age' | 'replay-failed' | 'dependency';

const KEY_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Key for a pinned request: its kind plus a digest of its canonical form, so
 * the key never depends on a process's own numbering.
 */
export function sessionKeyFor(request: PinnableRequest): string {
  return `${request.kind}-${digestOf(request).slice(0, 16)}`;
}

// ── Cache ──

/**
 * Durable store of pinned session states, one `<key>.json` per state.
 *
 * Subclasses decide what artifact makes a state self-contained and how to
 * turn it back into a request against a fresh process.
 */
export abstract class SessionCache {
  abstract readonly strategy: 'replay' | 'pickle';

  protected readonly dir: string;
  protected readonly logger: Logger;
  private readonly maxEntries?: number;
  private readonly maxAgeMs?: number;
  private readonly now: () => number;

  /** Insertion order is creation order. */
  private readonly states = new Map<string, SessionState>();
  private nextId = -1;

  constructor(opts: SessionCacheOptions) {
    this.dir = opts.dir;
    this.logger = opts.logger;
    this.maxEntries = opts.maxEntries;
    this.maxAgeMs = opts.maxAgeMs;
    this.now = opts.now ?? Date.now;
  }

  /**
   * Why the request cannot be pinned under this strategy, or null.
   */
  protected abstract strategyRestriction(request: PinnableRequest): string | null;

  /** Keys of the pinned states a request is rebuilt on top of. */
  protected parentKeys(_request: PinnableRequest): string[] {
    return [];
  }

  /** Write whatever the state needs to be rebuilt later. */
  protected abstract createArtifact(
    key: string,
    snapshot: StateSnapshot,
    ctx: CacheContext,
  ): Promise<{ artifact?: string; sizeEstimate: number; dependsOn: string[] }>;

  /** The request that rebuilds the state, or a reason it cannot be built. */
  protected abstract restoreRequest(state: SessionState, ctx: CacheContext): ReplRequest | string;

  /** Remove the artifact of a deleted state. */
  protected abstract removeArtifact(state: SessionState): Promise<void>;

  get size(): number {
    return this.states.size;
  }

  /**
   * Why the request cannot be pinned, or null. A state must fit in
   * `maxEntries` together with every state it is rebuilt on top of.
   */
  pinRestriction(request: PinnableRequest): string | null {
    const restriction = this.strategyRestriction(request);
    if (restriction) return restriction;
    if (this.maxEntries !== undefined) {
      const needed = this.lineageOf(this.parentKeys(request)).size + 1;
      if (needed > this.maxEntries) {
        return `Cannot pin a state that needs ${needed} cache entries; sessionCache.maxEntries is ${this.maxEntries}`;
      }
    }
    return null;
  }

  /**
   * Read every state already in the directory. Files that fail validation
   * are skipped with a warning.
   */
  async load(): Promise<SessionState[]> {
    await ensureDir(this.dir);
    const files = (await readdir(this.dir)).filter((f) => f.endsWith('.json') && !f.startsWith('.tmp-'));

    const loaded: SessionState[] = [];
    for (const file of files) {
      const path = join(this.dir, file);
      let raw: unknown;
      try {
        raw = await readJSON(path);
      } catch (err) {
        this.logger.warn(`Session cache: unreadable entry ${file}`, { data: { error: String(err) } });
        continue;
      }
      const parsed = SessionStateSchema.safeParse(raw);
      if (!parsed.success || `${parsed.data.key}.json` !== file) {
        this.logger.warn(`Session cache: ignoring invalid entry ${file}`);
        continue;
      }
      loaded.push(parsed.data);
    }

    loaded.sort((a, b) => a.createdAt.localeCompare(b.createdAt) || b.id - a.id);
    const usedIds = new Set([...this.states.values()].map((s) => s.id));
    for (const state of loaded) {
      const existing = this.states.get(state.key);
      const id = existing ? existing.id : usedIds.has(state.id) ? this.allocateId() : state.id;
      usedIds.add(id);
      this.states.set(state.key, { ...state, id });
      this.nextId = Math.min(this.nextId, id - 1);
    }

    await this.evictExpired();
    return this.list();
  }

  /**
   * Store a pinned state. Re-pinning a key keeps its id and position.
   */
  async put(key: string, snapshot: StateSnapshot, ctx: CacheContext): Promise<SessionState> {
    if (!KEY_PATTERN.test(key)) {
      throw new SessionCacheError(`Invalid session key: "${key}"`, key, { stage: 'pin' });
    }
    const restriction = this.pinRestriction(snapshot.request);
    if (restriction) {
      throw new SessionCacheError(restriction, key, { stage: 'pin' });
    }

    await ensureDir(this.dir);
    const { artifact, sizeEstimate, dependsOn } = await this.createArtifact(key, snapshot, ctx);
    const existing = this.states.get(key);
    const state: SessionState = {
      id: existing ? existing.id : this.allocateId(),
      key,
      kind: snapshot.kind,
      request: snapshot.request,
      requestDigest: digestOf(snapshot.request),
      createdAt: existing ? existing.createdAt : new Date(this.now()).toISOString(),
      sizeEstimate,
      artifact,
      dependsOn,
    };

    await atomicWriteJSON(this.metadataPath(key), state);
    this.states.set(key, state);
    this.logger.event({ type: 'state-pinned', key, id: state.id, kind: state.kind });

    const keep = this.lineageOf(dependsOn);
    keep.add(key);
    await this.evictExpired();
    await this.evictOverflow(keep);
    return state;
  }

  /**
   * Look up a state by key. A miss is logged and returned as undefined.
   */
  get(key: string): SessionState | undefined {
    const state = this.states.get(key);
    if (!state) {
      this.logger.debug(`Session cache miss: ${key}`);
    }
    return state;
  }

  getById(id: number): SessionState | undefined {
    for (const state of this.states.values()) {
      if (state.id === id) return state;
    }
    return undefined;
  }

  /** Every unexpired state, in creation order. */
  list(): SessionState[] {
    return [...this.states.values()].filter((state) => !this.isExpired(state));
  }

  /**
   * Delete one state (and everything rebuilt on top of it), or all of them.
   * Returns the deleted states.
   */
  async clear(key?: string): Promise<SessionState[]> {
    if (key === undefined) {
      const all = [...this.states.values()];
      for (const state of all) await this.deleteState(state);
      return all;
    }
    const state = this.states.get(key);
    if (!state) return [];
    const doomed = [state, ...this.dependentsOf(state)];
    for (const s of doomed) await this.deleteState(s);
    return doomed;
  }

  /**
   * Rebuild every state against a fresh process, in creation order.
   *
   * A state the REPL rejects is reported and left on disk. A state whose
   * replay kills or hangs the process is deleted with its dependents; the
   * process is respawned and the replay starts over without them.
   */
  async replayAll(ctx: ReplayContext): Promise<ReplayOutcome> {
    await this.evictExpired();
    const discarded: CacheReplayFailureError[] = [];

    for (;;) {
      const pass = await this.replayPass(ctx);
      if (!pass.crashed) {
        return { restored: pass.restored, failures: [...discarded, ...pass.failures] };
      }
      const { state, error } = pass.crashed;
      await ctx.respawn(error);
      discarded.push(...(await this.discard(state, error)));
    }
  }

  // ── Internals ──

  protected metadataPath(key: string): string {
    return join(this.dir, `${key}.json`);
  }

  protected canonicalSize(request: PinnableRequest): number {
    return Buffer.byteLength(canonicalJson(request), 'utf8');
  }

  private async replayPass(
    ctx: ReplayContext,
  ): Promise<ReplayOutcome & { crashed?: { state: SessionState; error: TransportError } }> {
    const restored: SessionState[] = [];
    const failures: CacheReplayFailureError[] = [];

    for (const state of this.list()) {
      const request = this.restoreRequest(state, ctx);
      if (typeof request === 'string') {
        failures.push(this.replayFailure(state, request));
        continue;
      }

      let response: ReplResponse;
      try {
        response = await ctx.send(request, 'replay');
      } catch (err) {
        if (!isTransportError(err)) throw err;
        return { restored, failures, crashed: { state, error: err } };
      }
      if (response.kind === 'error') {
        failures.push(this.replayFailure(state, `REPL rejected replay: ${response.message}`));
        continue;
      }

      ctx.bind(state, response.kind === 'command' ? response.env : response.proofState);
      restored.push(state);
    }

    return { restored, failures };
  }

  private async discard(state: SessionState, error: TransportError): Promise<CacheReplayFailureError[]> {
    const failures = [this.replayFailure(state, `REPL failed during replay: ${error.message}`)];
    for (const dependent of this.dependentsOf(state)) {
      failures.push(this.replayFailure(dependent, `parent ${state.kind} ${state.id} was discarded`));
    }
    await this.evict(state, 'replay-failed');
    return failures;
  }

  /** The given keys and every state they are rebuilt on top of. */
  private lineageOf(keys: string[]): Set<string> {
    const lineage = new Set<string>();
    const pending = [...keys];
    for (let key = pending.pop(); key !== undefined; key = pending.pop()) {
      if (lineage.has(key)) continue;
      lineage.add(key);
      pending.push(...(this.states.get(key)?.dependsOn ?? []));
    }
    return lineage;
  }

  private allocateId(): number {
    return this.nextId--;
  }

  private replayFailure(state: SessionState, reason: string): CacheReplayFailureError {
    const failure = new CacheReplayFailureError(
      `Could not replay pinned state ${state.id} (${state.key}): ${reason}`,
      state.key,
      state.id,
    );
    this.logger.event({ type: 'replay-failed', key: state.key, id: state.id, error: reason }, 'warn');
    return failure;
  }

  private dependentsOf(root: SessionState): SessionState[] {
    const doomed = new Set<string>([root.key]);
    const result: SessionState[] = [];
    // Dependents are always created after their parents.
    for (const state of this.states.values()) {
      if (state.dependsOn.some((k) => doomed.has(k))) {
        doomed.add(state.key);
        result.push(state);
      }
    }
    return result;
  }

  private async deleteState(state: SessionState): Promise<void> {
    if (!this.states.delete(state.key)) return;
    await removeFile(this.metadataPath(state.key));
    await this.removeArtifact(state);
  }

  private async evict(state: SessionState, reason: EvictionReason): Promise<void> {
    const doomed = [state, ...this.dependentsOf(state)];
    for (const [i, s] of doomed.entries()) {
      if (!this.states.has(s.key)) continue;
      await this.deleteState(s);
      this.logger.event({ type: 'state-evicted', key: s.key, id: s.id, reason: i === 0 ? reason : 'dependency' });
    }
  }

  private isExpired(state: SessionState): boolean {
    return this.maxAgeMs !== undefined && this.now() - Date.parse(state.createdAt) > this.maxAgeMs;
  }

  private async evictExpired(): Promise<void> {
    for (const state of [...this.states.values()]) {
      if (this.states.has(state.key) && this.isExpired(state)) {
        await this.evict(state, 'max-age');
      }
    }
  }

  /** Evict the oldest states outside `keep` until `maxEntries` holds. */
  private async evictOverflow(keep: Set<string>): Promise<void> {
    if (this.maxEntries === undefined) return;
    while (this.states.size > this.maxEntries) {
      const oldest = [...this.states.values()].find((s) => !keep.has(s.key));
      if (!oldest) return;
      await this.evict(oldest, 'max-entries');
    }
  }
}
