import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from '../src/logging/logger.js';
import {
  PickleSessionCache,
  ReplaySessionCache,
  createSessionCache,
  sessionKeyFor,
  type ReplayContext,
  type SessionState,
} from '../src/session/index.js';
import type { ReplRequest } from '../src/protocol/requests.js';
import type { ReplResponse } from '../src/protocol/responses.js';
import { ProcessTerminatedError } from '@leanward/repl-transport';
import { SessionCacheError } from '../src/errors.js';
import { makeMockLogger, makeTempDir } from './helpers/supervisor-fixtures.js';

/**
 * A context over a pretend process: every command mints the next env id, and
 * ids bound during replay resolve through `live`.
 */
function makeContext(respond?: (request: ReplRequest) => Promise<ReplResponse>) {
  const live = new Map<number, number>();
  const sent: ReplRequest[] = [];
  let nextEnv = 0;
  const ctx: ReplayContext = {
    send: vi.fn(async (request: ReplRequest): Promise<ReplResponse> => {
      sent.push(request);
      if (respond) return respond(request);
      return { kind: 'command', env: nextEnv++, messages: [], sorries: [] };
    }),
    resolve: (id) => live.get(id),
    bind: (state: SessionState, rawId: number) => {
      live.set(state.id, rawId);
    },
    respawn: vi.fn(async () => {
      live.clear();
    }),
  };
  return { ctx, sent, live };
}

describe('ReplaySessionCache', () => {
  let dir: string;
  let logger: Logger;

  beforeEach(async () => {
    dir = await makeTempDir();
    logger = makeMockLogger();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('stores a state as <key>.json with a negative id', async () => {
    const cache = new ReplaySessionCache({ dir, logger });
    const { ctx } = makeContext();

    const state = await cache.put('command-x', { request: { kind: 'command', cmd: 'def x := 1' }, kind: 'env', rawId: 3 }, ctx);

    expect(state).toMatchObject({
      id: -1,
      key: 'command-x',
      kind: 'env',
      request: { kind: 'command', cmd: 'def x := 1' },
      sizeEstimate: 37,
      dependsOn: [],
    });
    expect(state.artifact).toBeUndefined();
    const onDisk: unknown = JSON.parse(await readFile(join(dir, 'command-x.json'), 'utf-8'));
    expect(onDisk).toEqual(state);
    expect(ctx.send).not.toHaveBeenCalled();
    expect(logger.event).toHaveBeenCalledWith({ type: 'state-pinned', key: 'command-x', id: -1, kind: 'env' });
  });

  it('keeps the id and position when a key is pinned again', async () => {
    const cache = new ReplaySessionCache({ dir, logger });
    const { ctx } = makeContext();
    const first = await cache.put('a', { request: { kind: 'command', cmd: 'def a := 1' }, kind: 'env', rawId: 0 }, ctx);
    await cache.put('b', { request: { kind: 'command', cmd: 'def b := 1' }, kind: 'env', rawId: 1 }, ctx);

    const again = await cache.put('a', { request: { kind: 'command', cmd: 'def a := 2' }, kind: 'env', rawId: 2 }, ctx);

    expect(again.id).toBe(first.id);
    expect(again.createdAt).toBe(first.createdAt);
    expect(cache.list().map((s) => [s.key, s.request])).toEqual([
      ['a', { kind: 'command', cmd: 'def a := 2' }],
      ['b', { kind: 'command', cmd: 'def b := 1' }],
    ]);
  });

  it('rejects invalid keys and unpinned parents', async () => {
    const cache = new ReplaySessionCache({ dir, logger });
    const { ctx } = makeContext();

    await expect(
      cache.put('bad key!', { request: { kind: 'command', cmd: 'x' }, kind: 'env', rawId: 0 }, ctx),
    ).rejects.toThrow(new SessionCacheError('Invalid session key: "bad key!"'));
    await expect(
      cache.put('step', { request: { kind: 'proofStep', tactic: 'rfl', proofState: -7 }, kind: 'proofState', rawId: 0 }, ctx),
    ).rejects.toThrow('Cannot pin a request whose parent proofState -7 is not pinned');
  });

  it('records the keys of pinned parents', async () => {
    const cache = new ReplaySessionCache({ dir, logger });
    const { ctx } = makeContext();
    const x = await cache.put('x', { request: { kind: 'command', cmd: 'def x := 1' }, kind: 'env', rawId: 0 }, ctx);

    const y = await cache.put('y', { request: { kind: 'command', cmd: 'def y := x', env: x.id }, kind: 'env', rawId: 1 }, ctx);

    expect(y.dependsOn).toEqual(['x']);
    expect(cache.pinRestriction({ kind: 'command', cmd: 'z', env: y.id })).toBeNull();
    expect(cache.pinRestriction({ kind: 'proofStep', tactic: 'rfl', proofState: y.id })).toBe(
      'Cannot pin a request whose parent proofState -2 is not pinned',
    );
  });

  it('logs a miss and returns undefined', () => {
    const cache = new ReplaySessionCache({ dir, logger });
    expect(cache.get('nope')).toBeUndefined();
    expect(logger.debug).toHaveBeenCalledWith('Session cache miss: nope');
  });

  it('loads entries written by another instance in creation order', async () => {
    const writer = new ReplaySessionCache({ dir, logger });
    const { ctx } = makeContext();
    const x = await writer.put('x', { request: { kind: 'command', cmd: 'def x := 1' }, kind: 'env', rawId: 0 }, ctx);
    const y = await writer.put('y', { request: { kind: 'command', cmd: 'def y := x', env: -1 }, kind: 'env', rawId: 1 }, ctx);

    const reader = new ReplaySessionCache({ dir, logger });
    const loaded = await reader.load();

    expect(loaded).toEqual([x, y]);
    expect(reader.getById(-2)).toEqual(y);
    const z = await reader.put('z', { request: { kind: 'command', cmd: 'def z := 1' }, kind: 'env', rawId: 2 }, ctx);
    expect(z.id).toBe(-3);
  });

  it('skips unreadable and invalid entries with a warning', async () => {
    await writeFile(join(dir, 'broken.json'), 'not json');
    await writeFile(join(dir, 'junk.json'), '{}');
    const cache = new ReplaySessionCache({ dir, logger });

    await expect(cache.load()).resolves.toEqual([]);

    expect(logger.warn).toHaveBeenCalledWith('Session cache: unreadable entry broken.json', expect.anything());
    expect(logger.warn).toHaveBeenCalledWith('Session cache: ignoring invalid entry junk.json');
  });

  it('clears one state with its dependents, or all of them', async () => {
    const cache = new ReplaySessionCache({ dir, logger });
    const { ctx } = makeContext();
    await cache.put('x', { request: { kind: 'command', cmd: 'def x := 1' }, kind: 'env', rawId: 0 }, ctx);
    await cache.put('y', { request: { kind: 'command', cmd: 'def y := x', env: -1 }, kind: 'env', rawId: 1 }, ctx);
    await cache.put('u', { request: { kind: 'command', cmd: 'def u := 1' }, kind: 'env', rawId: 2 }, ctx);

    const removed = await cache.clear('x');

    expect(removed.map((s) => s.key)).toEqual(['x', 'y']);
    expect(await readdir(dir)).toEqual(['u.json']);
    await expect(cache.clear('x')).resolves.toEqual([]);
    await expect(cache.clear()).resolves.toHaveLength(1);
    expect(cache.size).toBe(0);
  });

  it('evicts the oldest entries beyond maxEntries', async () => {
    const cache = new ReplaySessionCache({ dir, logger, maxEntries: 2 });
    const { ctx } = makeContext();
    for (const name of ['a', 'b', 'c']) {
      await cache.put(name, { request: { kind: 'command', cmd: `def ${name} := 1` }, kind: 'env', rawId: 0 }, ctx);
    }

    expect(cache.list().map((s) => s.key)).toEqual(['b', 'c']);
    expect(existsSync(join(dir, 'a.json'))).toBe(false);
    expect(logger.event).toHaveBeenCalledWith({ type: 'state-evicted', key: 'a', id: -1, reason: 'max-entries' });
  });

  it('expires entries older than maxAgeMs along with their dependents', async () => {
    let now = Date.parse('2026-03-01T00:00:00.000Z');
    const cache = new ReplaySessionCache({ dir, logger, maxAgeMs: 1000, now: () => now });
    const { ctx } = makeContext();
    await cache.put('x', { request: { kind: 'command', cmd: 'def x := 1' }, kind: 'env', rawId: 0 }, ctx);
    now += 600;
    await cache.put('y', { request: { kind: 'command', cmd: 'def y := x', env: -1 }, kind: 'env', rawId: 1 }, ctx);
    now += 600;

    expect(cache.list().map((s) => s.key)).toEqual(['y']);
    await cache.load();

    expect(cache.list()).toEqual([]);
    expect(await readdir(dir)).toEqual([]);
    expect(logger.event).toHaveBeenCalledWith({ type: 'state-evicted', key: 'x', id: -1, reason: 'max-age' });
    expect(logger.event).toHaveBeenCalledWith({ type: 'state-evicted', key: 'y', id: -2, reason: 'dependency' });
  });

  it('replays states in creation order through the live ids of their parents', async () => {
    const cache = new ReplaySessionCache({ dir, logger });
    const setup = makeContext();
    await cache.put('x', { request: { kind: 'command', cmd: 'def x := 1' }, kind: 'env', rawId: 5 }, setup.ctx);
    await cache.put('y', { request: { kind: 'command', cmd: 'def y := x', env: -1 }, kind: 'env', rawId: 6 }, setup.ctx);

    const { ctx, sent, live } = makeContext();
    const outcome = await cache.replayAll(ctx);

    expect(outcome.failures).toEqual([]);
    expect(outcome.restored.map((s) => s.key)).toEqual(['x', 'y']);
    expect(sent).toEqual([
      { kind: 'command', cmd: 'def x := 1' },
      { kind: 'command', cmd: 'def y := x', env: 0 },
    ]);
    expect(live.get(-2)).toBe(1);
    expect(ctx.send).toHaveBeenCalledWith({ kind: 'command', cmd: 'def x := 1' }, 'replay');
  });

  it('reports a rejected replay and skips its dependents', async () => {
    const cache = new ReplaySessionCache({ dir, logger });
    const setup = makeContext();
    await cache.put('x', { request: { kind: 'command', cmd: 'def x := 1' }, kind: 'env', rawId: 0 }, setup.ctx);
    await cache.put('y', { request: { kind: 'command', cmd: 'def y := x', env: -1 }, kind: 'env', rawId: 1 }, setup.ctx);

    const { ctx, sent } = makeContext(async () => ({ kind: 'error', message: 'unknown constant' }));
    const outcome = await cache.replayAll(ctx);

    expect(outcome.restored).toEqual([]);
    expect(outcome.failures.map((f) => f.toWarning())).toEqual([
      {
        key: 'x',
        id: -1,
        error: 'CacheReplayFailureError',
        message: 'Could not replay pinned state -1 (x): REPL rejected replay: unknown constant',
      },
      {
        key: 'y',
        id: -2,
        error: 'CacheReplayFailureError',
        message: 'Could not replay pinned state -2 (y): parent env -1 was not restored',
      },
    ]);
    expect(sent).toHaveLength(1);
    expect(cache.size).toBe(2);
    expect(logger.event).toHaveBeenCalledWith(
      { type: 'replay-failed', key: 'x', id: -1, error: 'REPL rejected replay: unknown constant' },
      'warn',
    );
  });
});

describe('ReplaySessionCache retention and recovery', () => {
  let dir: string;
  let logger: Logger;

  beforeEach(async () => {
    dir = await makeTempDir();
    logger = makeMockLogger();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('refuses a pin whose lineage cannot fit in maxEntries', async () => {
    const cache = new ReplaySessionCache({ dir, logger, maxEntries: 1 });
    const { ctx } = makeContext();
    await cache.put('x', { request: { kind: 'command', cmd: 'def x := 1' }, kind: 'env', rawId: 0 }, ctx);
    const child = { kind: 'command' as const, cmd: 'def y := x', env: -1 };

    expect(cache.pinRestriction(child)).toBe('Cannot pin a state that needs 2 cache entries; sessionCache.maxEntries is 1');
    await expect(cache.put('y', { request: child, kind: 'env', rawId: 1 }, ctx)).rejects.toThrow(SessionCacheError);
    expect(cache.list().map((s) => s.key)).toEqual(['x']);
  });

  it('never evicts the new state or its parents to make room', async () => {
    const cache = new ReplaySessionCache({ dir, logger, maxEntries: 2 });
    const { ctx } = makeContext();
    await cache.put('a', { request: { kind: 'command', cmd: 'def a := 1' }, kind: 'env', rawId: 0 }, ctx);
    await cache.put('u', { request: { kind: 'command', cmd: 'def u := 1' }, kind: 'env', rawId: 1 }, ctx);

    const b = await cache.put('b', { request: { kind: 'command', cmd: 'def b := a', env: -1 }, kind: 'env', rawId: 2 }, ctx);

    expect(b.id).toBe(-3);
    expect(cache.getById(-3)).toEqual(b);
    expect(cache.list().map((s) => s.key)).toEqual(['a', 'b']);
    expect(logger.event).toHaveBeenCalledWith({ type: 'state-evicted', key: 'u', id: -2, reason: 'max-entries' });
  });

  it('replays children onto their own parent when instances sharing a directory reused an id', async () => {
    let now = Date.parse('2026-03-01T00:00:00.000Z');
    const clock = () => now;
    const first = new ReplaySessionCache({ dir, logger, now: clock });
    const second = new ReplaySessionCache({ dir, logger, now: clock });
    const { ctx } = makeContext();
    await first.put('a', { request: { kind: 'command', cmd: 'def a := 1' }, kind: 'env', rawId: 0 }, ctx);
    now += 1000;
    await second.put('b', { request: { kind: 'command', cmd: 'def b := 1' }, kind: 'env', rawId: 0 }, ctx);
    now += 1000;
    await second.put('c', { request: { kind: 'command', cmd: 'def c := b', env: -1 }, kind: 'env', rawId: 1 }, ctx);

    const reader = new ReplaySessionCache({ dir, logger, now: clock });
    const loaded = await reader.load();
    expect(loaded.map((s) => [s.key, s.id])).toEqual([
      ['a', -1],
      ['b', -2],
      ['c', -3],
    ]);

    const replay = makeContext();
    const outcome = await reader.replayAll(replay.ctx);

    expect(outcome.failures).toEqual([]);
    expect(replay.sent).toEqual([
      { kind: 'command', cmd: 'def a := 1' },
      { kind: 'command', cmd: 'def b := 1' },
      { kind: 'command', cmd: 'def c := b', env: 1 },
    ]);
    expect(replay.live.get(-3)).toBe(2);
  });

  it('discards a state whose replay kills the process and replays the rest in a new one', async () => {
    const cache = new ReplaySessionCache({ dir, logger });
    const setup = makeContext();
    await cache.put('x', { request: { kind: 'command', cmd: 'def x := 1' }, kind: 'env', rawId: 0 }, setup.ctx);
    await cache.put('y', { request: { kind: 'command', cmd: 'def y := x', env: -1 }, kind: 'env', rawId: 1 }, setup.ctx);
    await cache.put('u', { request: { kind: 'command', cmd: 'def u := 1' }, kind: 'env', rawId: 2 }, setup.ctx);

    const crash = new ProcessTerminatedError('REPL exited with code 137', 137, null, 'out of memory');
    let nextEnv = 0;
    const { ctx, sent, live } = makeContext(async (request) => {
      if (request.kind === 'command' && request.cmd === 'def x := 1') throw crash;
      return { kind: 'command', env: nextEnv++, messages: [], sorries: [] };
    });

    const outcome = await cache.replayAll(ctx);

    expect(ctx.respawn).toHaveBeenCalledTimes(1);
    expect(ctx.respawn).toHaveBeenCalledWith(crash);
    expect(sent).toEqual([
      { kind: 'command', cmd: 'def x := 1' },
      { kind: 'command', cmd: 'def u := 1' },
    ]);
    expect(outcome.restored.map((s) => s.key)).toEqual(['u']);
    expect(live.get(-3)).toBe(0);
    expect(outcome.failures.map((f) => f.message)).toEqual([
      'Could not replay pinned state -1 (x): REPL failed during replay: REPL exited with code 137',
      'Could not replay pinned state -2 (y): parent env -1 was discarded',
    ]);
    expect(await readdir(dir)).toEqual(['u.json']);
    expect(logger.event).toHaveBeenCalledWith({ type: 'state-evicted', key: 'x', id: -1, reason: 'replay-failed' });
    expect(logger.event).toHaveBeenCalledWith({ type: 'state-evicted', key: 'y', id: -2, reason: 'dependency' });
  });

  it('lets errors other than transport failures escape', async () => {
    const cache = new ReplaySessionCache({ dir, logger });
    await cache.put('x', { request: { kind: 'command', cmd: 'def x := 1' }, kind: 'env', rawId: 0 }, makeContext().ctx);

    const { ctx } = makeContext(async () => {
      throw new Error('bind failed');
    });

    await expect(cache.replayAll(ctx)).rejects.toThrow('bind failed');
    expect(ctx.respawn).not.toHaveBeenCalled();
    expect(cache.size).toBe(1);
  });
});

describe('PickleSessionCache', () => {
  let dir: string;
  let logger: Logger;

  beforeEach(async () => {
    dir = await makeTempDir();
    logger = makeMockLogger();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  /** Writes a pickle wherever it is asked to, like the REPL does. */
  async function pickler(request: ReplRequest): Promise<ReplResponse> {
    if (request.kind === 'pickleEnvironment') {
      await writeFile(request.pickleTo, 'env-bytes');
      return { kind: 'command', env: request.env, messages: [], sorries: [] };
    }
    if (request.kind === 'pickleProofState') {
      await writeFile(request.pickleTo, 'proof-state-bytes');
      return { kind: 'proofStep', proofState: request.proofState, goals: [], messages: [], sorries: [] };
    }
    if (request.kind === 'unpickleEnvironment') {
      return { kind: 'command', env: 11, messages: [], sorries: [] };
    }
    return { kind: 'proofStep', proofState: 12, goals: [], messages: [], sorries: [] };
  }

  it('pins any request by pickling the live state', async () => {
    const cache = new PickleSessionCache({ dir, logger });
    const { ctx, sent } = makeContext(pickler);

    const state = await cache.put(
      'step',
      { request: { kind: 'proofStep', tactic: 'intro h', proofState: 4 }, kind: 'proofState', rawId: 9 },
      ctx,
    );

    const target = join(dir, 'step.olean');
    expect(state.artifact).toBe(target);
    expect(state.sizeEstimate).toBe('proof-state-bytes'.length);
    expect(await readFile(target, 'utf-8')).toBe('proof-state-bytes');
    expect(sent).toHaveLength(1);
    expect(sent[0]).toMatchObject({ kind: 'pickleProofState', proofState: 9 });
    expect(ctx.send).toHaveBeenCalledWith(expect.anything(), 'pin');
    expect((await readdir(dir)).sort()).toEqual(['step.json', 'step.olean']);
  });

  it('removes the temporary pickle when the REPL refuses', async () => {
    const cache = new PickleSessionCache({ dir, logger });
    const { ctx } = makeContext(async () => ({ kind: 'error', message: 'Unknown environment.' }));

    await expect(
      cache.put('x', { request: { kind: 'command', cmd: 'def x := 1' }, kind: 'env', rawId: 0 }, ctx),
    ).rejects.toThrow('REPL could not pickle env state: Unknown environment.');
    expect(await readdir(dir)).toEqual([]);
    expect(cache.size).toBe(0);
  });

  it('replays by unpickling', async () => {
    const cache = new PickleSessionCache({ dir, logger });
    await cache.put('x', { request: { kind: 'command', cmd: 'def x := 1' }, kind: 'env', rawId: 0 }, makeContext(pickler).ctx);
    await cache.put(
      'p',
      { request: { kind: 'proofStep', tactic: 'skip', proofState: 3 }, kind: 'proofState', rawId: 3 },
      makeContext(pickler).ctx,
    );

    const { ctx, sent, live } = makeContext(pickler);
    const outcome = await cache.replayAll(ctx);

    expect(outcome.failures).toEqual([]);
    expect(sent).toEqual([
      { kind: 'unpickleEnvironment', unpickleEnvFrom: join(dir, 'x.olean') },
      { kind: 'unpickleProofState', unpickleProofStateFrom: join(dir, 'p.olean') },
    ]);
    expect(live.get(-1)).toBe(11);
    expect(live.get(-2)).toBe(12);
  });

  it('deletes the pickle with its entry', async () => {
    const cache = new PickleSessionCache({ dir, logger });
    await cache.put('x', { request: { kind: 'command', cmd: 'def x := 1' }, kind: 'env', rawId: 0 }, makeContext(pickler).ctx);

    await cache.clear('x');

    expect(await readdir(dir)).toEqual([]);
  });
});

describe('session cache helpers', () => {
  it('derives keys from the request kind and content', () => {
    const key = sessionKeyFor({ kind: 'command', cmd: 'def x := 1' });
    expect(key).toMatch(/^command-[0-9a-f]{16}$/);
    expect(sessionKeyFor({ cmd: 'def x := 1', kind: 'command' })).toBe(key);
    expect(sessionKeyFor({ kind: 'command', cmd: 'def x := 2' })).not.toBe(key);
  });

  it('createSessionCache picks the strategy', () => {
    const logger = makeMockLogger();
    expect(createSessionCache({ dir: '/tmp/c', strategy: 'pickle' }, logger)).toBeInstanceOf(PickleSessionCache);
    expect(createSessionCache({ dir: '/tmp/c', strategy: 'replay' }, logger)).toBeInstanceOf(ReplaySessionCache);
  });
});
