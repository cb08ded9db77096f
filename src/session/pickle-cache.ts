import { rename, stat } from 'node:fs/promises';
import { join } from 'node:path';
import {
  SessionCache,
  type CacheContext,
  type SessionState,
  type StateSnapshot,
} from './session-cache.js';
import { removeFile, tempPathFor } from '../util/fs.js';
import { SessionCacheError } from '../errors.js';
import type { ReplRequest } from '../protocol/requests.js';

/**
 * Has the REPL pickle each pinned state to `<key>.olean` and rebuilds it by
 * unpickling. Entries are self-contained, so any request can be pinned.
 */
export class PickleSessionCache extends SessionCache {
  readonly strategy = 'pickle' as const;

  protected strategyRestriction(): string | null {
    return null;
  }

  protected async createArtifact(
    key: string,
    snapshot: StateSnapshot,
    ctx: CacheContext,
  ): Promise<{ artifact: string; sizeEstimate: number; dependsOn: string[] }> {
    const target = join(this.dir, `${key}.olean`);
    // The REPL writes the pickle itself; a rename makes it appear whole.
    const tmpPath = tempPathFor(target, '.olean');
    const request: ReplRequest =
      snapshot.kind === 'env'
        ? { kind: 'pickleEnvironment', env: snapshot.rawId, pickleTo: tmpPath }
        : { kind: 'pickleProofState', proofState: snapshot.rawId, pickleTo: tmpPath };

    const response = await ctx.send(request, 'pin');
    if (response.kind === 'error') {
      await removeFile(tmpPath);
      throw new SessionCacheError(`REPL could not pickle ${snapshot.kind} state: ${response.message}`, key, {
        stage: 'pin',
      });
    }

    await rename(tmpPath, target);
    const { size } = await stat(target);
    return { artifact: target, sizeEstimate: size, dependsOn: [] };
  }

  protected restoreRequest(state: SessionState): ReplRequest | string {
    if (!state.artifact) return 'entry has no pickle file';
    return state.kind === 'env'
      ? { kind: 'unpickleEnvironment', unpickleEnvFrom: state.artifact }
      : { kind: 'unpickleProofState', unpickleProofStateFrom: state.artifact };
  }

  protected async removeArtifact(state: SessionState): Promise<void> {
    if (state.artifact) await removeFile(state.artifact);
  }
}
