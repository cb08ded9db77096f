import {
  SessionCache,
  type CacheContext,
  type SessionState,
  type StateSnapshot,
} from './session-cache.js';
import { mapParentIds, parentRefs, type PinnableRequest, type ReplRequest } from '../protocol/requests.js';

/**
 * Stores the originating request and rebuilds a state by issuing it again.
 * A request is pinnable only when every parent it names is itself pinned.
 *
 * Parents are found again through the stored `dependsOn` keys, never the
 * numeric ids in the stored request: another instance sharing the directory
 * may have loaded the parent under a different id.
 */
export class ReplaySessionCache extends SessionCache {
  readonly strategy = 'replay' as const;

  protected strategyRestriction(request: PinnableRequest): string | null {
    for (const ref of parentRefs(request)) {
      const parent = this.getById(ref.id);
      if (!parent || parent.kind !== ref.kind) {
        return `Cannot pin a request whose parent ${ref.kind} ${ref.id} is not pinned`;
      }
    }
    return null;
  }

  protected parentKeys(request: PinnableRequest): string[] {
    const keys: string[] = [];
    for (const ref of parentRefs(request)) {
      const parent = this.getById(ref.id);
      if (parent) keys.push(parent.key);
    }
    return keys;
  }

  protected async createArtifact(
    _key: string,
    snapshot: StateSnapshot,
  ): Promise<{ sizeEstimate: number; dependsOn: string[] }> {
    return { sizeEstimate: this.canonicalSize(snapshot.request), dependsOn: this.parentKeys(snapshot.request) };
  }

  protected restoreRequest(state: SessionState, ctx: CacheContext): ReplRequest | string {
    const live = new Map<number, number>();
    for (const [i, ref] of parentRefs(state.request).entries()) {
      const parentKey = state.dependsOn[i];
      const parent = parentKey === undefined ? undefined : this.get(parentKey);
      const rawId = parent && parent.kind === ref.kind ? ctx.resolve(parent.id, parent.kind) : undefined;
      if (rawId === undefined) {
        return `parent ${ref.kind} ${parent?.id ?? ref.id} was not restored`;
      }
      live.set(ref.id, rawId);
    }
    return mapParentIds(state.request, (ref) => live.get(ref.id) ?? ref.id);
  }

  protected async removeArtifact(): Promise<void> {
    // The metadata file is the whole artifact.
  }
}
