export type StateKind = 'env' | 'proofState';

interface Binding {
  kind: StateKind;
  rawId: number;
}

// Shared by every registry in this OS process so that a public id minted by
// one supervisor is never live in another.
let nextPublicId = 0;

function allocatePublicId(): number {
  return nextPublicId++;
}

/**
 * Maps the ids callers hold to the ids of the current REPL process.
 *
 * Public ids (>= 0) are minted per response and die with the process. Logical
 * ids (< 0) belong to pinned session states and are rebound after each replay.
 */
export class IdRegistry {
  private readonly bindings = new Map<number, Binding>();

  /** Mint a public id for a raw id the live process just returned. */
  bindPublic(rawId: number, kind: StateKind): number {
    const id = allocatePublicId();
    this.bindings.set(id, { kind, rawId });
    return id;
  }

  /** Point a pinned state's logical id at a raw id of the live process. */
  bindLogical(logicalId: number, rawId: number, kind: StateKind): void {
    this.bindings.set(logicalId, { kind, rawId });
  }

  /** The raw id behind `id`, or undefined when it is not live or of another kind. */
  resolve(id: number, kind: StateKind): number | undefined {
    const binding = this.bindings.get(id);
    return binding && binding.kind === kind ? binding.rawId : undefined;
  }

  isLive(id: number): boolean {
    return this.bindings.has(id);
  }

  unbind(id: number): void {
    this.bindings.delete(id);
  }

  /** Forget everything; called when the process that minted the raw ids is gone. */
  reset(): void {
    this.bindings.clear();
  }

  get size(): number {
    return this.bindings.size;
  }
}
