import type { ImportScope } from '@rollcall/types';

export type DedupOutcome = 'accepted' | 'duplicate';

/**
 * Exact-key deduplication of voter ids within an import scope.
 * Holds one index per scope for the life of a run; the sink's unique
 * constraint remains the arbiter across processes.
 */
export class Deduplicator {
  private readonly indexes = new Map<string, Set<string>>();

  static scopeKey(scope: ImportScope): string {
    return `${scope.state_code.toUpperCase()}::${scope.table}`;
  }

  /**
   * Start (or extend) the index for a scope with ids already committed
   */
  seed(scope: ImportScope, existingIds: Iterable<string>): void {
    const index = this.indexFor(scope);
    for (const id of existingIds) {
      index.add(id);
    }
  }

  checkAndRecord(scope: ImportScope, voterId: string): DedupOutcome {
    const index = this.indexFor(scope);
    if (index.has(voterId)) {
      return 'duplicate';
    }
    index.add(voterId);
    return 'accepted';
  }

  size(scope: ImportScope): number {
    return this.indexes.get(Deduplicator.scopeKey(scope))?.size ?? 0;
  }

  release(scope: ImportScope): void {
    this.indexes.delete(Deduplicator.scopeKey(scope));
  }

  private indexFor(scope: ImportScope): Set<string> {
    const key = Deduplicator.scopeKey(scope);
    let index = this.indexes.get(key);
    if (!index) {
      index = new Set();
      this.indexes.set(key, index);
    }
    return index;
  }
}

export default Deduplicator;
