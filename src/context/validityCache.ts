import { isContainedPath } from '../discovery/pathValidation.js';

interface CacheEntry {
  valid: boolean;
  expiresAt: number;
}

/**
 * TTL cache of worktree-validity results, keyed by normalized worktree root.
 *
 * Every operation is a synchronous Map mutation, so none of them can be
 * interleaved with another on the event loop.
 */
export class WorktreeValidityCache {
  private entries: Map<string, CacheEntry> = new Map();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  /** Cached validity, or undefined on a miss or an expired entry */
  get(key: string): boolean | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.valid;
  }

  set(key: string, valid: boolean): void {
    this.entries.set(key, { valid, expiresAt: this.now() + this.ttlMs });
  }

  /**
   * Drop every entry whose key lies under `normalizedRoot`
   * @returns number of entries removed
   */
  invalidateUnder(normalizedRoot: string): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (isContainedPath(normalizedRoot, key)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
