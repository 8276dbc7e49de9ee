/**
 * Run-scoped identifier → payload map. Entries are never replaced or evicted:
 * ancestor resolution relies on every ancestor seen earlier in the run still
 * being here.
 */
export class ResolvedItemCache<TItem> {
  private readonly entries = new Map<string, TItem>();

  has(id: string): boolean {
    return this.entries.has(id);
  }

  get(id: string): TItem | undefined {
    return this.entries.get(id);
  }

  /** Stores the item unless the identifier is already present. */
  set(id: string, item: TItem): boolean {
    if (this.entries.has(id)) return false;
    this.entries.set(id, item);
    return true;
  }

  /** Merges the results of one concurrent round; returns how many were new. */
  merge(items: Iterable<readonly [string, TItem]>): number {
    let added = 0;
    for (const [id, item] of items) {
      if (this.set(id, item)) added += 1;
    }
    return added;
  }

  missing(ids: Iterable<string>): string[] {
    return Array.from(new Set(ids)).filter((id) => !this.entries.has(id));
  }

  get size(): number {
    return this.entries.size;
  }
}
