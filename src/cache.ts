/**
 * Memoizes async computations by a structural key. Entries stay until they
 * are invalidated; a rejected computation is dropped so it can be retried.
 */
export class TaskCache<T> {
  private readonly entries = new Map<string, Promise<T>>();

  get(key: string, compute: () => Promise<T>): Promise<T> {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = compute().catch((err: unknown) => {
        this.entries.delete(key);
        throw err;
      });
      this.entries.set(key, entry);
    }
    return entry;
  }

  /** Drops the entries whose key matches `predicate`. */
  invalidate(predicate: (key: string) => boolean): void {
    for (const key of [...this.entries.keys()]) {
      if (predicate(key)) this.entries.delete(key);
    }
  }
}
