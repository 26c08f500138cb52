/**
 * Bounded cache of resolved library units.
 * Least recently used entries are evicted first.
 */
export class UnitCache<T> {
  private readonly entries = new Map<string, T>();

  constructor(readonly maxSize: number) {}

  get(uri: string): T | undefined {
    const entry = this.entries.get(uri);
    if (entry !== undefined) {
      // Re-insert to mark as most recently used
      this.entries.delete(uri);
      this.entries.set(uri, entry);
    }
    return entry;
  }

  set(uri: string, entry: T): void {
    if (this.entries.has(uri)) {
      this.entries.delete(uri);
    } else if (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }
    this.entries.set(uri, entry);
  }

  has(uri: string): boolean {
    return this.entries.has(uri);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
