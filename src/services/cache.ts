interface CacheEntry<V> {
  value: V;
  expires_at: number;
}

export class TTLCache<V> {
  private store = new Map<string, CacheEntry<V>>();
  private pending = new Map<string, Promise<V>>();
  private readonly default_ttl_ms: number;
  private readonly max_entries: number;

  constructor(ttl_seconds = 300, max_entries = 500) {
    this.default_ttl_ms = ttl_seconds * 1000;
    this.max_entries = max_entries;
  }

  get(key: string): V | undefined {
    const entry = this.store.get(key);
    if (!entry) return undefined;
    if (Date.now() > entry.expires_at) {
      this.store.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V, ttl_ms?: number): void {
    if (this.store.size >= this.max_entries && !this.store.has(key)) {
      // Oldest insertion goes first.
      const oldest = this.store.keys().next();
      if (!oldest.done) this.store.delete(oldest.value);
    }
    this.store.set(key, {
      value,
      expires_at: Date.now() + (ttl_ms ?? this.default_ttl_ms),
    });
  }

  /**
   * Cached value, or the loader's result stored under `key` when `store`
   * accepts it. Callers asking for the same key while a load is running
   * share that load.
   */
  async getOrLoad(
    key: string,
    loader: () => Promise<V>,
    store: (value: V) => boolean = () => true
  ): Promise<V> {
    if (this.store.has(key)) {
      const cached = this.get(key);
      if (cached !== undefined) return cached;
    }
    const inflight = this.pending.get(key);
    if (inflight) return inflight;

    const load = loader()
      .then((value) => {
        if (store(value)) this.set(key, value);
        return value;
      })
      .finally(() => this.pending.delete(key));
    this.pending.set(key, load);
    return load;
  }

  clear(): void {
    this.store.clear();
    this.pending.clear();
  }
}
