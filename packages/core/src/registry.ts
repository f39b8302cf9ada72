/**
 * Generic Registry<K, V>
 *
 * A Map-backed registry that rejects duplicate keys, with an atomic
 * compute-if-absent lookup. Backs the descriptor cache and the index of
 * reflected declarations.
 */

/**
 * Options for creating a Registry instance.
 */
export interface RegistryOptions {
  /** Name for error messages */
  name?: string;
}

export interface GenericRegistry<K, V> extends Iterable<[K, V]> {
  /** Register a new entry; throws if `key` is already present */
  set(key: K, value: V): void;

  /** Get an entry by key */
  get(key: K): V | undefined;

  /**
   * Return the entry for `key`, computing and storing it first when absent.
   * `compute` runs at most once per key unless it throws.
   */
  getOrCompute(key: K, compute: (key: K) => V): V;

  has(key: K): boolean;

  keys(): IterableIterator<K>;

  values(): IterableIterator<V>;

  readonly size: number;

  clear(): void;

  [Symbol.iterator](): IterableIterator<[K, V]>;
}

class GenericRegistryImpl<K, V> implements GenericRegistry<K, V> {
  private store = new Map<K, V>();
  private readonly name: string;

  constructor(options: RegistryOptions = {}) {
    this.name = options.name ?? "Registry";
  }

  set(key: K, value: V): void {
    if (this.store.has(key)) {
      throw new Error(`${this.name}: entry for key '${String(key)}' already exists`);
    }
    this.store.set(key, value);
  }

  get(key: K): V | undefined {
    return this.store.get(key);
  }

  getOrCompute(key: K, compute: (key: K) => V): V {
    const existing = this.store.get(key);
    if (existing !== undefined) return existing;
    const computed = compute(key);
    // compute may have populated the key itself (re-entrant lookups); keep the first value
    const raced = this.store.get(key);
    if (raced !== undefined) return raced;
    this.store.set(key, computed);
    return computed;
  }

  has(key: K): boolean {
    return this.store.has(key);
  }

  keys(): IterableIterator<K> {
    return this.store.keys();
  }

  values(): IterableIterator<V> {
    return this.store.values();
  }

  get size(): number {
    return this.store.size;
  }

  clear(): void {
    this.store.clear();
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.store[Symbol.iterator]();
  }
}

/**
 * Create a new generic registry instance.
 *
 * @example
 * ```typescript
 * const declarations = createGenericRegistry<string, ts.Declaration>({
 *   name: "Declarations",
 * });
 * declarations.set("User", userDecl);
 * declarations.set("User", otherDecl); // throws: entry already exists
 * ```
 */
export function createGenericRegistry<K, V>(options?: RegistryOptions): GenericRegistry<K, V> {
  return new GenericRegistryImpl<K, V>(options);
}
