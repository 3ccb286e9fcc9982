/**
 * Fixed-capacity key/value store with recency-ordered eviction.
 *
 * Every operation is total: absent keys and repeated deletes are normal
 * outcomes, not errors.
 */
export interface EvictionCache<K, V> {
  /** Upper bound on {@link size}. */
  readonly capacity: number

  /**
   * Return the value for `key` and mark it most recently used.
   * Returns `undefined` without touching the ordering when absent.
   */
  get(key: K): V | undefined

  /**
   * Insert or overwrite `key` and mark it most recently used.
   *
   * An insert that takes the cache above `capacity` evicts exactly one
   * entry: the least recently used one. Overwrites never evict.
   */
  put(key: K, value: V): void

  /**
   * Remove `key`. Returns `true` if it was present.
   */
  delete(key: K): boolean

  /**
   * Membership test. Does not count as a use.
   */
  has(key: K): boolean

  size(): number

  /**
   * Snapshot of the held keys. The returned array is owned by the caller,
   * so deleting while iterating it is safe. Order is not part of the
   * contract.
   */
  keys(): K[]

  /**
   * Key the next overflowing `put` would evict, or `undefined` if empty.
   * Does not evict.
   */
  victim(): K | undefined
}

export type EvictionListener<K, V> = (key: K, value: V) => void

export type EvictionCacheOptions<K, V> = {
  /**
   * Maximum number of entries. Must be an integer >= 1.
   */
  capacity: number

  /**
   * Called once per capacity eviction, after the entry is gone.
   * Not called for explicit `delete`.
   */
  onEvict?: EvictionListener<K, V>
}
