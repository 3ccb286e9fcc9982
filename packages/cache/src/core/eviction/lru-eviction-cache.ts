import type {
  EvictionCache,
  EvictionCacheOptions,
  EvictionListener,
} from "../../ports/eviction-cache"
import { assertValidCapacity } from "../errors"
import { type RecencyHandle, RecencyList } from "../recency/recency-list"

type LruEntry<K, V> = {
  readonly key: K
  value: V
}

/**
 * Least-recently-used {@link EvictionCache}.
 *
 * A `Map` from key to list handle gives O(1) lookup; the {@link RecencyList}
 * gives O(1) promotion and eviction. `keys()` is O(size).
 */
export class LruEvictionCache<K, V> implements EvictionCache<K, V> {
  readonly capacity: number

  private readonly index = new Map<K, RecencyHandle>()
  private readonly recency = new RecencyList<LruEntry<K, V>>()
  private readonly onEvict: EvictionListener<K, V> | undefined

  constructor(opts: EvictionCacheOptions<K, V>) {
    assertValidCapacity(opts.capacity)

    this.capacity = opts.capacity
    this.onEvict = opts.onEvict
  }

  get(key: K): V | undefined {
    const handle = this.index.get(key)

    if (handle === undefined) return undefined

    this.recency.moveToFront(handle)

    return this.recency.get(handle).value
  }

  put(key: K, value: V): void {
    const handle = this.index.get(key)

    if (handle !== undefined) {
      this.recency.get(handle).value = value
      this.recency.moveToFront(handle)

      return
    }

    this.index.set(key, this.recency.pushFront({ key, value }))

    if (this.index.size > this.capacity) this.evictLeastRecentlyUsed()
  }

  delete(key: K): boolean {
    const handle = this.index.get(key)

    if (handle === undefined) return false

    this.index.delete(key)
    this.recency.remove(handle)

    return true
  }

  has(key: K): boolean {
    return this.index.has(key)
  }

  size(): number {
    return this.index.size
  }

  keys(): K[] {
    return this.recency.toArray().map((entry) => entry.key)
  }

  victim(): K | undefined {
    const handle = this.recency.back()

    return handle === undefined ? undefined : this.recency.get(handle).key
  }

  private evictLeastRecentlyUsed(): void {
    const handle = this.recency.back()

    if (handle === undefined) {
      throw new Error("Invariant violation: recency list is empty while over capacity")
    }

    const { key, value } = this.recency.remove(handle)
    this.index.delete(key)

    this.onEvict?.(key, value)
  }
}

export function createLruEvictionCache<K, V>(
  opts: EvictionCacheOptions<K, V>,
): EvictionCache<K, V> {
  return new LruEvictionCache<K, V>(opts)
}
