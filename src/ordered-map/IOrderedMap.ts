import type { IKeyValuePair } from "./IKeyValuePair";

/**
 * A persistent sorted map. Mutators return a new map that shares structure
 * with the receiver; the receiver is never changed.
 */
export interface IOrderedMap<K, V> {
  /** Gets the number of key-value pairs in the tree. */
  get size(): number;
  /**
   * Finds a pair in the tree and returns the associated value.
   * @param defaultValue a value to return if the key was not found.
   * @returns the value, or defaultValue if the key was not found.
   * @description Computational complexity: O(log size)
   */
  get(key: K, defaultValue?: V): V | undefined;
  /**
   * Returns a tree holding `value` under `key`, replacing any previous value.
   * @description Computational complexity: O(log size)
   */
  set(key: K, value: V): IOrderedMap<K, V>;
  /**
   * Returns a tree holding every pair of `entries`; a later pair replaces
   * the value of an earlier one with the same key.
   */
  setMany(entries: Iterable<readonly [K, V]>): IOrderedMap<K, V>;
  /**
   * Returns true if the key exists in the tree, false if not.
   * Use has() if you need to distinguish between "undefined value"
   * and "key not present".
   * @description Computational complexity: O(log size)
   */
  has(key: K): boolean;
  /**
   * Returns a tree without the pair stored under `key`. Returns the
   * receiver when the key is not present.
   * @description Computational complexity: O(log size)
   */
  delete(key: K): IOrderedMap<K, V>;
  /** Returns an iterator that provides items in comparator order. */
  entries(): IterableIterator<IKeyValuePair<K, V>>;
  /** Returns an iterator that provides items in reversed comparator order. */
  entriesReversed(): IterableIterator<IKeyValuePair<K, V>>;
}
