import {
  empty,
  get,
  has,
  iterateFromFirst,
  iterateFromLast,
  RedBlackTreeStructure,
  remove,
  set,
} from "@collectable/red-black-tree";
import type { IKeyValuePair } from "./IKeyValuePair";
import type { IOrderedMap } from "./IOrderedMap";
import type { Comparator } from "./OrderedMapType";

export class RBTreeOrderedMap<K, V> implements IOrderedMap<K, V> {
  private readonly _tree: RedBlackTreeStructure<K, V>;

  constructor(
    private readonly _comparator: Comparator<K>,
    tree?: RedBlackTreeStructure<K, V>,
  ) {
    // immutable trees: set/remove hand back a modified copy
    this._tree = tree ?? empty<K, V>(_comparator, false);
  }

  public get size(): number {
    return this._tree._size;
  }

  public get(key: K, defaultValue?: V): V | undefined {
    // a stored value may be falsy, so presence comes from has()
    return has(key, this._tree) ? get(key, this._tree) : defaultValue;
  }

  public set(key: K, value: V): RBTreeOrderedMap<K, V> {
    return new RBTreeOrderedMap(this._comparator, set(key, value, this._tree));
  }

  public setMany(entries: Iterable<readonly [K, V]>): RBTreeOrderedMap<K, V> {
    let tree = this._tree;
    for (const [key, value] of entries) {
      tree = set(key, value, tree);
    }
    return new RBTreeOrderedMap(this._comparator, tree);
  }

  public has(key: K): boolean {
    return has(key, this._tree);
  }

  public delete(key: K): RBTreeOrderedMap<K, V> {
    if (!has(key, this._tree)) {
      return this;
    }
    return new RBTreeOrderedMap(this._comparator, remove(key, this._tree));
  }

  public entries(): IterableIterator<IKeyValuePair<K, V>> {
    return iterateFromFirst(this._tree);
  }

  public entriesReversed(): IterableIterator<IKeyValuePair<K, V>> {
    return iterateFromLast(this._tree);
  }
}
