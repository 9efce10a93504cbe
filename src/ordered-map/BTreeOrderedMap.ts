import BTree from "sorted-btree";
import type { IKeyValuePair } from "./IKeyValuePair";
import type { IOrderedMap } from "./IOrderedMap";
import type { Comparator } from "./OrderedMapType";

export class BTreeOrderedMap<K, V> implements IOrderedMap<K, V> {
  private readonly _tree: BTree<K, V>;

  constructor(
    private readonly _comparator: Comparator<K>,
    tree?: BTree<K, V>,
  ) {
    this._tree = tree ?? new BTree<K, V>(undefined, _comparator);
  }

  public get size(): number {
    return this._tree.size;
  }

  public get(key: K, defaultValue?: V): V | undefined {
    return this._tree.get(key, defaultValue);
  }

  public set(key: K, value: V): BTreeOrderedMap<K, V> {
    // with() clones lazily; untouched nodes stay shared with this tree.
    // Without overwrite it hands back the receiver for an existing key.
    return new BTreeOrderedMap(
      this._comparator,
      this._tree.with(key, value, true),
    );
  }

  public setMany(entries: Iterable<readonly [K, V]>): BTreeOrderedMap<K, V> {
    // clone() shares every node until the copy writes to it
    const tree = this._tree.clone();
    for (const [key, value] of entries) {
      tree.set(key, value, true);
    }
    return new BTreeOrderedMap(this._comparator, tree);
  }

  public has(key: K): boolean {
    return this._tree.has(key);
  }

  public delete(key: K): BTreeOrderedMap<K, V> {
    if (!this._tree.has(key)) {
      return this;
    }
    return new BTreeOrderedMap(this._comparator, this._tree.without(key));
  }

  public *entries(): IterableIterator<IKeyValuePair<K, V>> {
    for (const value of this._tree.entries()) {
      yield this.toKeyValue(value);
    }
  }

  public *entriesReversed(): IterableIterator<IKeyValuePair<K, V>> {
    for (const value of this._tree.entriesReversed()) {
      yield this.toKeyValue(value);
    }
  }

  private toKeyValue([key, value]: [K, V]): IKeyValuePair<K, V> {
    return { key, value };
  }
}
