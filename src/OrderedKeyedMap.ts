import { Map as ImmutableMap } from "immutable";
import { eq, isEqual } from "lodash";
import { formatValue } from "./format";
import { KeyConflictError } from "./KeyConflictError";
import { IOrderedKeyedMapLogger, LogWriter } from "./LogWriter";
import {
  createOrderedMap,
  IOrderedMap,
  OrderedMapType,
  REVERSE_COMPARATOR,
} from "./ordered-map";
import {
  ReduceCommand,
  Reducer,
  ReduceResult,
  Reducible,
  reduceIterator,
  slice as sliceReducible,
} from "./Reducible";

export interface OrderedKeyedMapOptions {
  /** Backend of the insertion order index. Defaults to "red-black-tree". */
  orderType?: OrderedMapType;
  logger?: IOrderedKeyedMapLogger;
}

export type FetchResult<V> =
  | { readonly found: true; readonly value: V }
  | { readonly found: false };

/** Returned from a getAndUpdate callback to remove the key instead. */
export const POP: unique symbol = Symbol("pop");

export type UpdateFunction<V, R> = (
  current: V | undefined,
) => readonly [R, V] | typeof POP;

interface Slot<V> {
  readonly stamp: number;
  readonly value: V;
}

/** Set storage turns -0 into +0, as Map keys do. */
function canonicalKey<K>(key: K): K {
  if (!Object.is(key, -0)) {
    return key;
  }
  const [canonical = key] = new Set([key]);
  return canonical;
}

/**
 * An immutable map that iterates in first-insertion order.
 *
 * Two views are kept in step: `_order` maps an insertion stamp to its key and
 * sorts newest first, and `_lookup` maps a key to its stamp and value. Every
 * mutator returns a new map sharing structure with the receiver.
 */
export class OrderedKeyedMap<K, V>
  implements Iterable<[K, V]>, Reducible<[K, V]>
{
  private constructor(
    private readonly _order: IOrderedMap<number, K>,
    private readonly _lookup: ImmutableMap<K, Slot<V>>,
    private readonly _size: number,
    private readonly _nextStamp: number,
    private readonly _options: OrderedKeyedMapOptions,
  ) {}

  public static empty<K, V>(
    options: OrderedKeyedMapOptions = {},
  ): OrderedKeyedMap<K, V> {
    return new OrderedKeyedMap<K, V>(
      createOrderedMap<number, K>(options.orderType, REVERSE_COMPARATOR),
      ImmutableMap<K, Slot<V>>(),
      0,
      0,
      options,
    );
  }

  /**
   * Collects `pairs` left to right. A repeated key keeps the position of its
   * first occurrence and the value of its last.
   */
  public static from<K, V>(
    pairs: Iterable<readonly [K, V]>,
    options?: OrderedKeyedMapOptions,
  ): OrderedKeyedMap<K, V> {
    return OrderedKeyedMap.empty<K, V>(options).putAll(pairs);
  }

  public get size(): number {
    return this._size;
  }

  public get orderType(): OrderedMapType {
    return this._options.orderType ?? "red-black-tree";
  }

  public count(): number {
    return this._size;
  }

  public has(key: K): boolean {
    return this._lookup.has(key);
  }

  public member(key: K): boolean {
    return this.has(key);
  }

  public get(key: K): V | undefined;
  public get<D>(key: K, defaultValue: D): V | D;
  public get<D>(key: K, defaultValue?: D): V | D | undefined {
    // slots are objects, so only a missing key reads as undefined
    const slot = this._lookup.get(key);
    return slot === undefined ? defaultValue : slot.value;
  }

  public fetch(key: K): FetchResult<V> {
    const slot = this._lookup.get(key);
    return slot === undefined
      ? { found: false }
      : { found: true, value: slot.value };
  }

  public put(key: K, value: V): OrderedKeyedMap<K, V> {
    const slot = this._lookup.get(key);
    if (slot !== undefined) {
      if (Object.is(slot.value, value)) {
        return this;
      }
      return this.derive(
        this._order,
        this._lookup.set(key, { stamp: slot.stamp, value }),
        this._size,
        this._nextStamp,
      );
    }
    const stamp = this._nextStamp;
    return this.derive(
      this._order.set(stamp, canonicalKey(key)),
      this._lookup.set(key, { stamp, value }),
      this._size + 1,
      stamp + 1,
    );
  }

  public putIfAbsent(key: K, value: V): OrderedKeyedMap<K, V> {
    return this._lookup.has(key) ? this : this.put(key, value);
  }

  /** @throws KeyConflictError when `key` is already present. */
  public putIfAbsentOrFail(key: K, value: V): OrderedKeyedMap<K, V> {
    if (this._lookup.has(key)) {
      if (this._options.logger) {
        new LogWriter(this._options.logger).error(
          "Rejected insert of existing key",
          { orderType: this.orderType, key: formatValue(key), size: this._size },
        );
      }
      throw new KeyConflictError(key, this.toString());
    }
    return this.put(key, value);
  }

  /** Folds `pairs` in with `put` semantics, building each view once. */
  public putAll(pairs: Iterable<readonly [K, V]>): OrderedKeyedMap<K, V> {
    const added: [number, K][] = [];
    let nextStamp = this._nextStamp;
    let changed = false;
    const lookup = this._lookup.withMutations((draft) => {
      for (const [key, value] of pairs) {
        const slot = draft.get(key);
        if (slot === undefined) {
          draft.set(key, { stamp: nextStamp, value });
          added.push([nextStamp, canonicalKey(key)]);
          nextStamp++;
          changed = true;
        } else if (!Object.is(slot.value, value)) {
          draft.set(key, { stamp: slot.stamp, value });
          changed = true;
        }
      }
    });
    if (!changed) {
      return this;
    }
    return this.derive(
      added.length ? this._order.setMany(added) : this._order,
      lookup,
      this._size + added.length,
      nextStamp,
    );
  }

  public delete(key: K): OrderedKeyedMap<K, V> {
    const slot = this._lookup.get(key);
    if (slot === undefined) {
      return this;
    }
    return this.derive(
      this._order.delete(slot.stamp),
      this._lookup.delete(key),
      Math.max(this._size - 1, 0),
      this._nextStamp,
    );
  }

  public pop(key: K): [V | undefined, OrderedKeyedMap<K, V>] {
    const slot = this._lookup.get(key);
    if (slot === undefined) {
      return [undefined, this];
    }
    return [slot.value, this.delete(key)];
  }

  /**
   * Hands the current value (undefined when absent) to `update`. A returned
   * `[result, next]` stores `next` and yields `result`; `POP` removes the key
   * and yields its former value.
   */
  public getAndUpdate<R>(
    key: K,
    update: UpdateFunction<V, R>,
  ): [R | V | undefined, OrderedKeyedMap<K, V>] {
    const outcome = update(this.get(key));
    if (outcome === POP) {
      return this.pop(key);
    }
    const [result, next] = outcome;
    return [result, this.put(key, next)];
  }

  public keys(): K[] {
    return Array.from(this._order.entriesReversed(), ({ value }) => value);
  }

  public values(): V[] {
    return Array.from(this.entries(), ([, value]) => value);
  }

  public *entries(): IterableIterator<[K, V]> {
    for (const { value: key } of this._order.entriesReversed()) {
      const slot = this._lookup.get(key);
      if (slot !== undefined) {
        yield [key, slot.value];
      }
    }
  }

  public [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  public reduce<A>(
    command: ReduceCommand<A>,
    reducer: Reducer<[K, V], A>,
  ): ReduceResult<A> {
    return reduceIterator(this.entries(), command, reducer);
  }

  /**
   * Up to `length` entries from insertion position `start`. A negative
   * `start` counts back from the end.
   */
  public slice(start: number, length: number): [K, V][] {
    const from = start < 0 ? Math.max(this._size + start, 0) : start;
    if (from >= this._size) {
      return [];
    }
    return sliceReducible(this, from, length);
  }

  /** Same keys in the same order, with deeply equal values. */
  public equals(other: OrderedKeyedMap<K, V>): boolean {
    if (other === this) {
      return true;
    }
    if (other._size !== this._size) {
      return false;
    }
    const theirs = other.entries();
    for (const [key, value] of this.entries()) {
      const next = theirs.next();
      if (next.done || !eq(key, next.value[0]) || !isEqual(value, next.value[1])) {
        return false;
      }
    }
    return true;
  }

  public toString(): string {
    const body = Array.from(
      this.entries(),
      ([key, value]) => `${formatValue(key)} => ${formatValue(value)}`,
    ).join(", ");
    return `OrderedKeyedMap {${body}}`;
  }

  private derive(
    order: IOrderedMap<number, K>,
    lookup: ImmutableMap<K, Slot<V>>,
    size: number,
    nextStamp: number,
  ): OrderedKeyedMap<K, V> {
    return new OrderedKeyedMap(order, lookup, size, nextStamp, this._options);
  }
}
