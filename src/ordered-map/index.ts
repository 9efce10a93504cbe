import { BTreeOrderedMap } from "./BTreeOrderedMap";
import type { IOrderedMap } from "./IOrderedMap";
import type { Comparator, OrderedMapType } from "./OrderedMapType";
import { RBTreeOrderedMap } from "./RBTreeOrderedMap";

export type { IKeyValuePair } from "./IKeyValuePair";
export type { IOrderedMap } from "./IOrderedMap";
export type { Comparator, OrderedMapType } from "./OrderedMapType";
export { BTreeOrderedMap, RBTreeOrderedMap };

export const DEFAULT_COMPARATOR = (a: number, b: number) =>
  a < b ? -1 : a === b ? 0 : 1;
export const REVERSE_COMPARATOR = (a: number, b: number) =>
  a > b ? -1 : a === b ? 0 : 1;

export const createOrderedMap = <K, V>(
  mapType: OrderedMapType | undefined,
  comparator: Comparator<K>,
): IOrderedMap<K, V> => {
  switch (mapType) {
    case "b+tree":
      return new BTreeOrderedMap<K, V>(comparator);
    case "red-black-tree":
    default:
      return new RBTreeOrderedMap<K, V>(comparator);
  }
};
