export type OrderedMapType = "b+tree" | "red-black-tree";

export type Comparator<K> = (a: K, b: K) => number;
