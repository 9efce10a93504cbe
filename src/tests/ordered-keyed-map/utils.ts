/**
 * Copyright (c) Microsoft Corporation.
 * Licensed under the MIT License.
 * =================================================================
 * Random utils that don't really fit anywhere
 */

import type { OrderedMapType } from "../../ordered-map";

export const ORDER_TYPES: OrderedMapType[] = ["red-black-tree", "b+tree"];

/**
 * mulberry32: a small seeded generator, so a failing run can be replayed.
 * Returns floats in [0, 1).
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export interface ITestingMap {
  get(k: number): number | undefined;

  has(k: number): boolean;

  put(k: number, v: number): void;

  putIfAbsent(k: number, v: number): void;

  delete(k: number): void;

  pop(k: number): number | undefined;

  keys(): number[];

  values(): number[];

  slice(start: number, length: number): [number, number][];

  get size(): number;
}
