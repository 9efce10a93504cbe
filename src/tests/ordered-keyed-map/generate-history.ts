/**
 * Copyright (c) Microsoft Corporation.
 * Licensed under the MIT License.
 * =================================================================
 * Seeded random command histories for model testing the map against
 * the reference map.
 */

import { Command, HistoryList } from "./shrink";
import { createRandom } from "./utils";

const ALL_COMMANDS: Command[] = [
  "GET",
  "HAS",
  "PUT",
  "PUT",
  "PUT_NEW",
  "DELETE",
  "POP",
  "KEYS",
  "VALUES",
  "SLICE",
];

// 0 shows up often as a stored value
const VALUE_RANGE = 4;
const MAX_SLICE_LENGTH = 5;

export function generateHistory(
  seed: number,
  numOps: number,
  keyRange: number,
): HistoryList {
  const random = createRandom(seed);
  const history: HistoryList = [];
  for (let opIdx = 0; opIdx < numOps; opIdx++) {
    const cmd = ALL_COMMANDS[Math.floor(random() * ALL_COMMANDS.length)];
    // biased towards the low end of the key range
    const k = Math.floor(Math.abs(random() - random()) * keyRange);
    const v = Math.floor(random() * VALUE_RANGE);
    // negative starts count from the end
    const start = Math.floor(random() * (keyRange + 4)) - 2;
    const length = Math.floor(random() * MAX_SLICE_LENGTH);
    history.push([cmd, k, v, start, length]);
  }
  return history;
}
