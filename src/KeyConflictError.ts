import { formatValue } from "./format";

/** Raised when a key that must be new is already present. */
export class KeyConflictError<K = unknown> extends Error {
  constructor(
    public readonly key: K,
    public readonly mapDescription: string,
  ) {
    super(`key ${formatValue(key)} already exists in: ${mapDescription}`);
    this.name = "KeyConflictError";
  }
}
