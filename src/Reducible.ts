/**
 * Step-wise folding over a sequence. A reducer answers every element with a
 * command: keep going, stop now, or pause and hand control back to the caller
 * together with a continuation that resumes at the next unvisited element.
 */

export type ReduceCommand<A> =
  | { readonly kind: "cont"; readonly acc: A }
  | { readonly kind: "halt"; readonly acc: A }
  | { readonly kind: "suspend"; readonly acc: A };

export type Continuation<A> = (command: ReduceCommand<A>) => ReduceResult<A>;

export type ReduceResult<A> =
  | { readonly kind: "done"; readonly acc: A }
  | { readonly kind: "halted"; readonly acc: A }
  | {
      readonly kind: "suspended";
      readonly acc: A;
      readonly continuation: Continuation<A>;
    };

export type Reducer<T, A> = (item: T, acc: A) => ReduceCommand<A>;

export interface Reducible<T> {
  reduce<A>(command: ReduceCommand<A>, reducer: Reducer<T, A>): ReduceResult<A>;
}

export const cont = <A>(acc: A): ReduceCommand<A> => ({ kind: "cont", acc });
export const halt = <A>(acc: A): ReduceCommand<A> => ({ kind: "halt", acc });
export const suspend = <A>(acc: A): ReduceCommand<A> => ({
  kind: "suspend",
  acc,
});

/**
 * Drives `reducer` over `iterator` from its current cursor. The iterator is
 * shared with any continuation handed out, so resuming never rescans.
 */
export function reduceIterator<T, A>(
  iterator: Iterator<T>,
  command: ReduceCommand<A>,
  reducer: Reducer<T, A>,
): ReduceResult<A> {
  let current = command;
  for (;;) {
    switch (current.kind) {
      case "halt":
        iterator.return?.();
        return { kind: "halted", acc: current.acc };
      case "suspend":
        return {
          kind: "suspended",
          acc: current.acc,
          continuation: (next) => reduceIterator(iterator, next, reducer),
        };
      case "cont": {
        const step = iterator.next();
        if (step.done) {
          return { kind: "done", acc: current.acc };
        }
        current = reducer(step.value, current.acc);
        break;
      }
    }
  }
}

export function fromIterable<T>(items: Iterable<T>): Reducible<T> {
  return {
    reduce<A>(command: ReduceCommand<A>, reducer: Reducer<T, A>) {
      return reduceIterator(items[Symbol.iterator](), command, reducer);
    },
  };
}

export function toArray<T>(source: Reducible<T>): T[] {
  return source.reduce<T[]>(cont([]), (item, acc) => {
    acc.push(item);
    return cont(acc);
  }).acc;
}

/**
 * Up to `length` elements starting at position `start`. Running past the end
 * yields what exists.
 */
export function slice<T>(
  source: Reducible<T>,
  start: number,
  length: number,
): T[] {
  if (length <= 0) {
    return [];
  }
  const taken: T[] = [];
  const state = { skip: Math.max(start, 0), taken };
  return source.reduce(cont(state), (item, acc) => {
    if (acc.skip > 0) {
      acc.skip--;
      return cont(acc);
    }
    acc.taken.push(item);
    return acc.taken.length < length ? cont(acc) : halt(acc);
  }).acc.taken;
}

export function take<T>(source: Reducible<T>, count: number): T[] {
  return slice(source, 0, count);
}

export function find<T>(
  source: Reducible<T>,
  predicate: (item: T) => boolean,
): T | undefined {
  const result = source.reduce<T | undefined>(cont(undefined), (item, acc) =>
    predicate(item) ? halt(item) : cont(acc),
  );
  return result.kind === "halted" ? result.acc : undefined;
}

interface Box<T> {
  readonly item: T;
}

/**
 * Pairs elements of two sources in lock step, stopping at the shorter one.
 * Each side is suspended after every element and resumed on demand.
 */
export function zip<L, R>(left: Reducible<L>, right: Reducible<R>): [L, R][] {
  const hold = <T>(item: T): ReduceCommand<Box<T> | undefined> =>
    suspend({ item });
  let l = left.reduce<Box<L> | undefined>(suspend(undefined), hold);
  let r = right.reduce<Box<R> | undefined>(suspend(undefined), hold);
  const pairs: [L, R][] = [];
  while (l.kind === "suspended" && r.kind === "suspended") {
    l = l.continuation(cont(l.acc));
    if (l.kind !== "suspended") {
      break;
    }
    r = r.continuation(cont(r.acc));
    if (r.kind !== "suspended" || l.acc === undefined || r.acc === undefined) {
      break;
    }
    pairs.push([l.acc.item, r.acc.item]);
  }
  // release whichever side is still parked
  if (l.kind === "suspended") {
    l.continuation(halt(l.acc));
  }
  if (r.kind === "suspended") {
    r.continuation(halt(r.acc));
  }
  return pairs;
}
