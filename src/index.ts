export {
  OrderedKeyedMap,
  POP,
  type FetchResult,
  type OrderedKeyedMapOptions,
  type UpdateFunction,
} from "./OrderedKeyedMap";
export { KeyConflictError } from "./KeyConflictError";
export {
  LogWriter,
  type ILoggerContext,
  type IOrderedKeyedMapLogger,
} from "./LogWriter";
export {
  cont,
  find,
  fromIterable,
  halt,
  reduceIterator,
  slice,
  suspend,
  take,
  toArray,
  zip,
  type Continuation,
  type ReduceCommand,
  type Reducer,
  type ReduceResult,
  type Reducible,
} from "./Reducible";
export type { OrderedMapType } from "./ordered-map";
