export type { NodeId } from "./arena";
export { createContext, hasContext, provideContext, useContext } from "./context";
export type { Context } from "./context";
export { derive } from "./derive";
export { createEffect } from "./effect";
export type { Effect } from "./effect";
export {
  BorrowConflictError,
  DisposedError,
  MissingContextError,
} from "./errors";
export { createMemo } from "./memo";
export type { Memo, MemoOptions } from "./memo";
export { createRuntime } from "./runtime";
export type { Log, Runtime, RuntimeOptions } from "./runtime";
export { batch, untrack } from "./scheduler";
export {
  createRoot,
  createRootScope,
  createScope,
  disposeScope,
  getCurrentScope,
  isScopeDisposed,
  onDispose,
  runInScope,
} from "./scope";
export type { Scope } from "./scope";
export { createRwSignal, createSignal } from "./signal";
export type { ReadSignal, RwSignal, WriteSignal } from "./signal";
export { storeValue } from "./storedValue";
export type { StoredValue } from "./storedValue";
export { createTrigger } from "./trigger";
export type { Trigger } from "./trigger";
export { watch } from "./watch";
