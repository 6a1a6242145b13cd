import { getItem, lookup } from "./arena";
import { allocateStoredValue, requireScope } from "./scope";
import { ReadSignal } from "./signal";
import { withObserver } from "./tracker";

/**
 * Wraps a function of other reactive values in the read-only signal
 * interface. Nothing is cached: `compute` runs on every read, and a tracked
 * read subscribes the reader to whatever `compute` reads. Use a memo when
 * the function is expensive or its result should be compared.
 *
 * The wrapper is owned by the current scope like a stored value, and `id` is
 * its id among the stored values.
 */
export const derive = <Value>(compute: () => Value): ReadSignal<Value> => {
  const scope = requireScope("derive");
  const { runtime } = scope;
  const id = allocateStoredValue(scope, { value: compute });
  const get = () => {
    getItem(runtime.storedValues, id);
    return compute();
  };
  const getUntracked = () => withObserver(runtime, undefined, get);
  return {
    id,
    get,
    with: (callback) => callback(get()),
    getUntracked,
    withUntracked: (callback) => callback(getUntracked()),
    tryGet: () => (lookup(runtime.storedValues, id) ? get() : undefined),
    tryWith: (callback) =>
      lookup(runtime.storedValues, id) ? callback(get()) : undefined,
  };
};
