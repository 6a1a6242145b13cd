import { createEffect } from "./effect";
import { untrack } from "./scheduler";
import { requireScope } from "./scope";

/**
 * Tracks `deps` and calls `callback` with the new value, the previous value
 * and what the callback returned last time. The callback itself is not
 * tracked. Unless `immediate` is `true`, the first evaluation of `deps` only
 * records the value. Returns a function that stops watching.
 */
export const watch = <Value, Result = void>(
  deps: () => Value,
  callback: (
    value: Value,
    previousValue: Value | undefined,
    previousResult: Result | undefined
  ) => Result,
  immediate = false
): (() => void) => {
  requireScope("watch");
  let hasRun = false;
  let previousValue: Value | undefined;
  let previousResult: Result | undefined;
  const effect = createEffect(() => {
    const value = deps();
    if (immediate || hasRun) {
      const oldValue = previousValue;
      previousValue = value;
      previousResult = untrack(() =>
        callback(value, oldValue, previousResult)
      );
    } else {
      previousValue = value;
    }
    hasRun = true;
  });
  return effect.dispose;
};
