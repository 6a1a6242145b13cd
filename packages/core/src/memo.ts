import { createMemoNode } from "./node";
import { resolve } from "./propagation";
import { getNode } from "./runtime";
import { allocateNode, requireScope } from "./scope";
import { ReadSignal, createReadHandle } from "./signal";

export type Memo<Value> = ReadSignal<Value>;

export interface MemoOptions<Value> {
  /**
   * When this returns `true` for the previous and the new value, the memo
   * keeps the previous value and its subscribers are not re-run. Defaults to
   * `Object.is`.
   */
  equals?: (previous: Value, next: Value) => boolean;
}

/**
 * Creates a lazily evaluated derived value. `callback` runs on the first
 * read, and afterwards on a read that follows a change in one of the values
 * it read last time. It gets the previous value, or `undefined` on the first
 * run.
 */
export const createMemo = <Value>(
  callback: (previous: Value | undefined) => Value,
  { equals = Object.is }: MemoOptions<Value> = {}
): Memo<Value> => {
  const scope = requireScope("createMemo");
  const { runtime } = scope;
  let value: Value;
  let hasValue = false;
  const id = allocateNode(scope, (id) =>
    createMemoNode(
      id,
      () => {
        const next = callback(hasValue ? value : undefined);
        if (hasValue && equals(value, next)) {
          return false;
        }
        value = next;
        hasValue = true;
        return true;
      },
      scope
    )
  );
  return createReadHandle(runtime, id, () => {
    getNode(runtime, id);
    resolve(runtime, id);
    return value;
  });
};
