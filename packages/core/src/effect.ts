import { NodeId } from "./arena";
import { createEffectNode } from "./node";
import { resolve } from "./propagation";
import { flushEffects } from "./scheduler";
import { allocateNode, disposeNode, requireScope } from "./scope";

export interface Effect {
  readonly id: NodeId;
  /**
   * Disposes the effect. A run that is in progress is not interrupted. Safe
   * to call more than once.
   */
  dispose(): void;
}

/**
 * Runs `callback` now, and again after any value it read changes. The
 * callback gets what it returned the previous time.
 */
export const createEffect = <Value>(
  callback: (previous: Value | undefined) => Value
): Effect => {
  const scope = requireScope("createEffect");
  const { runtime } = scope;
  let value: Value | undefined;
  const id = allocateNode(scope, (id) =>
    createEffectNode(
      id,
      () => {
        value = callback(value);
        return true;
      },
      scope
    )
  );
  resolve(runtime, id);
  flushEffects(runtime);
  return {
    id,
    dispose: () => {
      disposeNode(runtime, id);
    },
  };
};
