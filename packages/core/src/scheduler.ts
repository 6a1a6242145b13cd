import { label } from "@1log/core";
import { NodeId } from "./arena";
import { markDirty, resolveEffect } from "./propagation";
import { Runtime, lookupNode } from "./runtime";
import { getCurrentScope, requireScope } from "./scope";
import { withObserver } from "./tracker";

/**
 * Runs pending effects in the order they were queued. Does nothing inside a
 * batch, or if the queue is already being drained further up the stack (in
 * which case effects queued now will be picked up by that drain).
 *
 * If an effect throws, the drain stops and the error is re-thrown. Effects
 * still in the queue stay there until the next drain.
 */
export const flushEffects = (runtime: Runtime): void => {
  if (runtime.batchDepth || runtime.flushing) {
    return;
  }
  runtime.flushing = true;
  try {
    for (
      let id = runtime.pendingEffects.shift();
      id;
      id = runtime.pendingEffects.shift()
    ) {
      const node = lookupNode(runtime, id);
      if (node && node.kind === "effect") {
        node.queued = false;
        resolveEffect(runtime, node);
      }
    }
  } catch (error) {
    runtime.log.add(label("aborted pass"))(error);
    throw error;
  } finally {
    runtime.flushing = false;
  }
};

/**
 * Propagates a change of a signal or a trigger.
 */
export const notify = (runtime: Runtime, id: NodeId): void => {
  markDirty(runtime, id);
  flushEffects(runtime);
};

/**
 * Defers running effects until `callback` returns, so that several writes
 * result in a single run of each affected effect.
 *
 * Effects still run if the callback throws. The callback's error is then the
 * one re-thrown, and an error from an effect is re-thrown in a microtask.
 */
export const batch = <T>(callback: () => T): T => {
  const { runtime } = requireScope("batch");
  runtime.batchDepth++;
  let result: T;
  try {
    result = callback();
  } catch (error) {
    runtime.batchDepth--;
    try {
      flushEffects(runtime);
    } catch (effectError) {
      queueMicrotask(() => {
        throw effectError;
      });
    }
    throw error;
  }
  runtime.batchDepth--;
  flushEffects(runtime);
  return result;
};

/**
 * Runs `callback` without registering the reads it makes as dependencies of
 * the current memo or effect.
 */
export const untrack = <T>(callback: () => T): T => {
  const scope = getCurrentScope();
  return scope ? withObserver(scope.runtime, undefined, callback) : callback();
};
