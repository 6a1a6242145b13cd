import { NodeId } from "./arena";
import { hasEdge, ReactiveNode } from "./node";
import { lookupNode, Runtime } from "./runtime";

export const getObserver = (runtime: Runtime): NodeId | undefined =>
  runtime.observers[runtime.observers.length - 1];

/**
 * Runs `callback` with `observer` as the node that collects dependencies.
 * Pass `undefined` to run the callback untracked.
 */
export const withObserver = <T>(
  runtime: Runtime,
  observer: NodeId | undefined,
  callback: () => T
): T => {
  runtime.observers.push(observer);
  try {
    return callback();
  } finally {
    runtime.observers.pop();
  }
};

/**
 * Records that the current observer has read `sourceId`. Does nothing outside
 * of a tracked computation.
 */
export const trackRead = (runtime: Runtime, sourceId: NodeId): void => {
  const observerId = getObserver(runtime);
  // A computation that reads itself gets a `BorrowConflictError`, not an edge.
  if (!observerId || observerId.slot === sourceId.slot) {
    return;
  }
  const observer = lookupNode(runtime, observerId);
  const source = lookupNode(runtime, sourceId);
  // The observer can be disposed while it is running, e.g. by a `watch` that
  // stops itself.
  if (!observer || !source || hasEdge(observer.sources, sourceId)) {
    return;
  }
  observer.sources.set(sourceId.slot, sourceId);
  source.subscribers.set(observerId.slot, observerId);
};

/**
 * Removes the edges from `node` to its sources. Called right before the node
 * is recomputed, so that its sources are exactly what the new run reads.
 */
export const clearSources = (runtime: Runtime, node: ReactiveNode): void => {
  for (const sourceId of node.sources.values()) {
    const source = lookupNode(runtime, sourceId);
    if (source && hasEdge(source.subscribers, node.id)) {
      source.subscribers.delete(node.id.slot);
    }
  }
  node.sources.clear();
};

/**
 * Removes every edge `node` takes part in.
 */
export const detachNode = (runtime: Runtime, node: ReactiveNode): void => {
  clearSources(runtime, node);
  for (const subscriberId of node.subscribers.values()) {
    const subscriber = lookupNode(runtime, subscriberId);
    if (subscriber && hasEdge(subscriber.sources, node.id)) {
      subscriber.sources.delete(node.id.slot);
    }
  }
  node.subscribers.clear();
};
