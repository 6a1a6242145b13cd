import { NodeId } from "./arena";
import { BorrowConflictError } from "./errors";
import {
  ComputationNode,
  EffectNode,
  NodeState,
  ReactiveNode,
  hasEdge,
  isComputation,
} from "./node";
import { Runtime, getNode, lookupNode } from "./runtime";
import {
  Scope,
  createRunScope,
  disposeScope,
  getParentScope,
  getScopeOwner,
  isScopeDisposed,
  runInScope,
} from "./scope";
import { clearSources, withObserver } from "./tracker";

/**
 * Reads the state through a call so that TS does not carry a narrowed state
 * across code that may change it.
 */
const stateOf = (node: ReactiveNode): NodeState => node.state;

const needsUpdate = (node: ReactiveNode) =>
  stateOf(node) !== "clean" || (isComputation(node) && node.stale);

/**
 * Adds an effect to the pending queue unless it's already there. A running
 * effect is queued once its run is over.
 */
const enqueue = (runtime: Runtime, node: EffectNode) => {
  if (!node.queued && !node.running) {
    node.queued = true;
    runtime.pendingEffects.push(node.id);
  }
};

/**
 * Marks the direct subscribers of `node` as dirty and the rest of its
 * descendants as at least "check", and queues up any effects that are no
 * longer clean. A node that was not clean has already had its descendants
 * marked, so we don't traverse past it.
 */
const markSubscribers = (runtime: Runtime, node: ReactiveNode) => {
  // Depth-first traversal with a stack of iterators, so that effects are
  // queued in the order they subscribed.
  const stack: Iterator<NodeId>[] = [node.subscribers.values()];
  while (stack.length) {
    const direct = stack.length === 1;
    const result = stack[stack.length - 1]!.next();
    if (result.done) {
      stack.pop();
      continue;
    }
    const subscriber = lookupNode(runtime, result.value);
    if (!subscriber) {
      continue;
    }
    if (stateOf(subscriber) === "clean") {
      subscriber.state = direct ? "dirty" : "check";
      if (subscriber.kind === "effect") {
        enqueue(runtime, subscriber);
      }
      if (subscriber.subscribers.size) {
        stack.push(subscriber.subscribers.values());
      }
    } else if (direct) {
      subscriber.state = "dirty";
    }
  }
};

/**
 * The push phase of a write to a signal or a trigger.
 */
export const markDirty = (runtime: Runtime, id: NodeId): void => {
  const node = getNode(runtime, id);
  node.state = "dirty";
  markSubscribers(runtime, node);
  // A signal has nothing to recompute: the change now lives in the dirty
  // marks of its subscribers.
  node.state = "clean";
};

/**
 * Throws if a memo that is currently running has already read `id`, since
 * writing to it would invalidate the value the memo is computing.
 */
export const assertWritable = (runtime: Runtime, id: NodeId): void => {
  for (const observerId of runtime.observers) {
    if (observerId) {
      const observer = lookupNode(runtime, observerId);
      if (
        observer &&
        observer.kind === "memo" &&
        observer.running &&
        hasEdge(observer.sources, id)
      ) {
        throw new BorrowConflictError(
          id,
          "A memo cannot write to a signal that it has read in the same run."
        );
      }
    }
  }
};

/**
 * Re-runs a memo or an effect in a fresh scope, collecting a fresh set of
 * sources. Returns whether the value changed (always `true` for effects).
 */
const update = (runtime: Runtime, node: ComputationNode): boolean => {
  if (node.scope && !isScopeDisposed(node.scope)) {
    disposeScope(node.scope);
  }
  clearSources(runtime, node);
  const scope = createRunScope(node.owner, node.id);
  node.scope = scope;
  // Marks made while the node is running are for the next run.
  node.state = "clean";
  node.stale = false;
  node.running = true;
  let changed: boolean;
  try {
    changed = withObserver(runtime, node.id, () =>
      runInScope(scope, node.compute)
    );
  } catch (error) {
    node.stale = true;
    throw error;
  } finally {
    node.running = false;
    if (
      node.kind === "effect" &&
      stateOf(node) !== "clean" &&
      lookupNode(runtime, node.id) === node
    ) {
      enqueue(runtime, node);
    }
  }
  if (changed) {
    markSubscribers(runtime, node);
  }
  return changed;
};

/**
 * The pull phase: makes sure the node is clean, recomputing it (and before
 * it, whichever of its sources need it) only if one of its sources has
 * actually changed. Returns whether the node's value changed.
 *
 * Signals and triggers are always clean by the time anything resolves them,
 * and disposed nodes are treated as clean.
 */
export const resolve = (runtime: Runtime, id: NodeId): boolean => {
  const node = lookupNode(runtime, id);
  if (!node || !isComputation(node)) {
    return false;
  }
  if (node.running) {
    throw new BorrowConflictError(
      id,
      "Cyclical dependency: a memo or an effect has read itself while running."
    );
  }
  if (!needsUpdate(node)) {
    return false;
  }
  if (stateOf(node) === "check" && !node.stale) {
    try {
      for (const sourceId of Array.from(node.sources.values())) {
        resolve(runtime, sourceId);
        // As soon as a single source has marked us dirty, we can stop
        // checking the rest.
        if (stateOf(node) === "dirty") {
          break;
        }
      }
    } catch (error) {
      // Leave the node in a state where the next resolution retries it.
      node.state = "clean";
      node.stale = true;
      throw error;
    }
    if (stateOf(node) !== "dirty") {
      node.state = "clean";
      return false;
    }
  }
  return update(runtime, node);
};

/**
 * Returns the nearest memo or effect that created `effect` (via the scope of
 * one of its runs) and that may re-run. If it does re-run, `effect` will be
 * disposed, so it has to be resolved first.
 */
const findOwnerToResolve = (
  runtime: Runtime,
  effect: EffectNode
): ComputationNode | undefined => {
  for (
    let scope: Scope | undefined = effect.owner;
    scope;
    scope = getParentScope(scope)
  ) {
    const ownerId = getScopeOwner(scope);
    if (ownerId) {
      const owner = lookupNode(runtime, ownerId);
      if (
        owner &&
        isComputation(owner) &&
        !owner.running &&
        needsUpdate(owner)
      ) {
        return owner;
      }
    }
  }
};

/**
 * Resolves an effect taken off the pending queue.
 */
export const resolveEffect = (runtime: Runtime, effect: EffectNode): void => {
  const owner = findOwnerToResolve(runtime, effect);
  if (owner) {
    if (owner.kind === "effect") {
      resolveEffect(runtime, owner);
    } else {
      resolve(runtime, owner.id);
    }
    if (lookupNode(runtime, effect.id) !== effect) {
      return;
    }
  }
  resolve(runtime, effect.id);
};
