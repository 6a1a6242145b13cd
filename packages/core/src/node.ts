import type { NodeId } from "./arena";
import type { Scope } from "./scope";

/**
 * In terms of the [three-colors
 * algorithm](https://dev.to/modderme123/super-charging-fine-grained-reactive-performance-47ph),
 *
 * - "clean" = the node's value is known to be current,
 *
 * - "check" = one of the node's ancestors may have changed,
 *
 * - "dirty" = one of the node's direct sources has changed.
 */
export type NodeState = "clean" | "check" | "dirty";

/**
 * Edges keyed by slot. At most one live node occupies a slot, and disposing a
 * node removes it from all its partners, so the slot is enough to dedupe.
 * Iteration follows insertion order.
 */
export type EdgeSet = Map<number, NodeId>;

interface NodeBase {
  readonly id: NodeId;
  state: NodeState;
  /**
   * Nodes read during the last run.
   */
  readonly sources: EdgeSet;
  /**
   * Nodes that read this node during their last run.
   */
  readonly subscribers: EdgeSet;
}

export interface SignalNode extends NodeBase {
  readonly kind: "signal";
}

/**
 * A node that carries no value and exists only to be tracked and notified.
 */
export interface TriggerNode extends NodeBase {
  readonly kind: "trigger";
}

interface ComputationBase extends NodeBase {
  /**
   * Runs the user callback and stores its result in a cell shared with the
   * node's handle. Returns whether the value changed.
   */
  readonly compute: () => boolean;
  /**
   * The scope the node was created in.
   */
  readonly owner: Scope;
  /**
   * Child scope of `owner` in which the last run happened. It is disposed
   * before the next run.
   */
  scope?: Scope;
  running: boolean;
  /**
   * Set when the last run threw, so that the next resolution recomputes even
   * though the node is "clean".
   */
  stale: boolean;
}

export interface MemoNode extends ComputationBase {
  readonly kind: "memo";
}

export interface EffectNode extends ComputationBase {
  readonly kind: "effect";
  queued: boolean;
}

export type ComputationNode = MemoNode | EffectNode;

export type ReactiveNode = SignalNode | TriggerNode | ComputationNode;

export const isComputation = (node: ReactiveNode): node is ComputationNode =>
  node.kind === "memo" || node.kind === "effect";

export const hasEdge = (edges: EdgeSet, id: NodeId): boolean =>
  edges.get(id.slot)?.generation === id.generation;

export const createSignalNode = (id: NodeId): SignalNode => ({
  kind: "signal",
  id,
  state: "clean",
  sources: new Map(),
  subscribers: new Map(),
});

export const createTriggerNode = (id: NodeId): TriggerNode => ({
  kind: "trigger",
  id,
  state: "clean",
  sources: new Map(),
  subscribers: new Map(),
});

/**
 * Memos start out dirty and are computed on first read.
 */
export const createMemoNode = (
  id: NodeId,
  compute: () => boolean,
  owner: Scope
): MemoNode => ({
  kind: "memo",
  id,
  state: "dirty",
  sources: new Map(),
  subscribers: new Map(),
  compute,
  owner,
  running: false,
  stale: false,
});

export const createEffectNode = (
  id: NodeId,
  compute: () => boolean,
  owner: Scope
): EffectNode => ({
  kind: "effect",
  id,
  state: "dirty",
  sources: new Map(),
  subscribers: new Map(),
  compute,
  owner,
  running: false,
  stale: false,
  queued: false,
});
