import { noopLog } from "@1log/core";
import { Arena, NodeId, createArena, getItem, lookup } from "./arena";
import { ReactiveNode } from "./node";

export type Log = typeof noopLog;

export interface RuntimeOptions {
  /**
   * Receives diagnostics, such as an error that aborted a propagation pass.
   * Defaults to `noopLog`.
   */
  log?: Log;
}

/**
 * A value owned by a scope but not part of the reactive graph.
 */
export interface StoredCell {
  value: unknown;
}

/**
 * Everything the reactive graph needs. Runtimes share no state, so graphs
 * created in different runtimes never see each other's reads and writes.
 */
export interface Runtime {
  readonly nodes: Arena<ReactiveNode>;
  readonly storedValues: Arena<StoredCell>;
  /**
   * Nodes that are currently computing, innermost last. An `undefined` entry
   * is pushed by `untrack`.
   */
  readonly observers: (NodeId | undefined)[];
  /**
   * Effects that may need to re-run, in the order they were reached.
   */
  readonly pendingEffects: NodeId[];
  /**
   * The effect queue is only drained when this counter is 0.
   */
  batchDepth: number;
  flushing: boolean;
  readonly log: Log;
}

export const createRuntime = ({ log = noopLog }: RuntimeOptions = {}): Runtime => ({
  nodes: createArena(),
  storedValues: createArena(),
  observers: [],
  pendingEffects: [],
  batchDepth: 0,
  flushing: false,
  log,
});

export const lookupNode = (
  runtime: Runtime,
  id: NodeId
): ReactiveNode | undefined => lookup(runtime.nodes, id);

export const getNode = (runtime: Runtime, id: NodeId): ReactiveNode =>
  getItem(runtime.nodes, id);
