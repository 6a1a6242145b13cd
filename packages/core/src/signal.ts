import { NodeId } from "./arena";
import { createSignalNode } from "./node";
import { assertWritable } from "./propagation";
import { Runtime, getNode, lookupNode } from "./runtime";
import { notify } from "./scheduler";
import { Scope, allocateNode, requireScope } from "./scope";
import { trackRead } from "./tracker";

export interface ReadSignal<Value> {
  readonly id: NodeId;
  /**
   * Returns the current value. Inside a memo or an effect, also subscribes
   * that computation to this node.
   */
  get(): Value;
  with<Result>(callback: (value: Value) => Result): Result;
  getUntracked(): Value;
  withUntracked<Result>(callback: (value: Value) => Result): Result;
  /**
   * Same as `get`, but returns `undefined` instead of throwing once the node
   * is disposed.
   */
  tryGet(): Value | undefined;
  tryWith<Result>(callback: (value: Value) => Result): Result | undefined;
}

export interface WriteSignal<Value> {
  readonly id: NodeId;
  /**
   * Stores the value and runs whatever depends on it. There is no equality
   * check: every write notifies.
   */
  set(value: Value): void;
  update(callback: (value: Value) => Value): void;
  /**
   * Stores the value without notifying anyone.
   */
  setUntracked(value: Value): void;
  updateUntracked(callback: (value: Value) => Value): void;
  /**
   * Returns `false` instead of throwing if the node is disposed.
   */
  trySet(value: Value): boolean;
}

export interface RwSignal<Value> extends ReadSignal<Value>, WriteSignal<Value> {
  readOnly(): ReadSignal<Value>;
  writeOnly(): WriteSignal<Value>;
}

/**
 * Builds read operations over a node. `read` returns the node's current
 * value, throwing `DisposedError` if the node is gone.
 */
export const createReadHandle = <Value>(
  runtime: Runtime,
  id: NodeId,
  read: () => Value
): ReadSignal<Value> => {
  // The edge is recorded even if `read` throws, so that a memo which failed
  // still reaches the computation that read it once it recovers.
  const get = () => {
    try {
      return read();
    } finally {
      trackRead(runtime, id);
    }
  };
  return {
    id,
    get,
    with: (callback) => callback(get()),
    getUntracked: read,
    withUntracked: (callback) => callback(read()),
    tryGet: () => (lookupNode(runtime, id) ? get() : undefined),
    tryWith: (callback) =>
      lookupNode(runtime, id) ? callback(get()) : undefined,
  };
};

const createWriteHandle = <Value>(
  runtime: Runtime,
  id: NodeId,
  cell: { value: Value }
): WriteSignal<Value> => {
  const setUntracked = (value: Value) => {
    getNode(runtime, id);
    assertWritable(runtime, id);
    cell.value = value;
  };
  const set = (value: Value) => {
    setUntracked(value);
    notify(runtime, id);
  };
  return {
    id,
    set,
    update: (callback) => {
      getNode(runtime, id);
      set(callback(cell.value));
    },
    setUntracked,
    updateUntracked: (callback) => {
      getNode(runtime, id);
      setUntracked(callback(cell.value));
    },
    trySet: (value) => {
      if (!lookupNode(runtime, id)) {
        return false;
      }
      set(value);
      return true;
    },
  };
};

const createSignalIn = <Value>(
  scope: Scope,
  value: Value
): readonly [read: ReadSignal<Value>, write: WriteSignal<Value>] => {
  const { runtime } = scope;
  const cell = { value };
  const id = allocateNode(scope, createSignalNode);
  return [
    createReadHandle(runtime, id, () => {
      getNode(runtime, id);
      return cell.value;
    }),
    createWriteHandle(runtime, id, cell),
  ];
};

/**
 * Creates a signal owned by the current scope.
 */
export const createSignal = <Value>(
  value: Value
): readonly [read: ReadSignal<Value>, write: WriteSignal<Value>] =>
  createSignalIn(requireScope("createSignal"), value);

/**
 * Same as `createSignal`, but with reads and writes on a single handle.
 */
export const createRwSignal = <Value>(value: Value): RwSignal<Value> => {
  const [read, write] = createSignalIn(requireScope("createRwSignal"), value);
  return {
    ...read,
    ...write,
    readOnly: () => read,
    writeOnly: () => write,
  };
};
