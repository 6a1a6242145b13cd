import { label } from "@1log/core";
import { NodeId, allocate, release } from "./arena";
import { ReactiveNode, isComputation } from "./node";
import { Runtime, StoredCell, createRuntime } from "./runtime";
import { detachNode } from "./tracker";

const parentSymbol = Symbol("parent");
const previousSymbol = Symbol("previous");
const nextSymbol = Symbol("next");
const disposedSymbol = Symbol("disposed");
const disposablesSymbol = Symbol("disposables");
const nodesSymbol = Symbol("nodes");
const storedValuesSymbol = Symbol("storedValues");
const ownerNodeSymbol = Symbol("ownerNode");

/**
 * Scopes form a tree, which is stored as a doubly-linked list in depth-first
 * order: a scope's descendants immediately follow it, and a new child is
 * inserted right after its parent.
 */
export interface Scope {
  readonly runtime: Runtime;
  [parentSymbol]?: Scope;
  [previousSymbol]?: Scope;
  [nextSymbol]?: Scope;
  [disposedSymbol]?: true;
  [disposablesSymbol]?: (() => void) | (() => void)[];
  [nodesSymbol]?: NodeId[];
  [storedValuesSymbol]?: NodeId[];
  /**
   * Present in the scope in which a memo or an effect runs, and points to
   * that node.
   */
  [ownerNodeSymbol]?: NodeId;
}

let currentScope: Scope | undefined;

export const getCurrentScope = (): Scope | undefined => currentScope;

export const getParentScope = (scope: Scope): Scope | undefined =>
  scope[parentSymbol];

/**
 * Returns the current scope, throwing a usage error naming `caller` if there
 * is none.
 */
export const requireScope = (caller: string): Scope => {
  if (!currentScope) {
    throw new Error(`\`${caller}\` must be called within a \`Scope\`.`);
  }
  return currentScope;
};

/**
 * Creates a scope with no parent. By default it belongs to the runtime of the
 * current scope, or to a new runtime if there is no current scope.
 */
export const createRootScope = (
  runtime: Runtime = currentScope ? currentScope.runtime : createRuntime()
): Scope => ({ runtime });

const createChildScope = (parent: Scope): Scope => {
  if (disposedSymbol in parent) {
    throw new Error("You cannot create a child scope in a disposed scope.");
  }
  const newScope: Scope = { runtime: parent.runtime };
  newScope[parentSymbol] = parent;
  newScope[previousSymbol] = parent;
  if (parent[nextSymbol]) {
    parent[nextSymbol][previousSymbol] = newScope;
    newScope[nextSymbol] = parent[nextSymbol];
  }
  parent[nextSymbol] = newScope;
  return newScope;
};

/**
 * Creates a child of the current scope, or a root scope with its own runtime
 * if there is no current scope.
 */
export const createScope = (): Scope =>
  currentScope ? createChildScope(currentScope) : createRootScope();

/**
 * Creates the scope in which a memo or an effect runs.
 */
export const createRunScope = (owner: Scope, node: NodeId): Scope => {
  const scope = createChildScope(owner);
  scope[ownerNodeSymbol] = node;
  return scope;
};

/**
 * Returns the memo or effect whose run created `scope`, if any.
 */
export const getScopeOwner = (scope: Scope): NodeId | undefined =>
  scope[ownerNodeSymbol];

const assertNotDisposed = (scope: Scope) => {
  if (disposedSymbol in scope) {
    throw new Error("You cannot create a reactive node in a disposed scope.");
  }
};

/**
 * Allocates a node in the scope's runtime and makes the scope responsible for
 * disposing it.
 */
export const allocateNode = (
  scope: Scope,
  create: (id: NodeId) => ReactiveNode
): NodeId => {
  assertNotDisposed(scope);
  const id = allocate(scope.runtime.nodes, create);
  if (scope[nodesSymbol]) {
    scope[nodesSymbol].push(id);
  } else {
    scope[nodesSymbol] = [id];
  }
  return id;
};

export const allocateStoredValue = (
  scope: Scope,
  cell: StoredCell
): NodeId => {
  assertNotDisposed(scope);
  const id = allocate(scope.runtime.storedValues, () => cell);
  if (scope[storedValuesSymbol]) {
    scope[storedValuesSymbol].push(id);
  } else {
    scope[storedValuesSymbol] = [id];
  }
  return id;
};

export const onDispose = (disposable: () => void): void => {
  const scope = requireScope("onDispose");
  // This would happen in `onDispose` callback.
  if (disposedSymbol in scope) {
    throw new Error("You cannot call `onDispose` in a disposed scope.");
  }
  if (disposablesSymbol in scope) {
    if (Array.isArray(scope[disposablesSymbol])) {
      scope[disposablesSymbol].push(disposable);
    } else {
      scope[disposablesSymbol] = [scope[disposablesSymbol], disposable];
    }
  } else {
    scope[disposablesSymbol] = disposable;
  }
};

/**
 * Releases the node, removes it from the graph, and disposes the scope of its
 * last run. A node that is currently running finishes its run, but the result
 * is discarded. Does nothing if the node is already disposed.
 */
export const disposeNode = (runtime: Runtime, id: NodeId): void => {
  const node = release(runtime.nodes, id);
  if (!node) {
    return;
  }
  detachNode(runtime, node);
  if (isComputation(node) && node.scope && !isScopeDisposed(node.scope)) {
    // eslint-disable-next-line no-use-before-define
    disposeScope(node.scope);
  }
};

/**
 * Marks `scope` and its descendants as disposed, and returns the "next" scope
 * from the last scope it traverses.
 */
const markAsDisposed = (scope: Scope): Scope | undefined => {
  let next = scope[nextSymbol];
  while (next && next[parentSymbol] === scope) {
    next = markAsDisposed(next);
  }

  scope[disposedSymbol] = true;

  return next;
};

const runDisposable = (scope: Scope, disposable: () => void) => {
  try {
    disposable();
  } catch (error) {
    scope.runtime.log.add(label("onDispose error"))(error);
    queueMicrotask(() => {
      throw error;
    });
  }
};

/**
 * For `scope` and its descendants, descendants first: runs disposables (last
 * registered first), then disposes owned nodes and stored values. Returns the
 * "next" scope from the last scope it traverses.
 */
const disposeContents = (scope: Scope): Scope | undefined => {
  let next = scope[nextSymbol];
  while (next && next[parentSymbol] === scope) {
    next = disposeContents(next);
  }

  const disposables = scope[disposablesSymbol];
  if (disposables) {
    delete scope[disposablesSymbol];
    const outerScope = currentScope;
    currentScope = scope;
    try {
      if (Array.isArray(disposables)) {
        for (let i = disposables.length - 1; i >= 0; i--) {
          runDisposable(scope, disposables[i]!);
        }
      } else {
        runDisposable(scope, disposables);
      }
    } finally {
      currentScope = outerScope;
    }
  }

  const nodes = scope[nodesSymbol];
  if (nodes) {
    delete scope[nodesSymbol];
    for (const id of nodes) {
      disposeNode(scope.runtime, id);
    }
  }

  const storedValues = scope[storedValuesSymbol];
  if (storedValues) {
    delete scope[storedValuesSymbol];
    for (const id of storedValues) {
      release(scope.runtime.storedValues, id);
    }
  }

  return next;
};

export const disposeScope = (scope: Scope): void => {
  if (disposedSymbol in scope) {
    throw new Error("The scope is already disposed.");
  }
  // Make sure the client will not be able to create nodes or disposables in
  // scopes that are being disposed.
  markAsDisposed(scope);
  const next = disposeContents(scope);
  // Otherwise `scope` is a root node and we don't need to unlink anything.
  if (scope[previousSymbol]) {
    if (next) {
      scope[previousSymbol][nextSymbol] = next;
      next[previousSymbol] = scope[previousSymbol];
    } else {
      delete scope[previousSymbol][nextSymbol];
    }
  }
};

export const runInScope = <T>(scope: Scope, callback: () => T): T => {
  if (disposedSymbol in scope) {
    throw new Error("You cannot run a callback in a disposed scope.");
  }
  const outerScope = currentScope;
  currentScope = scope;
  try {
    return callback();
  } finally {
    currentScope = outerScope;
  }
};

export const isScopeDisposed = (scope: Scope): boolean =>
  disposedSymbol in scope;

/**
 * Runs `callback` in a new root scope and passes it a function that disposes
 * that scope.
 */
export const createRoot = <T>(
  callback: (dispose: () => void) => T,
  runtime?: Runtime
): T => {
  const scope = createRootScope(runtime);
  return runInScope(scope, () =>
    callback(() => {
      disposeScope(scope);
    })
  );
};
