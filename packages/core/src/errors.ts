import type { NodeId } from "./arena";

/**
 * Thrown when a handle is used after the scope that owned its node (or the
 * node itself) has been disposed.
 */
export class DisposedError extends Error {
  readonly id: NodeId;

  constructor(id: NodeId) {
    super(
      `Reactive node ${id.slot}:${id.generation} has been disposed and can no longer be used.`
    );
    this.name = "DisposedError";
    this.id = id;
  }
}

/**
 * Thrown on re-entrant access to a node that is being recomputed: a memo
 * writing a signal it has already read in the same run, or a computation
 * that ends up reading itself.
 */
export class BorrowConflictError extends Error {
  readonly id: NodeId;

  constructor(id: NodeId, message: string) {
    super(message);
    this.name = "BorrowConflictError";
    this.id = id;
  }
}

export class MissingContextError extends Error {
  constructor(description: string | undefined) {
    super(
      `No value was provided for context${
        description === undefined ? "" : ` "${description}"`
      } in the current scope or any of its ancestors.`
    );
    this.name = "MissingContextError";
  }
}
