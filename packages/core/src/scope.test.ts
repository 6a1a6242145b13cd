import { readLog } from "@1log/jest";
import { createRuntime } from "./runtime";
import {
  createRoot,
  createRootScope,
  createScope,
  disposeScope,
  getCurrentScope,
  getParentScope,
  isScopeDisposed,
  onDispose,
  runInScope,
} from "./scope";
import { log } from "./setupTests";
import { createSignal } from "./signal";

const mockMicrotaskQueue: (() => void)[] = [];
const originalQueueMicrotask = queueMicrotask;

const processMockMicrotaskQueue = () => {
  while (mockMicrotaskQueue.length) {
    mockMicrotaskQueue.shift()!();
  }
};

beforeEach(() => {
  global.queueMicrotask = (task) => mockMicrotaskQueue.push(task);
});

afterEach(() => {
  processMockMicrotaskQueue();
  global.queueMicrotask = originalQueueMicrotask;
});

test("createRootScope", () => {
  const runtime = createRuntime();
  const a = createRootScope(runtime);
  expect(a.runtime).toBe(runtime);
  expect(getParentScope(a)).toBe(undefined);
  // A root created in a scope shares that scope's runtime.
  const b = runInScope(a, () => createRootScope());
  expect(b.runtime).toBe(runtime);
  expect(getParentScope(b)).toBe(undefined);
  // A root created outside of any scope gets a runtime of its own.
  expect(createRootScope().runtime).not.toBe(runtime);
});

test("createScope", () => {
  const a = createScope();
  const b = runInScope(a, createScope);
  expect(getParentScope(b)).toBe(a);
  expect(b.runtime).toBe(a.runtime);
});

test("createScope: error if scope is disposed", () => {
  const a = createScope();
  runInScope(a, () => {
    onDispose(() => {
      createScope();
    });
  });
  disposeScope(a);
  expect(processMockMicrotaskQueue).toThrow(
    "You cannot create a child scope in a disposed scope."
  );
});

test("getCurrentScope", () => {
  const a = createScope();
  const b = runInScope(a, createScope);
  expect(getCurrentScope()).toBe(undefined);
  runInScope(a, () => {
    expect(getCurrentScope()).toBe(a);
    runInScope(b, () => {
      expect(getCurrentScope()).toBe(b);
    });
    expect(getCurrentScope()).toBe(a);
  });
  expect(getCurrentScope()).toBe(undefined);
});

test("runInScope: error if scope is disposed", () => {
  const a = createScope();
  disposeScope(a);
  expect(() => {
    runInScope(a, () => {});
  }).toThrow("You cannot run a callback in a disposed scope.");
});

test("runInScope: restores the outer scope when the callback throws", () => {
  const a = createScope();
  expect(() => {
    runInScope(a, () => {
      throw new Error("test error");
    });
  }).toThrow("test error");
  expect(getCurrentScope()).toBe(undefined);
});

test("createRoot", () => {
  const runtime = createRuntime();
  const disposables: string[] = [];
  const dispose = createRoot((dispose) => {
    expect(getCurrentScope()?.runtime).toBe(runtime);
    onDispose(() => disposables.push("root"));
    return dispose;
  }, runtime);
  expect(disposables).toEqual([]);
  dispose();
  expect(disposables).toEqual(["root"]);
});

test("onDispose: error if run outside a scope", () => {
  expect(() => {
    onDispose(() => {});
  }).toThrow("`onDispose` must be called within a `Scope`.");
});

test("onDispose: error if the scope is disposed", () => {
  const scope = createScope();
  const errors: unknown[] = [];
  runInScope(scope, () => {
    onDispose(() => {
      try {
        onDispose(() => {});
      } catch (error) {
        errors.push(error);
      }
    });
  });
  disposeScope(scope);
  expect(errors).toEqual([
    new Error("You cannot call `onDispose` in a disposed scope."),
  ]);
});

test("isScopeDisposed", () => {
  const a = createScope();
  expect(isScopeDisposed(a)).toBe(false);
  disposeScope(a);
  expect(isScopeDisposed(a)).toBe(true);
});

test("disposeScope: calling disposables", () => {
  const calls: string[] = [];
  const a = createScope();
  runInScope(a, () => {
    onDispose(() => calls.push("disposable 1 in a"));
    onDispose(() => calls.push("disposable 2 in a"));
  });
  disposeScope(a);
  expect(calls).toEqual(["disposable 2 in a", "disposable 1 in a"]);
});

test("disposeScope: scope in which disposables are called", () => {
  const a = createScope();
  const b = runInScope(a, createScope);
  const scopes: (typeof a | undefined)[] = [];
  runInScope(a, () => {
    onDispose(() => scopes.push(getCurrentScope()));
  });
  runInScope(b, () => {
    onDispose(() => scopes.push(getCurrentScope()));
  });
  disposeScope(a);
  expect(scopes).toHaveLength(2);
  expect(scopes[0]).toBe(b);
  expect(scopes[1]).toBe(a);
  // Check that scope is restored.
  expect(getCurrentScope()).toBe(undefined);
});

test("disposeScope: handling errors in disposables", () => {
  const calls: string[] = [];
  const a = createRootScope(createRuntime({ log }));
  runInScope(a, () => {
    onDispose(() => calls.push("first disposable in a"));
    onDispose(() => {
      calls.push("second disposable in a");
      throw new Error("error in second disposable in a");
    });
    onDispose(() => calls.push("third disposable in a"));
  });
  disposeScope(a);
  expect(calls).toEqual([
    "third disposable in a",
    "second disposable in a",
    "first disposable in a",
  ]);
  expect(isScopeDisposed(a)).toBe(true);
  expect(readLog()).toHaveLength(1);
  expect(processMockMicrotaskQueue).toThrow("error in second disposable in a");
});

test("disposeScope: no re-dispose", () => {
  const a = createScope();
  disposeScope(a);
  expect(() => {
    disposeScope(a);
  }).toThrow("The scope is already disposed.");
});

test("disposeScope: disposing last scope", () => {
  const calls: string[] = [];
  const a = createScope();
  runInScope(a, () => {
    onDispose(() => calls.push("a"));
  });
  const b = runInScope(a, createScope);
  runInScope(b, () => {
    onDispose(() => calls.push("b"));
  });
  const c = runInScope(a, createScope);
  runInScope(c, () => {
    onDispose(() => calls.push("c"));
  });

  disposeScope(b);
  expect(calls).toEqual(["b"]);
  expect(isScopeDisposed(a)).toBe(false);
  expect(isScopeDisposed(c)).toBe(false);

  disposeScope(a);
  expect(calls).toEqual(["b", "c", "a"]);
});

test("disposeScope: disposing middle scope", () => {
  const calls: string[] = [];
  const a = createScope();
  runInScope(a, () => {
    onDispose(() => calls.push("a"));
  });
  const b = runInScope(a, createScope);
  runInScope(b, () => {
    onDispose(() => calls.push("b"));
  });
  const c = runInScope(a, createScope);
  runInScope(c, () => {
    onDispose(() => calls.push("c"));
  });
  const d = runInScope(b, createScope);
  runInScope(d, () => {
    onDispose(() => calls.push("d"));
  });

  disposeScope(c);
  expect(calls).toEqual(["c"]);

  // The list still reaches `b` and its child after `c` is unlinked.
  disposeScope(a);
  expect(calls).toEqual(["c", "d", "b", "a"]);
});

test("disposeScope: re-entry", () => {
  const a = createScope();
  const b = runInScope(a, createScope);
  const c = runInScope(a, createScope);
  const states: boolean[] = [];
  runInScope(c, () => {
    onDispose(() => {
      states.push(isScopeDisposed(a), isScopeDisposed(b), isScopeDisposed(c));
    });
  });
  disposeScope(a);
  expect(states).toEqual([true, true, true]);
});

test("disposeScope: disposes owned nodes", () => {
  const a = createScope();
  const [value, setValue] = runInScope(a, () => createSignal(1));
  expect(value.get()).toBe(1);
  disposeScope(a);
  expect(() => value.get()).toThrow(
    `Reactive node ${value.id.slot}:${value.id.generation} has been disposed and can no longer be used.`
  );
  expect(setValue.trySet(2)).toBe(false);
});

test("disposeScope: creating a node in a disposed scope", () => {
  const a = createScope();
  const errors: unknown[] = [];
  runInScope(a, () => {
    onDispose(() => {
      try {
        createSignal(0);
      } catch (error) {
        errors.push(error);
      }
    });
  });
  disposeScope(a);
  expect(errors).toEqual([
    new Error("You cannot create a reactive node in a disposed scope."),
  ]);
});
