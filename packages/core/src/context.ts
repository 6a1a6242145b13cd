import { MissingContextError } from "./errors";
import { Scope, getCurrentScope, getParentScope, requireScope } from "./scope";

const valuesSymbol = Symbol("values");

/**
 * A typed key for values that a scope provides to its descendants.
 */
export interface Context<Value> {
  readonly description: string | undefined;
  readonly [valuesSymbol]: WeakMap<Scope, { value: Value }>;
}

export const createContext = <Value>(description?: string): Context<Value> => ({
  description,
  [valuesSymbol]: new WeakMap(),
});

/**
 * Makes `value` available to `useContext` calls in the current scope and its
 * descendants. Providing again in the same scope replaces the value.
 */
export const provideContext = <Value>(
  context: Context<Value>,
  value: Value
): void => {
  context[valuesSymbol].set(requireScope("provideContext"), { value });
};

const lookupContext = <Value>(
  context: Context<Value>
): { value: Value } | undefined => {
  for (
    let scope = getCurrentScope();
    scope;
    scope = getParentScope(scope)
  ) {
    const entry = context[valuesSymbol].get(scope);
    if (entry) {
      return entry;
    }
  }
};

/**
 * Returns the value provided by the nearest scope, starting from the current
 * one and going up.
 */
export const useContext = <Value>(context: Context<Value>): Value => {
  const entry = lookupContext(context);
  if (!entry) {
    throw new MissingContextError(context.description);
  }
  return entry.value;
};

export const hasContext = <Value>(context: Context<Value>): boolean =>
  lookupContext(context) !== undefined;
