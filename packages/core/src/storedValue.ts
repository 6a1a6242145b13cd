import { NodeId, getItem, lookup } from "./arena";
import { allocateStoredValue, requireScope } from "./scope";

/**
 * A value that lives as long as the scope that created it, without taking
 * part in the reactive graph.
 */
export interface StoredValue<Value> {
  readonly id: NodeId;
  getValue(): Value;
  withValue<Result>(callback: (value: Value) => Result): Result;
  setValue(value: Value): void;
  updateValue(callback: (value: Value) => Value): void;
  tryGetValue(): Value | undefined;
}

export const storeValue = <Value>(value: Value): StoredValue<Value> => {
  const scope = requireScope("storeValue");
  const { storedValues } = scope.runtime;
  const cell = { value };
  const id = allocateStoredValue(scope, cell);
  const getValue = () => {
    getItem(storedValues, id);
    return cell.value;
  };
  const setValue = (value: Value) => {
    getItem(storedValues, id);
    cell.value = value;
  };
  return {
    id,
    getValue,
    withValue: (callback) => callback(getValue()),
    setValue,
    updateValue: (callback) => {
      setValue(callback(getValue()));
    },
    tryGetValue: () =>
      lookup(storedValues, id) ? cell.value : undefined,
  };
};
