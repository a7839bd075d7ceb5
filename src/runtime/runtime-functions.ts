// Engine-internal functions reachable through CallRuntime

import { VMValue, createObject, isObject, toDisplayString, toNumber, toPropertyKey, typeOf } from './values';

export enum RuntimeFunctionId {
  ObjectCreate = 0,
  ToNumber = 1,
  ToString = 2,
  StringAdd = 3,
  HasProperty = 4,
  TypeOf = 5,
  // Yields (value, receiver); not callable from single-result call sites.
  LoadLookupSlot = 6
}

export interface RuntimeFunction {
  id: RuntimeFunctionId;
  name: string;
  // -1 for variadic functions.
  argumentCount: number;
  resultSize: number;
  implementation?: (args: VMValue[]) => VMValue;
}

const RUNTIME_FUNCTIONS: readonly RuntimeFunction[] = [
  {
    id: RuntimeFunctionId.ObjectCreate,
    name: 'ObjectCreate',
    argumentCount: 0,
    resultSize: 1,
    implementation: () => createObject()
  },
  {
    id: RuntimeFunctionId.ToNumber,
    name: 'ToNumber',
    argumentCount: 1,
    resultSize: 1,
    implementation: ([value]) => toNumber(value)
  },
  {
    id: RuntimeFunctionId.ToString,
    name: 'ToString',
    argumentCount: 1,
    resultSize: 1,
    implementation: ([value]) => toDisplayString(value)
  },
  {
    id: RuntimeFunctionId.StringAdd,
    name: 'StringAdd',
    argumentCount: 2,
    resultSize: 1,
    implementation: ([left, right]) => toDisplayString(left) + toDisplayString(right)
  },
  {
    id: RuntimeFunctionId.HasProperty,
    name: 'HasProperty',
    argumentCount: 2,
    resultSize: 1,
    implementation: ([object, key]) => isObject(object) && object.properties.has(toPropertyKey(key))
  },
  {
    id: RuntimeFunctionId.TypeOf,
    name: 'TypeOf',
    argumentCount: 1,
    resultSize: 1,
    implementation: ([value]) => typeOf(value)
  },
  {
    id: RuntimeFunctionId.LoadLookupSlot,
    name: 'LoadLookupSlot',
    argumentCount: 2,
    resultSize: 2
  }
];

const BY_ID = new Map<number, RuntimeFunction>(RUNTIME_FUNCTIONS.map(fn => [fn.id, fn]));
const BY_NAME = new Map<string, RuntimeFunction>(RUNTIME_FUNCTIONS.map(fn => [fn.name, fn]));

export function findRuntimeFunction(id: number): RuntimeFunction | undefined {
  return BY_ID.get(id);
}

export function findRuntimeFunctionByName(name: string): RuntimeFunction | undefined {
  return BY_NAME.get(name);
}
