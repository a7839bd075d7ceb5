// Value representation for the reference interpreter

import { THE_HOLE, TheHole } from '../ast/ast';
import type { BytecodeArray } from '../bytecode/bytecode-array';

export interface VMObject {
  kind: 'object';
  properties: Map<string, VMValue>;
}

export interface NativeFunction {
  kind: 'native';
  name: string;
  call: (receiver: VMValue, args: VMValue[]) => VMValue;
}

export interface BytecodeFunction {
  kind: 'bytecode';
  name: string;
  bytecode: BytecodeArray;
}

export type VMFunction = NativeFunction | BytecodeFunction;

export type VMValue = number | string | boolean | null | undefined | TheHole | VMObject | VMFunction;

export function createObject(entries: Record<string, VMValue> = {}): VMObject {
  return { kind: 'object', properties: new Map(Object.entries(entries)) };
}

export function nativeFunction(name: string, call: (receiver: VMValue, args: VMValue[]) => VMValue): NativeFunction {
  return { kind: 'native', name, call };
}

export function bytecodeFunction(bytecode: BytecodeArray): BytecodeFunction {
  return { kind: 'bytecode', name: bytecode.name, bytecode };
}

export function isHole(value: VMValue): value is TheHole {
  return value === THE_HOLE;
}

export function isObject(value: VMValue): value is VMObject {
  return typeof value === 'object' && value !== null && value.kind === 'object';
}

export function isCallable(value: VMValue): value is VMFunction {
  return typeof value === 'object' && value !== null && (value.kind === 'native' || value.kind === 'bytecode');
}

export function typeOf(value: VMValue): string {
  if (value === null) return 'object';
  if (value === undefined || isHole(value)) return 'undefined';
  switch (typeof value) {
    case 'number':
      return 'number';
    case 'string':
      return 'string';
    case 'boolean':
      return 'boolean';
    default:
      return isCallable(value) ? 'function' : 'object';
  }
}

export function toBoolean(value: VMValue): boolean {
  if (value === null || value === undefined || isHole(value)) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (typeof value === 'string') return value.length > 0;
  return true;
}

export function toNumber(value: VMValue): number {
  if (value === null) return 0;
  if (value === undefined || isHole(value)) return NaN;
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? 0 : Number(trimmed);
  }
  return NaN;
}

export function toInt32(value: VMValue): number {
  return toNumber(value) | 0;
}

export function toUint32(value: VMValue): number {
  return toNumber(value) >>> 0;
}

export function toDisplayString(value: VMValue): string {
  if (value === null) return 'null';
  if (value === undefined || isHole(value)) return 'undefined';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (isCallable(value)) return `function ${value.name}`;
  return '[object Object]';
}

export function toPropertyKey(value: VMValue): string {
  return toDisplayString(value);
}

function isPrimitiveForAddition(value: VMValue): boolean {
  return !isObject(value) && !isCallable(value);
}

export function add(left: VMValue, right: VMValue): VMValue {
  const stringy = typeof left === 'string' || typeof right === 'string'
    || !isPrimitiveForAddition(left) || !isPrimitiveForAddition(right);
  if (stringy) {
    return toDisplayString(left) + toDisplayString(right);
  }
  return toNumber(left) + toNumber(right);
}

// The hole is only strictly equal to itself; loose equality groups it with null and undefined.
export function strictEquals(left: VMValue, right: VMValue): boolean {
  return left === right;
}

export function looseEquals(left: VMValue, right: VMValue): boolean {
  const leftNullish = left === null || left === undefined || isHole(left);
  const rightNullish = right === null || right === undefined || isHole(right);
  if (leftNullish || rightNullish) {
    return leftNullish && rightNullish;
  }
  if (typeof left === typeof right) {
    return strictEquals(left, right);
  }
  if (isObject(left) || isCallable(left) || isObject(right) || isCallable(right)) {
    return false;
  }
  return toNumber(left) === toNumber(right);
}

/**
 * Abstract relational comparison; undefined when either side is NaN.
 */
export function lessThan(left: VMValue, right: VMValue): boolean | undefined {
  if (typeof left === 'string' && typeof right === 'string') {
    return left < right;
  }
  const l = toNumber(left);
  const r = toNumber(right);
  if (Number.isNaN(l) || Number.isNaN(r)) {
    return undefined;
  }
  return l < r;
}
