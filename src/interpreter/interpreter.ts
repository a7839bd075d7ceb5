/**
 * Reference interpreter for finalized bytecode.
 *
 * Executes one BytecodeArray per frame with a register file sized from the
 * program's register count and a single accumulator. Bytecode functions
 * called from bytecode run in nested frames on the host stack.
 */

import { THE_HOLE } from '../ast/ast';
import { BytecodeArray } from '../bytecode/bytecode-array';
import { InterpreterOptions, resolveInterpreterOptions } from '../config';
import { VMRuntimeError } from '../errors';
import { logger } from '../logger';
import { findRuntimeFunction } from '../runtime/runtime-functions';
import {
  VMValue,
  add,
  isCallable,
  isHole,
  isObject,
  lessThan,
  looseEquals,
  strictEquals,
  toBoolean,
  toDisplayString,
  toInt32,
  toNumber,
  toPropertyKey,
  toUint32,
  typeOf
} from '../runtime/values';

const MAX_CALL_DEPTH = 512;

export interface ExecutionResult {
  value: VMValue;
  steps: number;
}

export class Interpreter {
  private readonly maxSteps: number;
  private steps = 0;
  private depth = 0;

  constructor(private readonly globals: VMValue[] = [], options: InterpreterOptions = {}) {
    this.maxSteps = resolveInterpreterOptions(options).maxSteps;
  }

  /**
   * Run `bytecode` with the given arguments and receiver. Step counting
   * restarts with every top-level run.
   */
  run(bytecode: BytecodeArray, args: VMValue[] = [], receiver: VMValue = undefined): ExecutionResult {
    this.steps = 0;
    this.depth = 0;
    const value = this.execute(bytecode, receiver, args);
    logger.debug(`Executed '${bytecode.name}' in ${this.steps} steps`);
    return { value, steps: this.steps };
  }

  private execute(bytecode: BytecodeArray, receiver: VMValue, args: VMValue[]): VMValue {
    if (++this.depth > MAX_CALL_DEPTH) {
      throw new VMRuntimeError(`Maximum call depth of ${MAX_CALL_DEPTH} exceeded`);
    }
    try {
      return this.dispatch(bytecode, receiver, args);
    } finally {
      this.depth--;
    }
  }

  private dispatch(bytecode: BytecodeArray, receiver: VMValue, args: VMValue[]): VMValue {
    const registers: VMValue[] = new Array<VMValue>(bytecode.registerCount).fill(undefined);
    registers[0] = receiver;
    for (let i = 1; i < bytecode.parameterCount; i++) {
      registers[i] = args[i - 1];
    }

    const instructions = bytecode.instructions;
    let accumulator: VMValue = undefined;
    let pc = 0;

    const reg = (index: number): VMValue => {
      if (index < 0 || index >= registers.length) {
        throw new VMRuntimeError(`Register r${index} out of range`, pc);
      }
      return registers[index];
    };
    const setReg = (index: number, value: VMValue): void => {
      if (index < 0 || index >= registers.length) {
        throw new VMRuntimeError(`Register r${index} out of range`, pc);
      }
      registers[index] = value;
    };

    for (;;) {
      const instruction = instructions[pc];
      if (!instruction) {
        throw new VMRuntimeError('Execution ran past the end of the bytecode', pc);
      }
      if (++this.steps > this.maxSteps) {
        throw new VMRuntimeError(`Step limit of ${this.maxSteps} exceeded`, pc);
      }

      const ops = instruction.operands;
      let next = pc + 1;

      switch (instruction.bytecode) {
        case 'LdaSmi':
          accumulator = ops[0];
          break;
        case 'LdaConstant': {
          const constant = bytecode.constants[ops[0]];
          if (constant === undefined) {
            throw new VMRuntimeError(`Constant pool index ${ops[0]} out of range`, pc);
          }
          accumulator = constant;
          break;
        }
        case 'LdaUndefined':
          accumulator = undefined;
          break;
        case 'LdaNull':
          accumulator = null;
          break;
        case 'LdaTheHole':
          accumulator = THE_HOLE;
          break;
        case 'LdaTrue':
          accumulator = true;
          break;
        case 'LdaFalse':
          accumulator = false;
          break;

        case 'Ldar':
          accumulator = reg(ops[0]);
          break;
        case 'Star':
          setReg(ops[0], accumulator);
          break;

        case 'LdaGlobal':
          if (ops[0] >= this.globals.length) {
            throw new VMRuntimeError(`Global slot ${ops[0]} is not defined`, pc);
          }
          accumulator = this.globals[ops[0]];
          break;

        case 'LoadIC':
        case 'KeyedLoadIC':
          accumulator = this.loadProperty(reg(ops[0]), accumulator, pc);
          break;
        case 'StoreIC':
        case 'KeyedStoreIC':
          this.storeProperty(reg(ops[0]), reg(ops[1]), accumulator, ops[3] === 1, pc);
          break;

        case 'Add':
          accumulator = add(reg(ops[0]), accumulator);
          break;
        case 'Sub':
          accumulator = toNumber(reg(ops[0])) - toNumber(accumulator);
          break;
        case 'Mul':
          accumulator = toNumber(reg(ops[0])) * toNumber(accumulator);
          break;
        case 'Div':
          accumulator = toNumber(reg(ops[0])) / toNumber(accumulator);
          break;
        case 'Mod':
          accumulator = toNumber(reg(ops[0])) % toNumber(accumulator);
          break;
        case 'BitwiseOr':
          accumulator = toInt32(reg(ops[0])) | toInt32(accumulator);
          break;
        case 'BitwiseXor':
          accumulator = toInt32(reg(ops[0])) ^ toInt32(accumulator);
          break;
        case 'BitwiseAnd':
          accumulator = toInt32(reg(ops[0])) & toInt32(accumulator);
          break;
        case 'ShiftLeft':
          accumulator = toInt32(reg(ops[0])) << (toUint32(accumulator) & 31);
          break;
        case 'ShiftRight':
          accumulator = toInt32(reg(ops[0])) >> (toUint32(accumulator) & 31);
          break;
        case 'ShiftRightLogical':
          accumulator = toUint32(reg(ops[0])) >>> (toUint32(accumulator) & 31);
          break;

        case 'TestEqual':
          accumulator = looseEquals(reg(ops[0]), accumulator);
          break;
        case 'TestNotEqual':
          accumulator = !looseEquals(reg(ops[0]), accumulator);
          break;
        case 'TestEqualStrict':
          accumulator = strictEquals(reg(ops[0]), accumulator);
          break;
        case 'TestNotEqualStrict':
          accumulator = !strictEquals(reg(ops[0]), accumulator);
          break;
        case 'TestLessThan':
          accumulator = lessThan(reg(ops[0]), accumulator) === true;
          break;
        case 'TestGreaterThan':
          accumulator = lessThan(accumulator, reg(ops[0])) === true;
          break;
        case 'TestLessThanOrEqual':
          accumulator = lessThan(accumulator, reg(ops[0])) === false;
          break;
        case 'TestGreaterThanOrEqual':
          accumulator = lessThan(reg(ops[0]), accumulator) === false;
          break;
        case 'TestInstanceOf':
          if (!isCallable(accumulator)) {
            throw new VMRuntimeError(`Right-hand side of 'instanceof' is not callable`, pc);
          }
          // Objects here carry no prototype chain.
          accumulator = false;
          break;
        case 'TestIn': {
          const object = accumulator;
          if (!isObject(object)) {
            throw new VMRuntimeError(`Cannot use 'in' to search for a key in ${typeOf(object)}`, pc);
          }
          accumulator = object.properties.has(toPropertyKey(reg(ops[0])));
          break;
        }

        case 'ToBoolean':
          accumulator = toBoolean(accumulator);
          break;

        case 'Jump':
          next = pc + ops[0];
          break;
        case 'JumpIfTrue':
          if (accumulator === true) {
            next = pc + ops[0];
          }
          break;
        case 'JumpIfFalse':
          if (accumulator === false) {
            next = pc + ops[0];
          }
          break;

        case 'Call': {
          const [calleeIndex, receiverIndex, argc] = ops;
          const callArgs: VMValue[] = [];
          for (let i = 1; i <= argc; i++) {
            callArgs.push(reg(receiverIndex + i));
          }
          accumulator = this.call(reg(calleeIndex), reg(receiverIndex), callArgs, pc);
          break;
        }
        case 'CallRuntime': {
          const [functionId, firstIndex, argc] = ops;
          const fn = findRuntimeFunction(functionId);
          if (!fn || !fn.implementation) {
            throw new VMRuntimeError(`Runtime function ${fn ? fn.name : functionId} is not callable`, pc);
          }
          const callArgs: VMValue[] = [];
          for (let i = 0; i < argc; i++) {
            callArgs.push(reg(firstIndex + i));
          }
          accumulator = fn.implementation(callArgs);
          break;
        }

        case 'Return':
          return accumulator;
      }

      pc = next;
    }
  }

  private call(callee: VMValue, receiver: VMValue, args: VMValue[], pc: number): VMValue {
    if (!isCallable(callee)) {
      throw new VMRuntimeError(`${toDisplayString(callee)} is not a function`, pc);
    }
    if (callee.kind === 'native') {
      return callee.call(receiver, args);
    }
    return this.execute(callee.bytecode, receiver, args);
  }

  private loadProperty(object: VMValue, key: VMValue, pc: number): VMValue {
    const name = toPropertyKey(key);
    if (object === null || object === undefined || isHole(object)) {
      throw new VMRuntimeError(`Cannot read property '${name}' of ${toDisplayString(object)}`, pc);
    }
    if (isObject(object)) {
      return object.properties.get(name);
    }
    if (typeof object === 'string' && name === 'length') {
      return object.length;
    }
    return undefined;
  }

  private storeProperty(object: VMValue, key: VMValue, value: VMValue, strict: boolean, pc: number): void {
    const name = toPropertyKey(key);
    if (object === null || object === undefined || isHole(object)) {
      throw new VMRuntimeError(`Cannot set property '${name}' of ${toDisplayString(object)}`, pc);
    }
    if (isObject(object)) {
      object.properties.set(name, value);
      return;
    }
    if (strict) {
      throw new VMRuntimeError(`Cannot create property '${name}' on ${typeOf(object)}`, pc);
    }
  }
}
