// Interface between the bytecode generator and whatever accumulates its output

import { CompareOperator, LanguageMode, SourceLocation } from '../ast/ast';
import { RuntimeFunctionId } from '../runtime/runtime-functions';
import { ArithmeticOperator } from './bytecodes';
import { BytecodeArray } from './bytecode-array';
import { BytecodeLabel } from './bytecode-label';
import { Register } from './register';

export interface InstructionSink {
  setParameterCount(count: number): void;
  setLocalCount(count: number): void;
  readonly parameterCount: number;
  readonly localCount: number;
  readonly firstTemporaryRegister: number;

  parameter(index: number): Register;
  local(index: number): Register;

  loadSmi(value: number): this;
  loadConstant(value: string | number): this;
  loadUndefined(): this;
  loadNull(): this;
  loadTheHole(): this;
  loadTrue(): this;
  loadFalse(): this;

  loadAccumulatorWithRegister(register: Register): this;
  storeAccumulatorInRegister(register: Register): this;

  loadGlobal(index: number): this;

  loadNamedProperty(object: Register, feedbackIndex: number, mode: LanguageMode): this;
  loadKeyedProperty(object: Register, feedbackIndex: number, mode: LanguageMode): this;
  storeNamedProperty(object: Register, name: Register, feedbackIndex: number, mode: LanguageMode): this;
  storeKeyedProperty(object: Register, key: Register, feedbackIndex: number, mode: LanguageMode): this;

  binaryOperation(op: ArithmeticOperator, left: Register): this;
  compareOperation(op: CompareOperator, left: Register, mode: LanguageMode): this;
  castAccumulatorToBoolean(): this;

  newLabel(): BytecodeLabel;
  bind(label: BytecodeLabel): this;
  jump(label: BytecodeLabel): this;
  jumpIfTrue(label: BytecodeLabel): this;
  jumpIfFalse(label: BytecodeLabel): this;

  call(callee: Register, receiver: Register, argumentCount: number): this;
  callRuntime(functionId: RuntimeFunctionId, firstArgument: Register, argumentCount: number): this;
  returnAccumulator(): this;

  enterBlock(): this;
  leaveBlock(): this;

  setSourcePosition(location: SourceLocation | undefined): void;

  // True when control can reach the current end of the instruction stream.
  canFallThrough(): boolean;

  toBytecodeArray(name: string, registerCount: number): BytecodeArray;
}
