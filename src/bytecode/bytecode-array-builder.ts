// Accumulates instructions for one function and resolves jump labels

import { CompareOperator, LanguageMode, SourceLocation } from '../ast/ast';
import { LoweringOptions, resolveLoweringOptions } from '../config';
import { InternalCompilerError } from '../errors';
import { RuntimeFunctionId } from '../runtime/runtime-functions';
import { BytecodeArray, Constant, SourcePositionEntry } from './bytecode-array';
import { BytecodeLabel } from './bytecode-label';
import { ArithmeticOperator, Bytecode, JumpBytecode, binaryBytecodeFor, compareBytecodeFor, operandKinds } from './bytecodes';
import { InstructionSink } from './instruction-sink';
import { Register } from './register';

interface MutableInstruction {
  bytecode: Bytecode;
  operands: number[];
}

export function encodeLanguageMode(mode: LanguageMode): number {
  return mode === 'strict' ? 1 : 0;
}

export class BytecodeArrayBuilder implements InstructionSink {
  private readonly instructions: MutableInstruction[] = [];
  private readonly constants: Constant[] = [];
  private readonly constantIndex = new Map<string, number>();
  private readonly labels: BytecodeLabel[] = [];
  private readonly sourcePositions: SourcePositionEntry[] = [];
  private readonly options: Required<LoweringOptions>;
  private pendingPosition: { line: number; column: number } | undefined;
  private parameters = -1;
  private locals = -1;
  private blockDepth = 0;
  // Instruction index at which a label was most recently bound.
  private lastBoundAt = -1;

  constructor(options: LoweringOptions = {}) {
    this.options = resolveLoweringOptions(options);
  }

  setParameterCount(count: number): void {
    if (!Number.isInteger(count) || count < 1) {
      throw new InternalCompilerError(`Parameter count must include the receiver, got ${count}`);
    }
    this.parameters = count;
  }

  setLocalCount(count: number): void {
    if (!Number.isInteger(count) || count < 0) {
      throw new InternalCompilerError(`Invalid local count: ${count}`);
    }
    this.locals = count;
  }

  get parameterCount(): number {
    if (this.parameters < 0) {
      throw new InternalCompilerError('Parameter count has not been set');
    }
    return this.parameters;
  }

  get localCount(): number {
    if (this.locals < 0) {
      throw new InternalCompilerError('Local count has not been set');
    }
    return this.locals;
  }

  get firstTemporaryRegister(): number {
    return this.parameterCount + this.localCount;
  }

  /**
   * Register holding parameter `index`; index 0 is the receiver.
   */
  parameter(index: number): Register {
    if (index < 0 || index >= this.parameterCount) {
      throw new InternalCompilerError(`Parameter index ${index} out of range (${this.parameterCount} parameters)`);
    }
    return new Register(index);
  }

  local(index: number): Register {
    if (index < 0 || index >= this.localCount) {
      throw new InternalCompilerError(`Local index ${index} out of range (${this.localCount} locals)`);
    }
    return new Register(this.parameterCount + index);
  }

  // Accumulator loads

  loadSmi(value: number): this {
    if (!Number.isInteger(value) || value < -0x80000000 || value > 0x7fffffff || Object.is(value, -0)) {
      throw new InternalCompilerError(`${value} is not a small integer`);
    }
    return this.output('LdaSmi', value);
  }

  loadConstant(value: string | number): this {
    return this.output('LdaConstant', this.addConstant(value));
  }

  loadUndefined(): this {
    return this.output('LdaUndefined');
  }

  loadNull(): this {
    return this.output('LdaNull');
  }

  loadTheHole(): this {
    return this.output('LdaTheHole');
  }

  loadTrue(): this {
    return this.output('LdaTrue');
  }

  loadFalse(): this {
    return this.output('LdaFalse');
  }

  loadAccumulatorWithRegister(register: Register): this {
    return this.output('Ldar', register.index);
  }

  storeAccumulatorInRegister(register: Register): this {
    return this.output('Star', register.index);
  }

  loadGlobal(index: number): this {
    return this.output('LdaGlobal', index);
  }

  // Property access

  loadNamedProperty(object: Register, feedbackIndex: number, mode: LanguageMode): this {
    return this.output('LoadIC', object.index, feedbackIndex, encodeLanguageMode(mode));
  }

  loadKeyedProperty(object: Register, feedbackIndex: number, mode: LanguageMode): this {
    return this.output('KeyedLoadIC', object.index, feedbackIndex, encodeLanguageMode(mode));
  }

  storeNamedProperty(object: Register, name: Register, feedbackIndex: number, mode: LanguageMode): this {
    return this.output('StoreIC', object.index, name.index, feedbackIndex, encodeLanguageMode(mode));
  }

  storeKeyedProperty(object: Register, key: Register, feedbackIndex: number, mode: LanguageMode): this {
    return this.output('KeyedStoreIC', object.index, key.index, feedbackIndex, encodeLanguageMode(mode));
  }

  // Operators

  binaryOperation(op: ArithmeticOperator, left: Register): this {
    return this.output(binaryBytecodeFor(op), left.index);
  }

  compareOperation(op: CompareOperator, left: Register, mode: LanguageMode): this {
    return this.output(compareBytecodeFor(op), left.index, encodeLanguageMode(mode));
  }

  castAccumulatorToBoolean(): this {
    return this.output('ToBoolean');
  }

  // Labels and jumps

  newLabel(): BytecodeLabel {
    const label = new BytecodeLabel(this.labels.length);
    this.labels.push(label);
    return label;
  }

  bind(label: BytecodeLabel): this {
    const target = this.instructions.length;
    label.bindTo(target);
    for (const reference of label.pendingReferences) {
      this.patchJump(reference, target);
    }
    label.pendingReferences.length = 0;
    this.lastBoundAt = target;
    return this;
  }

  jump(label: BytecodeLabel): this {
    return this.outputJump('Jump', label);
  }

  jumpIfTrue(label: BytecodeLabel): this {
    return this.outputJump('JumpIfTrue', label);
  }

  jumpIfFalse(label: BytecodeLabel): this {
    return this.outputJump('JumpIfFalse', label);
  }

  // Calls

  call(callee: Register, receiver: Register, argumentCount: number): this {
    return this.output('Call', callee.index, receiver.index, argumentCount);
  }

  callRuntime(functionId: RuntimeFunctionId, firstArgument: Register, argumentCount: number): this {
    return this.output('CallRuntime', functionId, firstArgument.index, argumentCount);
  }

  returnAccumulator(): this {
    return this.output('Return');
  }

  // Blocks

  enterBlock(): this {
    this.blockDepth++;
    return this;
  }

  leaveBlock(): this {
    if (this.blockDepth === 0) {
      throw new InternalCompilerError('leaveBlock without a matching enterBlock');
    }
    this.blockDepth--;
    return this;
  }

  setSourcePosition(location: SourceLocation | undefined): void {
    if (!this.options.emitSourcePositions || !location) {
      return;
    }
    this.pendingPosition = { line: location.start.line, column: location.start.column };
  }

  canFallThrough(): boolean {
    const last = this.instructions[this.instructions.length - 1];
    if (!last || last.bytecode !== 'Return') {
      return true;
    }
    return this.lastBoundAt === this.instructions.length;
  }

  get instructionCount(): number {
    return this.instructions.length;
  }

  toBytecodeArray(name: string, registerCount: number): BytecodeArray {
    if (this.blockDepth !== 0) {
      throw new InternalCompilerError(`Unbalanced blocks: ${this.blockDepth} still open`);
    }
    for (const label of this.labels) {
      if (label.isReferenced && !label.isBound) {
        throw new InternalCompilerError(`Label ${label} is referenced but never bound`);
      }
    }
    if (registerCount < this.firstTemporaryRegister) {
      throw new InternalCompilerError(
        `Register count ${registerCount} is below the ${this.firstTemporaryRegister} parameter and local registers`
      );
    }

    return new BytecodeArray({
      name,
      parameterCount: this.parameterCount,
      localCount: this.localCount,
      registerCount,
      instructions: this.instructions,
      constants: this.constants,
      sourcePositions: this.sourcePositions
    });
  }

  private output(bytecode: Bytecode, ...operands: number[]): this {
    const expected = operandKinds(bytecode).length;
    if (operands.length !== expected) {
      throw new InternalCompilerError(`${bytecode} takes ${expected} operands, got ${operands.length}`);
    }
    const instructionIndex = this.instructions.length;
    if (this.pendingPosition) {
      this.sourcePositions.push({ instructionIndex, ...this.pendingPosition });
      this.pendingPosition = undefined;
    }
    this.instructions.push({ bytecode, operands });
    return this;
  }

  private outputJump(bytecode: JumpBytecode, label: BytecodeLabel): this {
    const instructionIndex = this.instructions.length;
    this.output(bytecode, 0);
    label.addReference(instructionIndex);
    if (label.isBound) {
      this.patchJump(instructionIndex, label.offset);
    }
    return this;
  }

  private patchJump(instructionIndex: number, target: number): void {
    this.instructions[instructionIndex].operands[0] = target - instructionIndex;
  }

  private addConstant(value: Constant): number {
    const key = typeof value === 'string' ? `s:${value}` : `n:${Object.is(value, -0) ? '-0' : String(value)}`;
    const existing = this.constantIndex.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const index = this.constants.length;
    this.constants.push(value);
    this.constantIndex.set(key, index);
    return index;
  }
}
