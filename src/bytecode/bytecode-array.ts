// Finalized, immutable bytecode for one function

import { BYTECODES, Bytecode } from './bytecodes';

export interface Instruction {
  readonly bytecode: Bytecode;
  readonly operands: readonly number[];
}

export type Constant = string | number;

export interface SourcePositionEntry {
  readonly instructionIndex: number;
  readonly line: number;
  readonly column: number;
}

export interface BytecodeArrayInit {
  name: string;
  parameterCount: number;
  localCount: number;
  registerCount: number;
  instructions: Instruction[];
  constants: Constant[];
  sourcePositions: SourcePositionEntry[];
}

// Serialized form, stable across runs so outputs can be diffed.
export interface BytecodeFormat {
  version: string;
  name: string;
  parameterCount: number;
  localCount: number;
  registerCount: number;
  constants: BytecodeConstantFormat[];
  instructions: BytecodeInstructionFormat[];
  sourcePositions: SourcePositionEntry[];
}

export interface BytecodeConstantFormat {
  type: 'string' | 'number';
  value: string | number;
}

export interface BytecodeInstructionFormat {
  opcode: number;
  mnemonic: Bytecode;
  operands: number[];
}

export const BYTECODE_FORMAT_VERSION = '1.0.0';

export class BytecodeArray {
  readonly name: string;
  // Includes the receiver.
  readonly parameterCount: number;
  readonly localCount: number;
  // Parameters + locals + peak temporaries.
  readonly registerCount: number;
  readonly instructions: readonly Instruction[];
  readonly constants: readonly Constant[];
  readonly sourcePositions: readonly SourcePositionEntry[];

  constructor(init: BytecodeArrayInit) {
    this.name = init.name;
    this.parameterCount = init.parameterCount;
    this.localCount = init.localCount;
    this.registerCount = init.registerCount;
    this.instructions = Object.freeze(
      init.instructions.map(instr => Object.freeze({ bytecode: instr.bytecode, operands: Object.freeze([...instr.operands]) }))
    );
    this.constants = Object.freeze([...init.constants]);
    this.sourcePositions = Object.freeze(init.sourcePositions.map(entry => Object.freeze({ ...entry })));
    Object.freeze(this);
  }

  get length(): number {
    return this.instructions.length;
  }

  /**
   * Source position recorded for the given instruction, if any.
   */
  sourcePositionAt(instructionIndex: number): SourcePositionEntry | undefined {
    return this.sourcePositions.find(entry => entry.instructionIndex === instructionIndex);
  }

  toJSON(): BytecodeFormat {
    return {
      version: BYTECODE_FORMAT_VERSION,
      name: this.name,
      parameterCount: this.parameterCount,
      localCount: this.localCount,
      registerCount: this.registerCount,
      constants: this.constants.map(serializeConstant),
      instructions: this.instructions.map(instr => ({
        opcode: BYTECODES[instr.bytecode].code,
        mnemonic: instr.bytecode,
        operands: [...instr.operands]
      })),
      sourcePositions: this.sourcePositions.map(entry => ({ ...entry }))
    };
  }
}

function serializeConstant(constant: Constant): BytecodeConstantFormat {
  if (typeof constant === 'string') {
    return { type: 'string', value: constant };
  }
  // JSON has no NaN, Infinity or -0.
  if (!Number.isFinite(constant) || Object.is(constant, -0)) {
    return { type: 'number', value: Object.is(constant, -0) ? '-0' : String(constant) };
  }
  return { type: 'number', value: constant };
}
