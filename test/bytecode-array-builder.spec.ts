import { describe, it, expect } from 'vitest';
import { BytecodeArrayBuilder, encodeLanguageMode } from '../src/bytecode/bytecode-array-builder';
import { bytecodeFromCode } from '../src/bytecode/bytecodes';
import { Register } from '../src/bytecode/register';
import { InternalCompilerError } from '../src/errors';
import { RuntimeFunctionId } from '../src/runtime/runtime-functions';
import { listing, loc } from './helpers/lowering';

function newBuilder(parameters = 1, locals = 0, emitSourcePositions = false): BytecodeArrayBuilder {
  const builder = new BytecodeArrayBuilder({ emitSourcePositions });
  builder.setParameterCount(parameters);
  builder.setLocalCount(locals);
  return builder;
}

describe('BytecodeArrayBuilder', () => {
  describe('register layout', () => {
    it('places the receiver at r0, parameters after it, then locals', () => {
      const builder = newBuilder(3, 2);

      expect(builder.parameter(0).index).toBe(0);
      expect(builder.parameter(2).index).toBe(2);
      expect(builder.local(0).index).toBe(3);
      expect(builder.local(1).index).toBe(4);
      expect(builder.firstTemporaryRegister).toBe(5);
    });

    it('range-checks parameter and local indices', () => {
      const builder = newBuilder(2, 1);

      expect(() => builder.parameter(2)).toThrow(InternalCompilerError);
      expect(() => builder.local(1)).toThrow(InternalCompilerError);
      expect(() => builder.local(-1)).toThrow(InternalCompilerError);
    });

    it('requires counts before the layout is used', () => {
      const builder = new BytecodeArrayBuilder();

      expect(() => builder.parameterCount).toThrow('Parameter count has not been set');
      expect(() => builder.setParameterCount(0)).toThrow(InternalCompilerError);
      builder.setParameterCount(1);
      expect(() => builder.localCount).toThrow('Local count has not been set');
      expect(() => builder.setLocalCount(-1)).toThrow(InternalCompilerError);
    });
  });

  describe('emission', () => {
    it('emits instructions in call order with their operands', () => {
      const builder = newBuilder(2, 1);
      builder
        .loadSmi(5)
        .storeAccumulatorInRegister(builder.local(0))
        .loadAccumulatorWithRegister(builder.parameter(1))
        .binaryOperation('+', builder.local(0))
        .compareOperation('<', new Register(3), 'strict')
        .callRuntime(RuntimeFunctionId.ToNumber, new Register(3), 1)
        .returnAccumulator();

      const bytecode = builder.toBytecodeArray('f', 4);
      expect(listing(bytecode)).toEqual([
        'LdaSmi 5',
        'Star 2',
        'Ldar 1',
        'Add 2',
        'TestLessThan 3, 1',
        'CallRuntime 1, 3, 1',
        'Return'
      ]);
      expect(bytecode.parameterCount).toBe(2);
      expect(bytecode.localCount).toBe(1);
      expect(bytecode.registerCount).toBe(4);
    });

    it('encodes language mode as 0 for sloppy and 1 for strict', () => {
      expect(encodeLanguageMode('sloppy')).toBe(0);
      expect(encodeLanguageMode('strict')).toBe(1);
    });

    it('rejects values outside the small integer range', () => {
      const builder = newBuilder();

      expect(() => builder.loadSmi(2 ** 31)).toThrow(InternalCompilerError);
      expect(() => builder.loadSmi(1.5)).toThrow(InternalCompilerError);
      expect(() => builder.loadSmi(-0)).toThrow(InternalCompilerError);
      builder.loadSmi(-(2 ** 31)).loadSmi(2 ** 31 - 1);
      expect(builder.instructionCount).toBe(2);
    });

    it('deduplicates constants but keeps -0 apart from 0', () => {
      const builder = newBuilder();
      builder.loadConstant('x').loadConstant(1.5).loadConstant('x').loadConstant(-0).loadConstant(0).loadConstant(1.5);
      builder.returnAccumulator();

      const bytecode = builder.toBytecodeArray('f', 1);
      expect(listing(bytecode)).toEqual([
        'LdaConstant 0',
        'LdaConstant 1',
        'LdaConstant 0',
        'LdaConstant 2',
        'LdaConstant 3',
        'LdaConstant 1',
        'Return'
      ]);
      expect(bytecode.constants).toEqual(['x', 1.5, -0, 0]);
      expect(Object.is(bytecode.constants[2], -0)).toBe(true);
    });

    it('keeps a string and a number with the same text apart', () => {
      const builder = newBuilder();
      builder.loadConstant('1.5').loadConstant(1.5);

      expect(builder.toBytecodeArray('f', 1).constants).toEqual(['1.5', 1.5]);
    });
  });

  describe('jumps', () => {
    it('patches forward jumps relative to the jump instruction', () => {
      const builder = newBuilder();
      const label = builder.newLabel();
      builder.loadTrue();
      builder.jumpIfTrue(label);
      builder.loadFalse();
      builder.loadNull();
      builder.bind(label);
      builder.returnAccumulator();

      expect(listing(builder.toBytecodeArray('f', 1))).toEqual([
        'LdaTrue',
        'JumpIfTrue 3',
        'LdaFalse',
        'LdaNull',
        'Return'
      ]);
    });

    it('emits negative offsets for backward jumps', () => {
      const builder = newBuilder();
      const label = builder.newLabel();
      builder.bind(label);
      builder.loadTrue();
      builder.jumpIfFalse(label);
      builder.jump(label);

      expect(listing(builder.toBytecodeArray('f', 1))).toEqual(['LdaTrue', 'JumpIfFalse -1', 'Jump -2']);
    });

    it('patches every pending reference to a label', () => {
      const builder = newBuilder();
      const label = builder.newLabel();
      builder.jump(label);
      builder.jump(label);
      builder.bind(label);
      builder.returnAccumulator();

      expect(listing(builder.toBytecodeArray('f', 1))).toEqual(['Jump 2', 'Jump 1', 'Return']);
    });

    it('rejects binding a label twice', () => {
      const builder = newBuilder();
      const label = builder.newLabel();
      builder.bind(label);

      expect(() => builder.bind(label)).toThrow('Label L0 is already bound at 0');
    });

    it('patches forward jumps wider than 16 bits', () => {
      const builder = newBuilder();
      const label = builder.newLabel();
      builder.jump(label);
      for (let i = 0; i < 40000; i++) {
        builder.loadUndefined();
      }
      builder.bind(label);
      builder.returnAccumulator();

      expect(builder.toBytecodeArray('f', 1).instructions[0].operands).toEqual([40001]);
    });

    it('emits backward jumps wider than 16 bits', () => {
      const builder = newBuilder();
      const label = builder.newLabel();
      builder.bind(label);
      for (let i = 0; i < 40000; i++) {
        builder.loadUndefined();
      }
      builder.jump(label);
      builder.returnAccumulator();

      expect(builder.toBytecodeArray('f', 1).instructions[40000].operands).toEqual([-40000]);
    });

    it('accepts an unreferenced unbound label', () => {
      const builder = newBuilder();
      builder.newLabel();
      builder.returnAccumulator();

      expect(builder.toBytecodeArray('f', 1).length).toBe(1);
    });
  });

  describe('fall-through tracking', () => {
    it('falls through when empty or when the last instruction is not a return', () => {
      const builder = newBuilder();
      expect(builder.canFallThrough()).toBe(true);
      builder.loadUndefined();
      expect(builder.canFallThrough()).toBe(true);
      builder.returnAccumulator();
      expect(builder.canFallThrough()).toBe(false);
    });

    it('falls through when a label is bound after the final return', () => {
      const builder = newBuilder();
      const label = builder.newLabel();
      builder.jump(label);
      builder.returnAccumulator();
      builder.bind(label);

      expect(builder.canFallThrough()).toBe(true);
    });
  });

  describe('blocks', () => {
    it('requires blocks to be balanced at finalization', () => {
      const builder = newBuilder();
      builder.enterBlock().enterBlock().leaveBlock();

      expect(() => builder.toBytecodeArray('f', 1)).toThrow('Unbalanced blocks: 1 still open');
      builder.leaveBlock();
      expect(() => builder.leaveBlock()).toThrow(InternalCompilerError);
      expect(builder.toBytecodeArray('f', 1).length).toBe(0);
    });
  });

  describe('source positions', () => {
    it('attaches the most recent position to the next instruction only', () => {
      const builder = newBuilder(1, 0, true);
      builder.setSourcePosition(loc(1, 0));
      builder.setSourcePosition(loc(2, 4));
      builder.loadSmi(1);
      builder.loadSmi(2);
      builder.setSourcePosition(undefined);
      builder.setSourcePosition(loc(3, 2));
      builder.returnAccumulator();

      expect(builder.toBytecodeArray('f', 1).sourcePositions).toEqual([
        { instructionIndex: 0, line: 2, column: 4 },
        { instructionIndex: 2, line: 3, column: 2 }
      ]);
    });

    it('records nothing when source positions are switched off', () => {
      const builder = newBuilder(1, 0, false);
      builder.setSourcePosition(loc(1, 0));
      builder.returnAccumulator();

      expect(builder.toBytecodeArray('f', 1).sourcePositions).toEqual([]);
    });
  });

  it('rejects a register count below the fixed registers', () => {
    const builder = newBuilder(2, 2);

    expect(() => builder.toBytecodeArray('f', 3)).toThrow(InternalCompilerError);
  });

  it('serializes to a stable JSON form', () => {
    const builder = newBuilder();
    builder.loadConstant('hi').loadConstant(-0).returnAccumulator();

    expect(builder.toBytecodeArray('greet', 1).toJSON()).toEqual({
      version: '1.0.0',
      name: 'greet',
      parameterCount: 1,
      localCount: 0,
      registerCount: 1,
      constants: [
        { type: 'string', value: 'hi' },
        { type: 'number', value: '-0' }
      ],
      instructions: [
        { opcode: 0x01, mnemonic: 'LdaConstant', operands: [0] },
        { opcode: 0x01, mnemonic: 'LdaConstant', operands: [1] },
        { opcode: 0x72, mnemonic: 'Return', operands: [] }
      ],
      sourcePositions: []
    });
  });

  it('maps serialized opcodes back to their mnemonics', () => {
    const builder = newBuilder();
    builder.loadConstant('hi').castAccumulatorToBoolean().returnAccumulator();

    for (const instr of builder.toBytecodeArray('f', 1).toJSON().instructions) {
      expect(bytecodeFromCode(instr.opcode)).toBe(instr.mnemonic);
    }
    expect(bytecodeFromCode(0xff)).toBeUndefined();
  });
});
