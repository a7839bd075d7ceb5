// Bytecode table for the accumulator register machine

import { BinaryOperator, CompareOperator } from '../ast/ast';

export type OperandKind =
  | 'reg'      // register index
  | 'imm'      // signed immediate
  | 'idx'      // constant pool or global slot index
  | 'slot'     // feedback vector index
  | 'mode'     // language mode flag, 0 = sloppy, 1 = strict
  | 'count'    // argument count
  | 'offset'   // jump offset relative to the jump instruction
  | 'runtime'; // runtime function id

export const BYTECODES = {
  // Accumulator loads
  LdaSmi: { code: 0x00, operands: ['imm'] },
  LdaConstant: { code: 0x01, operands: ['idx'] },
  LdaUndefined: { code: 0x02, operands: [] },
  LdaNull: { code: 0x03, operands: [] },
  LdaTheHole: { code: 0x04, operands: [] },
  LdaTrue: { code: 0x05, operands: [] },
  LdaFalse: { code: 0x06, operands: [] },

  // Register transfers
  Ldar: { code: 0x10, operands: ['reg'] },
  Star: { code: 0x11, operands: ['reg'] },

  // Globals
  LdaGlobal: { code: 0x18, operands: ['idx'] },

  // Property access
  LoadIC: { code: 0x20, operands: ['reg', 'slot', 'mode'] },
  KeyedLoadIC: { code: 0x21, operands: ['reg', 'slot', 'mode'] },
  StoreIC: { code: 0x22, operands: ['reg', 'reg', 'slot', 'mode'] },
  KeyedStoreIC: { code: 0x23, operands: ['reg', 'reg', 'slot', 'mode'] },

  // Binary operators: accumulator = reg <op> accumulator
  Add: { code: 0x30, operands: ['reg'] },
  Sub: { code: 0x31, operands: ['reg'] },
  Mul: { code: 0x32, operands: ['reg'] },
  Div: { code: 0x33, operands: ['reg'] },
  Mod: { code: 0x34, operands: ['reg'] },
  BitwiseOr: { code: 0x35, operands: ['reg'] },
  BitwiseXor: { code: 0x36, operands: ['reg'] },
  BitwiseAnd: { code: 0x37, operands: ['reg'] },
  ShiftLeft: { code: 0x38, operands: ['reg'] },
  ShiftRight: { code: 0x39, operands: ['reg'] },
  ShiftRightLogical: { code: 0x3A, operands: ['reg'] },

  // Compare operators: accumulator = reg <op> accumulator
  TestEqual: { code: 0x40, operands: ['reg', 'mode'] },
  TestNotEqual: { code: 0x41, operands: ['reg', 'mode'] },
  TestEqualStrict: { code: 0x42, operands: ['reg', 'mode'] },
  TestNotEqualStrict: { code: 0x43, operands: ['reg', 'mode'] },
  TestLessThan: { code: 0x44, operands: ['reg', 'mode'] },
  TestGreaterThan: { code: 0x45, operands: ['reg', 'mode'] },
  TestLessThanOrEqual: { code: 0x46, operands: ['reg', 'mode'] },
  TestGreaterThanOrEqual: { code: 0x47, operands: ['reg', 'mode'] },
  TestInstanceOf: { code: 0x48, operands: ['reg', 'mode'] },
  TestIn: { code: 0x49, operands: ['reg', 'mode'] },

  // Conversion
  ToBoolean: { code: 0x50, operands: [] },

  // Control flow
  Jump: { code: 0x60, operands: ['offset'] },
  JumpIfTrue: { code: 0x61, operands: ['offset'] },
  JumpIfFalse: { code: 0x62, operands: ['offset'] },

  // Calls
  Call: { code: 0x70, operands: ['reg', 'reg', 'count'] },
  CallRuntime: { code: 0x71, operands: ['runtime', 'reg', 'count'] },
  Return: { code: 0x72, operands: [] }
} as const satisfies Record<string, { code: number; operands: readonly OperandKind[] }>;

export type Bytecode = keyof typeof BYTECODES;

export type JumpBytecode = 'Jump' | 'JumpIfTrue' | 'JumpIfFalse';

export type BinaryBytecode =
  | 'Add' | 'Sub' | 'Mul' | 'Div' | 'Mod'
  | 'BitwiseOr' | 'BitwiseXor' | 'BitwiseAnd'
  | 'ShiftLeft' | 'ShiftRight' | 'ShiftRightLogical';

export type CompareBytecode =
  | 'TestEqual' | 'TestNotEqual' | 'TestEqualStrict' | 'TestNotEqualStrict'
  | 'TestLessThan' | 'TestGreaterThan' | 'TestLessThanOrEqual' | 'TestGreaterThanOrEqual'
  | 'TestInstanceOf' | 'TestIn';

// Operators lowered through a single instruction. ',', '&&' and '||' need
// branches and have no bytecode of their own.
export type ArithmeticOperator = Exclude<BinaryOperator, ',' | '&&' | '||'>;

const BINARY_BYTECODES: Record<ArithmeticOperator, BinaryBytecode> = {
  '+': 'Add',
  '-': 'Sub',
  '*': 'Mul',
  '/': 'Div',
  '%': 'Mod',
  '|': 'BitwiseOr',
  '^': 'BitwiseXor',
  '&': 'BitwiseAnd',
  '<<': 'ShiftLeft',
  '>>': 'ShiftRight',
  '>>>': 'ShiftRightLogical'
};

const COMPARE_BYTECODES: Record<CompareOperator, CompareBytecode> = {
  '==': 'TestEqual',
  '!=': 'TestNotEqual',
  '===': 'TestEqualStrict',
  '!==': 'TestNotEqualStrict',
  '<': 'TestLessThan',
  '>': 'TestGreaterThan',
  '<=': 'TestLessThanOrEqual',
  '>=': 'TestGreaterThanOrEqual',
  'instanceof': 'TestInstanceOf',
  'in': 'TestIn'
};

export function isArithmeticOperator(op: BinaryOperator): op is ArithmeticOperator {
  return op !== ',' && op !== '&&' && op !== '||';
}

export function binaryBytecodeFor(op: ArithmeticOperator): BinaryBytecode {
  return BINARY_BYTECODES[op];
}

export function compareBytecodeFor(op: CompareOperator): CompareBytecode {
  return COMPARE_BYTECODES[op];
}

export function operandKinds(bytecode: Bytecode): readonly OperandKind[] {
  return BYTECODES[bytecode].operands;
}

const BY_CODE = new Map<number, Bytecode>();
for (const name of Object.keys(BYTECODES)) {
  if (isBytecode(name)) {
    BY_CODE.set(BYTECODES[name].code, name);
  }
}

export function isBytecode(name: string): name is Bytecode {
  return Object.prototype.hasOwnProperty.call(BYTECODES, name);
}

export function bytecodeFromCode(code: number): Bytecode | undefined {
  return BY_CODE.get(code);
}
