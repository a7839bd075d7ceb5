// Human-readable listings of finalized bytecode

import { findRuntimeFunction } from '../runtime/runtime-functions';
import { BytecodeArray, Constant, Instruction } from './bytecode-array';
import { OperandKind, operandKinds } from './bytecodes';

export interface ListingLine {
  text: string;
  // Set on lines that show an instruction.
  instructionIndex?: number;
}

export function formatConstant(constant: Constant): string {
  if (typeof constant === 'string') {
    return JSON.stringify(constant);
  }
  return Object.is(constant, -0) ? '-0' : String(constant);
}

function formatOperand(kind: OperandKind, value: number, instructionIndex: number): string {
  switch (kind) {
    case 'reg':
      return `r${value}`;
    case 'imm':
    case 'count':
      return String(value);
    case 'idx':
      return `[${value}]`;
    case 'slot':
      return `#${value}`;
    case 'mode':
      return value === 1 ? 'strict' : 'sloppy';
    case 'offset':
      return `${value >= 0 ? '+' : ''}${value} (-> ${instructionIndex + value})`;
    case 'runtime': {
      const fn = findRuntimeFunction(value);
      return fn ? `%${fn.name}` : `%${value}`;
    }
  }
}

export function formatInstruction(instruction: Instruction, instructionIndex: number): string {
  const kinds = operandKinds(instruction.bytecode);
  const operands = instruction.operands.map((value, i) => formatOperand(kinds[i], value, instructionIndex));
  return operands.length > 0 ? `${instruction.bytecode} ${operands.join(', ')}` : instruction.bytecode;
}

export function disassemble(bytecode: BytecodeArray): ListingLine[] {
  const lines: ListingLine[] = [];
  lines.push({
    text: `function ${bytecode.name} (parameters: ${bytecode.parameterCount}, locals: ${bytecode.localCount}, registers: ${bytecode.registerCount})`
  });

  if (bytecode.constants.length > 0) {
    lines.push({ text: 'constants:' });
    bytecode.constants.forEach((constant, i) => {
      lines.push({ text: `  [${i}] ${formatConstant(constant)}` });
    });
  }

  lines.push({ text: 'code:' });
  bytecode.instructions.forEach((instruction, i) => {
    lines.push({ text: `${String(i).padStart(6)}  ${formatInstruction(instruction, i)}`, instructionIndex: i });
  });
  return lines;
}

export function formatListing(bytecode: BytecodeArray): string {
  return disassemble(bytecode).map(line => line.text).join('\n');
}
