// Error types raised by the lowering pipeline

import { SourceLocation } from './ast/ast';

/**
 * A broken internal contract: unmatched break/continue target, invalid
 * assignment target, register contiguity mismatch, label misuse. The lowering
 * pass is abandoned and none of its output is valid.
 */
export class InternalCompilerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InternalCompilerError';
  }
}

/**
 * A syntax-tree node that has no lowering rule yet. Raised before any
 * instruction for the node is emitted.
 */
export class UnsupportedConstructError extends Error {
  constructor(public readonly nodeKind: string, detail?: string, public readonly location?: SourceLocation) {
    super(formatUnsupported(nodeKind, detail, location));
    this.name = 'UnsupportedConstructError';
  }
}

export class AstFormatError extends Error {
  constructor(message: string, public readonly path: string) {
    super(`${path}: ${message}`);
    this.name = 'AstFormatError';
  }
}

export class VMRuntimeError extends Error {
  constructor(message: string, public readonly instructionIndex?: number) {
    super(instructionIndex === undefined ? message : `${message} (at instruction ${instructionIndex})`);
    this.name = 'VMRuntimeError';
  }
}

function formatUnsupported(nodeKind: string, detail: string | undefined, location: SourceLocation | undefined): string {
  const where = location ? ` at ${location.start.line}:${location.start.column}` : '';
  const what = detail ? `${nodeKind} (${detail})` : nodeKind;
  return `Unsupported construct: ${what}${where}`;
}
