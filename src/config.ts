// Options for lowering and for the reference interpreter

export interface LoweringOptions {
  // Record statement source positions in the finalized program. Needed for
  // listing source maps; switch off for smaller output.
  emitSourcePositions?: boolean;
}

export interface InterpreterOptions {
  // Abort execution after this many dispatched instructions.
  maxSteps?: number;
}

export const DEFAULT_LOWERING_OPTIONS: Required<LoweringOptions> = {
  emitSourcePositions: true
};

export const DEFAULT_INTERPRETER_OPTIONS: Required<InterpreterOptions> = {
  maxSteps: 1_000_000
};

export function resolveLoweringOptions(options: LoweringOptions = {}): Required<LoweringOptions> {
  return {
    emitSourcePositions: options.emitSourcePositions ?? DEFAULT_LOWERING_OPTIONS.emitSourcePositions
  };
}

export function resolveInterpreterOptions(options: InterpreterOptions = {}): Required<InterpreterOptions> {
  const maxSteps = options.maxSteps ?? DEFAULT_INTERPRETER_OPTIONS.maxSteps;
  if (!Number.isInteger(maxSteps) || maxSteps <= 0) {
    throw new Error(`Invalid maxSteps: ${maxSteps}. Must be a positive integer`);
  }
  return { maxSteps };
}
