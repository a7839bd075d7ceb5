// Entry points for compiling a resolved function

import { BytecodeArray } from './bytecode/bytecode-array';
import { BytecodeGenerator } from './codegen/bytecode-generator';
import { CompilationInfo } from './codegen/compilation-info';
import { LoweringOptions } from './config';
import { UnsupportedConstructError } from './errors';
import { logger } from './logger';

export type CompileResult =
  | { status: 'compiled'; bytecode: BytecodeArray }
  | { status: 'unsupported'; error: UnsupportedConstructError };

export function compileFunction(info: CompilationInfo, options: LoweringOptions = {}): BytecodeArray {
  return new BytecodeGenerator(options).generate(info);
}

/**
 * Like compileFunction, but reports constructs without a lowering as "not
 * yet compilable" instead of throwing. Internal errors still propagate.
 */
export function tryCompileFunction(info: CompilationInfo, options: LoweringOptions = {}): CompileResult {
  try {
    return { status: 'compiled', bytecode: compileFunction(info, options) };
  } catch (error) {
    if (error instanceof UnsupportedConstructError) {
      logger.info(`'${info.functionName}' is not yet compilable: ${error.message}`);
      return { status: 'unsupported', error };
    }
    throw error;
  }
}
