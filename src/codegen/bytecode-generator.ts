/**
 * Bytecode generator: lowers one resolved function in a single pass.
 *
 * Each call to `generate` owns a fresh builder, register allocator and
 * control scope chain, so a generator may be reused across functions.
 */

import { BytecodeArray } from '../bytecode/bytecode-array';
import { BytecodeArrayBuilder } from '../bytecode/bytecode-array-builder';
import { LoweringOptions } from '../config';
import { InternalCompilerError } from '../errors';
import { logger } from '../logger';
import { CodegenContext } from './codegen-context';
import { CompilationInfo } from './compilation-info';
import { lower, lowerAll } from './lower';
import { TemporaryRegisterAllocator } from './register-allocator';

export class BytecodeGenerator {
  constructor(private readonly options: LoweringOptions = {}) {}

  generate(info: CompilationInfo): BytecodeArray {
    const builder = new BytecodeArrayBuilder(this.options);
    builder.setParameterCount(info.parameterCount);
    builder.setLocalCount(info.localCount);

    const context: CodegenContext = {
      builder,
      allocator: new TemporaryRegisterAllocator(builder.firstTemporaryRegister),
      info,
      controlScope: undefined
    };

    const literal = info.literal;
    const scope = literal.scope;

    // Implicit binding of the function's own name, then declarations, then body.
    if (scope.functionVariable) {
      lower(scope.functionVariable, context);
    }
    lowerAll(scope.declarations, context);
    lowerAll(literal.body, context);

    if (builder.canFallThrough()) {
      builder.loadUndefined().returnAccumulator();
    }

    if (context.controlScope) {
      throw new InternalCompilerError('Control scope chain not empty at end of function');
    }
    if (context.allocator.depth !== 0) {
      throw new InternalCompilerError(`${context.allocator.depth} temporary register scopes left open`);
    }

    const bytecode = builder.toBytecodeArray(info.functionName, context.allocator.registerCount);
    logger.debug(
      `Generated ${bytecode.length} instructions for '${bytecode.name}' using ${bytecode.registerCount} registers`
    );
    return bytecode;
  }
}
