// Call and runtime call lowering

import { Call, CallRuntime, callType } from '../ast/ast';
import { InternalCompilerError, UnsupportedConstructError } from '../errors';
import { createTracer } from '../logger';
import { findRuntimeFunction } from '../runtime/runtime-functions';
import { CodegenContext } from './codegen-context';
import { checkPropertySupported, lowerPropertyLoad, lowerVariableLoad } from './expression-codegen';
import { lower } from './lower';
import { withTemporaryRegisterScope } from './register-allocator';

const dbg = createTracer('expr');

/**
 * Lower a call. Registers are laid out as [callee, receiver, arg0 .. argN-1],
 * contiguous, so the Call instruction can address the arguments from the
 * receiver.
 */
export function lowerCall(expr: Call, context: CodegenContext): void {
  const builder = context.builder;
  const callee = expr.expression;
  const type = callType(expr);

  dbg('Call', { type, argc: expr.arguments.length });

  switch (type) {
    case 'propertyCall':
      if (callee.kind === 'property') {
        checkPropertySupported(callee);
      }
      break;
    case 'globalCall':
      if (callee.kind === 'variableProxy' && callee.variable.location === 'unallocated') {
        throw new UnsupportedConstructError(expr.kind, `call to unallocated variable '${callee.variable.name}'`, expr.location);
      }
      break;
    case 'lookupSlotCall':
    case 'superCall':
    case 'possiblyEvalCall':
    case 'otherCall':
      throw new UnsupportedConstructError(expr.kind, type, expr.location);
  }

  withTemporaryRegisterScope(context.allocator, scope => {
    const calleeRegister = scope.newRegister();
    const receiver = scope.newRegister();

    if (callee.kind === 'property') {
      lower(callee.object, context);
      builder.storeAccumulatorInRegister(receiver);
      lowerPropertyLoad(receiver, callee, context);
      builder.storeAccumulatorInRegister(calleeRegister);
    } else if (callee.kind === 'variableProxy') {
      // Unqualified calls get an undefined receiver.
      builder.loadUndefined();
      builder.storeAccumulatorInRegister(receiver);
      lowerVariableLoad(callee.variable, callee, context);
      builder.storeAccumulatorInRegister(calleeRegister);
    } else {
      throw new InternalCompilerError(`Call classified as ${type} has a ${callee.kind} callee`);
    }

    expr.arguments.forEach((argument, i) => {
      lower(argument, context);
      const register = scope.newRegister();
      if (register.index !== receiver.index + 1 + i) {
        throw new InternalCompilerError(
          `Argument ${i} landed in ${register}, expected r${receiver.index + 1 + i}`
        );
      }
      builder.storeAccumulatorInRegister(register);
    });

    builder.call(calleeRegister, receiver, expr.arguments.length);
  });
}

export function lowerCallRuntime(expr: CallRuntime, context: CodegenContext): void {
  if (expr.isJsRuntime) {
    throw new UnsupportedConstructError(expr.kind, 'engine-internal runtime call', expr.location);
  }
  const fn = findRuntimeFunction(expr.functionId);
  if (!fn) {
    throw new InternalCompilerError(`Unknown runtime function id ${expr.functionId}`);
  }
  if (fn.resultSize > 1) {
    throw new UnsupportedConstructError(expr.kind, `${fn.name} produces ${fn.resultSize} results`, expr.location);
  }
  if (fn.argumentCount >= 0 && fn.argumentCount !== expr.arguments.length) {
    throw new InternalCompilerError(
      `${fn.name} takes ${fn.argumentCount} arguments, got ${expr.arguments.length}`
    );
  }

  const builder = context.builder;
  withTemporaryRegisterScope(context.allocator, scope => {
    // Allocated even without arguments so the operand is always a valid register.
    const first = scope.newRegister();
    expr.arguments.forEach((argument, i) => {
      const register = i === 0 ? first : scope.newRegister();
      if (register.index !== first.index + i) {
        throw new InternalCompilerError(
          `Runtime argument ${i} landed in ${register}, expected r${first.index + i}`
        );
      }
      lower(argument, context);
      builder.storeAccumulatorInRegister(register);
    });

    builder.callRuntime(fn.id, first, expr.arguments.length);
  });
}
