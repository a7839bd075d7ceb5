// Expression lowering: literals, variables, properties, assignment, operators

import {
  Assignment,
  AstNodeBase,
  BinaryOperation,
  CompareOperation,
  Literal,
  Property,
  THE_HOLE,
  Variable,
  assignTargetKind,
  isPropertyName,
  propertyKind
} from '../ast/ast';
import { Register } from '../bytecode/register';
import { isArithmeticOperator } from '../bytecode/bytecodes';
import { InternalCompilerError, UnsupportedConstructError } from '../errors';
import { createTracer } from '../logger';
import { CodegenContext } from './codegen-context';
import { lower } from './lower';
import { withTemporaryRegisterScope } from './register-allocator';

const dbg = createTracer('expr');

const SMI_MIN = -0x80000000;
const SMI_MAX = 0x7fffffff;

export function isSmi(value: number): boolean {
  return Number.isInteger(value) && value >= SMI_MIN && value <= SMI_MAX && !Object.is(value, -0);
}

export function lowerLiteral(literal: Literal, context: CodegenContext): void {
  const builder = context.builder;
  const value = literal.value;

  if (value === THE_HOLE) {
    builder.loadTheHole();
  } else if (value === undefined) {
    builder.loadUndefined();
  } else if (value === null) {
    builder.loadNull();
  } else if (typeof value === 'boolean') {
    if (value) {
      builder.loadTrue();
    } else {
      builder.loadFalse();
    }
  } else if (typeof value === 'number' && isSmi(value)) {
    builder.loadSmi(value);
  } else {
    builder.loadConstant(value);
  }
}

/**
 * Load a variable into the accumulator. `node` supplies the location for
 * diagnostics.
 */
export function lowerVariableLoad(variable: Variable, node: AstNodeBase, context: CodegenContext): void {
  const builder = context.builder;
  switch (variable.location) {
    case 'local':
      builder.loadAccumulatorWithRegister(builder.local(variable.index));
      return;
    case 'parameter':
      // Register 0 holds the receiver.
      builder.loadAccumulatorWithRegister(builder.parameter(variable.index + 1));
      return;
    case 'global':
      builder.loadGlobal(variable.index);
      return;
    case 'unallocated':
    case 'context':
    case 'lookup':
      throw new UnsupportedConstructError(
        'variableProxy',
        `load of ${variable.location} variable '${variable.name}'`,
        node.location
      );
  }
}

function propertyName(property: Property): string {
  const key = property.key;
  if (key.kind !== 'literal' || !isPropertyName(key.value)) {
    throw new InternalCompilerError(`Named property access with a ${key.kind} key`);
  }
  return key.value;
}

/**
 * Reject property forms with no lowering before anything is emitted.
 */
export function checkPropertySupported(property: Property): void {
  const kind = propertyKind(property);
  if (kind === 'namedSuperProperty' || kind === 'keyedSuperProperty') {
    throw new UnsupportedConstructError('property', 'super property access', property.location);
  }
}

/**
 * Load `property` from the object already held in `object`.
 */
export function lowerPropertyLoad(object: Register, property: Property, context: CodegenContext): void {
  const { builder, info } = context;
  const kind = propertyKind(property);
  switch (kind) {
    case 'namedProperty':
      builder.loadConstant(propertyName(property));
      builder.loadNamedProperty(object, info.feedbackIndex(property.slot), info.languageMode);
      return;
    case 'keyedProperty':
      lower(property.key, context);
      builder.loadKeyedProperty(object, info.feedbackIndex(property.slot), info.languageMode);
      return;
    case 'namedSuperProperty':
    case 'keyedSuperProperty':
      throw new UnsupportedConstructError('property', 'super property access', property.location);
  }
}

export function lowerProperty(property: Property, context: CodegenContext): void {
  checkPropertySupported(property);
  withTemporaryRegisterScope(context.allocator, scope => {
    const object = scope.newRegister();
    lower(property.object, context);
    context.builder.storeAccumulatorInRegister(object);
    lowerPropertyLoad(object, property, context);
  });
}

export function lowerAssignment(expr: Assignment, context: CodegenContext): void {
  const { builder, info } = context;
  const target = expr.target;
  const targetKind = assignTargetKind(target);

  if (targetKind === undefined) {
    throw new InternalCompilerError(`Invalid assignment target: ${target.kind}`);
  }
  if (targetKind === 'namedSuperProperty' || targetKind === 'keyedSuperProperty') {
    throw new UnsupportedConstructError(expr.kind, 'super property target', expr.location);
  }
  if (expr.op !== '=') {
    throw new UnsupportedConstructError(expr.kind, `compound operator '${expr.op}'`, expr.location);
  }

  dbg('Assignment', { target: targetKind });

  withTemporaryRegisterScope(context.allocator, scope => {
    if (target.kind === 'variableProxy') {
      const variable = target.variable;
      if (variable.location !== 'local') {
        throw new UnsupportedConstructError(
          expr.kind,
          `store to ${variable.location} variable '${variable.name}'`,
          expr.location
        );
      }
      lower(expr.value, context);
      builder.storeAccumulatorInRegister(builder.local(variable.index));
      return;
    }

    if (target.kind !== 'property') {
      throw new InternalCompilerError(`Invalid assignment target: ${target.kind}`);
    }
    if (!expr.slot) {
      throw new InternalCompilerError('Property assignment has no feedback slot');
    }
    const feedbackIndex = info.feedbackIndex(expr.slot);

    const object = scope.newRegister();
    lower(target.object, context);
    builder.storeAccumulatorInRegister(object);

    const key = scope.newRegister();
    if (targetKind === 'namedProperty') {
      builder.loadConstant(propertyName(target));
    } else {
      lower(target.key, context);
    }
    builder.storeAccumulatorInRegister(key);

    lower(expr.value, context);

    if (targetKind === 'namedProperty') {
      builder.storeNamedProperty(object, key, feedbackIndex, info.languageMode);
    } else {
      builder.storeKeyedProperty(object, key, feedbackIndex, info.languageMode);
    }
  });
}

export function lowerBinaryOperation(expr: BinaryOperation, context: CodegenContext): void {
  const op = expr.op;
  if (!isArithmeticOperator(op)) {
    throw new UnsupportedConstructError(expr.kind, `operator '${op}'`, expr.location);
  }

  withTemporaryRegisterScope(context.allocator, scope => {
    const left = scope.newRegister();
    lower(expr.left, context);
    context.builder.storeAccumulatorInRegister(left);
    lower(expr.right, context);
    context.builder.binaryOperation(op, left);
  });
}

export function lowerCompareOperation(expr: CompareOperation, context: CodegenContext): void {
  withTemporaryRegisterScope(context.allocator, scope => {
    const left = scope.newRegister();
    lower(expr.left, context);
    context.builder.storeAccumulatorInRegister(left);
    lower(expr.right, context);
    context.builder.compareOperation(expr.op, left, context.info.languageMode);
  });
}
