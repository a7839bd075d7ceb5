// Statement and declaration lowering

import {
  Block,
  BreakStatement,
  ContinueStatement,
  Declaration,
  DoWhileStatement,
  ForStatement,
  IfStatement,
  ReturnStatement,
  WhileStatement
} from '../ast/ast';
import { UnsupportedConstructError } from '../errors';
import { createTracer } from '../logger';
import { CodegenContext } from './codegen-context';
import { ControlScopeForIteration, performControlCommand, withControlScope } from './control-scope';
import { lower, lowerAll } from './lower';
import { LoopBuilder } from './loop-builder';

const dbg = createTracer('stmt');

export function lowerDeclaration(declaration: Declaration, context: CodegenContext): void {
  if (declaration.kind !== 'variableDeclaration') {
    throw new UnsupportedConstructError(declaration.kind, undefined, declaration.location);
  }

  const variable = declaration.variable;
  switch (variable.location) {
    case 'parameter':
    case 'local':
      // Stack slots are reserved up front; nothing to emit.
      return;
    case 'global':
    case 'unallocated':
    case 'context':
    case 'lookup':
      throw new UnsupportedConstructError(
        declaration.kind,
        `${variable.location} variable '${variable.name}'`,
        declaration.location
      );
  }
}

export function lowerBlock(block: Block, context: CodegenContext): void {
  const scope = block.scope;
  if (scope && scope.contextLocalCount > 0) {
    throw new UnsupportedConstructError(block.kind, 'context-allocated block locals', block.location);
  }

  const builder = context.builder;
  builder.enterBlock();
  if (scope) {
    lowerAll(scope.declarations, context);
  }
  lowerAll(block.statements, context);
  builder.leaveBlock();
}

export function lowerReturnStatement(stmt: ReturnStatement, context: CodegenContext): void {
  lower(stmt.expression, context);
  context.builder.returnAccumulator();
}

export function lowerBreakStatement(stmt: BreakStatement, context: CodegenContext): void {
  dbg('break', stmt.target.kind);
  performControlCommand(context, 'break', stmt.target);
}

export function lowerContinueStatement(stmt: ContinueStatement, context: CodegenContext): void {
  dbg('continue', stmt.target.kind);
  performControlCommand(context, 'continue', stmt.target);
}

/**
 * Lower an if statement
 */
export function lowerIfStatement(stmt: IfStatement, context: CodegenContext): void {
  const builder = context.builder;
  const elseLabel = builder.newLabel();
  const endLabel = builder.newLabel();

  lower(stmt.condition, context);
  builder.castAccumulatorToBoolean();
  builder.jumpIfFalse(elseLabel);

  lower(stmt.thenStatement, context);

  if (stmt.elseStatement) {
    builder.jump(endLabel);
    builder.bind(elseLabel);
    lower(stmt.elseStatement, context);
  } else {
    builder.bind(elseLabel);
  }

  builder.bind(endLabel);
}

/**
 * Lower a while statement. The condition is tested at the bottom; entry jumps
 * straight to it.
 */
export function lowerWhileStatement(stmt: WhileStatement, context: CodegenContext): void {
  const builder = context.builder;
  const loopBuilder = new LoopBuilder(builder);
  const controlScope = new ControlScopeForIteration(context, stmt, loopBuilder);

  withControlScope(context, controlScope, () => {
    const bodyLabel = builder.newLabel();
    const conditionLabel = builder.newLabel();

    builder.jump(conditionLabel);
    builder.bind(bodyLabel);
    lower(stmt.body, context);

    builder.bind(conditionLabel);
    loopBuilder.bindContinueTarget();
    lower(stmt.condition, context);
    builder.castAccumulatorToBoolean();
    builder.jumpIfTrue(bodyLabel);

    loopBuilder.bindBreakTarget();
  });
}

export function lowerDoWhileStatement(stmt: DoWhileStatement, context: CodegenContext): void {
  const builder = context.builder;
  const loopBuilder = new LoopBuilder(builder);
  const controlScope = new ControlScopeForIteration(context, stmt, loopBuilder);

  withControlScope(context, controlScope, () => {
    const bodyLabel = builder.newLabel();

    builder.bind(bodyLabel);
    lower(stmt.body, context);

    loopBuilder.bindContinueTarget();
    lower(stmt.condition, context);
    builder.castAccumulatorToBoolean();
    builder.jumpIfTrue(bodyLabel);

    loopBuilder.bindBreakTarget();
  });
}

/**
 * Lower a for statement. `continue` lands on the step, so the step always
 * runs before the condition is re-tested.
 */
export function lowerForStatement(stmt: ForStatement, context: CodegenContext): void {
  const builder = context.builder;
  const loopBuilder = new LoopBuilder(builder);
  const controlScope = new ControlScopeForIteration(context, stmt, loopBuilder);

  withControlScope(context, controlScope, () => {
    if (stmt.init) {
      lower(stmt.init, context);
    }

    const bodyLabel = builder.newLabel();
    const conditionLabel = builder.newLabel();

    if (stmt.condition) {
      builder.jump(conditionLabel);
    }

    builder.bind(bodyLabel);
    lower(stmt.body, context);

    loopBuilder.bindContinueTarget();
    if (stmt.next) {
      lower(stmt.next, context);
    }

    if (stmt.condition) {
      builder.bind(conditionLabel);
      lower(stmt.condition, context);
      builder.castAccumulatorToBoolean();
      builder.jumpIfTrue(bodyLabel);
    } else {
      builder.jump(bodyLabel);
    }

    loopBuilder.bindBreakTarget();
  });
}
