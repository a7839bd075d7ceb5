// Node lowering dispatcher: one entry point for every syntax-tree node kind

import { AstNode, isStatement } from '../ast/ast';
import { InternalCompilerError, UnsupportedConstructError } from '../errors';
import { CodegenContext } from './codegen-context';
import { lowerCall, lowerCallRuntime } from './call-codegen';
import {
  lowerAssignment,
  lowerBinaryOperation,
  lowerCompareOperation,
  lowerLiteral,
  lowerProperty,
  lowerVariableLoad
} from './expression-codegen';
import {
  lowerBlock,
  lowerBreakStatement,
  lowerContinueStatement,
  lowerDeclaration,
  lowerDoWhileStatement,
  lowerForStatement,
  lowerIfStatement,
  lowerReturnStatement,
  lowerWhileStatement
} from './statement-codegen';

/**
 * Lower a node. Expressions leave their value in the accumulator.
 */
export function lower(node: AstNode, context: CodegenContext): void {
  if (isStatement(node)) {
    context.builder.setSourcePosition(node.location);
  }

  switch (node.kind) {
    // Declarations
    case 'variableDeclaration':
    case 'functionDeclaration':
    case 'importDeclaration':
    case 'exportDeclaration':
      lowerDeclaration(node, context);
      return;

    // Statements
    case 'block':
      lowerBlock(node, context);
      return;
    case 'expressionStatement':
      lower(node.expression, context);
      return;
    case 'emptyStatement':
      return;
    case 'sloppyBlockFunctionStatement':
      lower(node.statement, context);
      return;
    case 'ifStatement':
      lowerIfStatement(node, context);
      return;
    case 'continueStatement':
      lowerContinueStatement(node, context);
      return;
    case 'breakStatement':
      lowerBreakStatement(node, context);
      return;
    case 'returnStatement':
      lowerReturnStatement(node, context);
      return;
    case 'doWhileStatement':
      lowerDoWhileStatement(node, context);
      return;
    case 'whileStatement':
      lowerWhileStatement(node, context);
      return;
    case 'forStatement':
      lowerForStatement(node, context);
      return;

    // Expressions
    case 'literal':
      lowerLiteral(node, context);
      return;
    case 'variableProxy':
      lowerVariableLoad(node.variable, node, context);
      return;
    case 'property':
      lowerProperty(node, context);
      return;
    case 'assignment':
      lowerAssignment(node, context);
      return;
    case 'call':
      lowerCall(node, context);
      return;
    case 'callRuntime':
      lowerCallRuntime(node, context);
      return;
    case 'binaryOperation':
      lowerBinaryOperation(node, context);
      return;
    case 'compareOperation':
      lowerCompareOperation(node, context);
      return;

    case 'emptyParentheses':
      throw new InternalCompilerError('Empty parentheses reached the bytecode generator');

    case 'withStatement':
    case 'switchStatement':
    case 'caseClause':
    case 'forInStatement':
    case 'forOfStatement':
    case 'tryCatchStatement':
    case 'tryFinallyStatement':
    case 'debuggerStatement':
    case 'callNew':
    case 'unaryOperation':
    case 'countOperation':
    case 'conditional':
    case 'functionLiteral':
    case 'classLiteral':
    case 'nativeFunctionLiteral':
    case 'regExpLiteral':
    case 'objectLiteral':
    case 'arrayLiteral':
    case 'yield':
    case 'throw':
    case 'spread':
    case 'thisFunction':
    case 'superPropertyReference':
    case 'superCallReference':
      throw new UnsupportedConstructError(node.kind, undefined, node.location);

    default: {
      const unhandled: never = node;
      throw new UnsupportedConstructError(describeNode(unhandled));
    }
  }
}

export function lowerAll(nodes: readonly AstNode[], context: CodegenContext): void {
  for (const node of nodes) {
    lower(node, context);
  }
}

function describeNode(node: unknown): string {
  if (typeof node === 'object' && node !== null && 'kind' in node && typeof node.kind === 'string') {
    return node.kind;
  }
  return 'unknown node';
}
