// Resolved syntax tree consumed by the bytecode generator.
//
// Nodes arrive after scope resolution: every variable carries its storage
// location and index, every break/continue carries the statement it targets,
// and property sites carry their feedback slots.

import type { FeedbackSlot } from '../feedback/feedback-vector';
import type { RuntimeFunctionId } from '../runtime/runtime-functions';

export interface Position {
  line: number;
  column: number;
}

export interface SourceLocation {
  start: Position;
  end: Position;
  filename?: string;
}

// Internal "uninitialized" sentinel (let/const before initialization).
export const THE_HOLE: unique symbol = Symbol('the_hole');
export type TheHole = typeof THE_HOLE;

export type LiteralValue = number | string | boolean | null | undefined | TheHole;

export type LanguageMode = 'sloppy' | 'strict';

export type VariableLocation =
  | 'parameter'
  | 'local'
  | 'global'
  | 'unallocated'
  | 'context'
  | 'lookup';

export interface Variable {
  name: string;
  location: VariableLocation;
  index: number;
}

export interface AstNodeBase {
  location?: SourceLocation;
}

// Scopes

export interface BlockScope {
  declarations: Declaration[];
  contextLocalCount: number;
}

export interface FunctionScope {
  parameters: Variable[];
  stackSlotCount: number;
  contextLocalCount: number;
  declarations: Declaration[];
  // Implicit binding of a named function expression's own name.
  functionVariable?: VariableDeclaration;
}

// Declarations

export type DeclarationMode = 'var' | 'let' | 'const';

export interface VariableDeclaration extends AstNodeBase {
  kind: 'variableDeclaration';
  variable: Variable;
  mode: DeclarationMode;
}

export interface FunctionDeclaration extends AstNodeBase {
  kind: 'functionDeclaration';
  variable: Variable;
  fun: FunctionLiteral;
}

export interface ImportDeclaration extends AstNodeBase {
  kind: 'importDeclaration';
  localName: string;
  moduleSpecifier: string;
}

export interface ExportDeclaration extends AstNodeBase {
  kind: 'exportDeclaration';
  name: string;
}

export type Declaration =
  | VariableDeclaration
  | FunctionDeclaration
  | ImportDeclaration
  | ExportDeclaration;

// Statements

export interface Block extends AstNodeBase {
  kind: 'block';
  statements: Statement[];
  scope?: BlockScope;
}

export interface ExpressionStatement extends AstNodeBase {
  kind: 'expressionStatement';
  expression: Expression;
}

export interface EmptyStatement extends AstNodeBase {
  kind: 'emptyStatement';
}

export interface SloppyBlockFunctionStatement extends AstNodeBase {
  kind: 'sloppyBlockFunctionStatement';
  statement: Statement;
}

export interface IfStatement extends AstNodeBase {
  kind: 'ifStatement';
  condition: Expression;
  thenStatement: Statement;
  elseStatement?: Statement;
}

export interface ContinueStatement extends AstNodeBase {
  kind: 'continueStatement';
  target: IterationStatement;
}

export interface BreakStatement extends AstNodeBase {
  kind: 'breakStatement';
  target: BreakableStatement;
}

export interface ReturnStatement extends AstNodeBase {
  kind: 'returnStatement';
  expression: Expression;
}

export interface WithStatement extends AstNodeBase {
  kind: 'withStatement';
  object: Expression;
  statement: Statement;
}

export interface SwitchStatement extends AstNodeBase {
  kind: 'switchStatement';
  tag: Expression;
  cases: CaseClause[];
}

export interface CaseClause extends AstNodeBase {
  kind: 'caseClause';
  // Absent for the default clause.
  label?: Expression;
  statements: Statement[];
}

export interface DoWhileStatement extends AstNodeBase {
  kind: 'doWhileStatement';
  body: Statement;
  condition: Expression;
}

export interface WhileStatement extends AstNodeBase {
  kind: 'whileStatement';
  condition: Expression;
  body: Statement;
}

export interface ForStatement extends AstNodeBase {
  kind: 'forStatement';
  init?: Statement;
  condition?: Expression;
  next?: Statement;
  body: Statement;
}

export interface ForInStatement extends AstNodeBase {
  kind: 'forInStatement';
  each: Expression;
  subject: Expression;
  body: Statement;
}

export interface ForOfStatement extends AstNodeBase {
  kind: 'forOfStatement';
  each: Expression;
  iterable: Expression;
  body: Statement;
}

export interface TryCatchStatement extends AstNodeBase {
  kind: 'tryCatchStatement';
  tryBlock: Block;
  catchVariable?: Variable;
  catchBlock: Block;
}

export interface TryFinallyStatement extends AstNodeBase {
  kind: 'tryFinallyStatement';
  tryBlock: Block;
  finallyBlock: Block;
}

export interface DebuggerStatement extends AstNodeBase {
  kind: 'debuggerStatement';
}

export type IterationStatement =
  | DoWhileStatement
  | WhileStatement
  | ForStatement
  | ForInStatement
  | ForOfStatement;

export type BreakableStatement = IterationStatement | SwitchStatement | Block;

export type Statement =
  | Block
  | ExpressionStatement
  | EmptyStatement
  | SloppyBlockFunctionStatement
  | IfStatement
  | ContinueStatement
  | BreakStatement
  | ReturnStatement
  | WithStatement
  | SwitchStatement
  | DoWhileStatement
  | WhileStatement
  | ForStatement
  | ForInStatement
  | ForOfStatement
  | TryCatchStatement
  | TryFinallyStatement
  | DebuggerStatement;

// Operators

export type BinaryOperator =
  | ','
  | '||'
  | '&&'
  | '|'
  | '^'
  | '&'
  | '<<'
  | '>>'
  | '>>>'
  | '+'
  | '-'
  | '*'
  | '/'
  | '%';

export type CompareOperator =
  | '=='
  | '!='
  | '==='
  | '!=='
  | '<'
  | '>'
  | '<='
  | '>='
  | 'instanceof'
  | 'in';

export type AssignmentOperator =
  | '='
  | '+='
  | '-='
  | '*='
  | '/='
  | '%='
  | '|='
  | '^='
  | '&='
  | '<<='
  | '>>='
  | '>>>=';

export type UnaryOperator = '!' | '~' | '-' | '+' | 'typeof' | 'void' | 'delete';

// Expressions

export interface Literal extends AstNodeBase {
  kind: 'literal';
  value: LiteralValue;
}

export interface VariableProxy extends AstNodeBase {
  kind: 'variableProxy';
  variable: Variable;
}

export interface Property extends AstNodeBase {
  kind: 'property';
  object: Expression;
  key: Expression;
  slot: FeedbackSlot;
}

export interface Assignment extends AstNodeBase {
  kind: 'assignment';
  op: AssignmentOperator;
  target: Expression;
  value: Expression;
  // Present when the target is a property.
  slot?: FeedbackSlot;
}

export interface Call extends AstNodeBase {
  kind: 'call';
  expression: Expression;
  arguments: Expression[];
}

export interface CallNew extends AstNodeBase {
  kind: 'callNew';
  expression: Expression;
  arguments: Expression[];
}

export interface CallRuntime extends AstNodeBase {
  kind: 'callRuntime';
  functionId: RuntimeFunctionId;
  arguments: Expression[];
  // Calls into runtime functions written in the guest language itself.
  isJsRuntime: boolean;
}

export interface BinaryOperation extends AstNodeBase {
  kind: 'binaryOperation';
  op: BinaryOperator;
  left: Expression;
  right: Expression;
}

export interface CompareOperation extends AstNodeBase {
  kind: 'compareOperation';
  op: CompareOperator;
  left: Expression;
  right: Expression;
}

export interface UnaryOperation extends AstNodeBase {
  kind: 'unaryOperation';
  op: UnaryOperator;
  expression: Expression;
}

export interface CountOperation extends AstNodeBase {
  kind: 'countOperation';
  op: '++' | '--';
  isPrefix: boolean;
  expression: Expression;
}

export interface Conditional extends AstNodeBase {
  kind: 'conditional';
  condition: Expression;
  thenExpression: Expression;
  elseExpression: Expression;
}

export interface FunctionLiteral extends AstNodeBase {
  kind: 'functionLiteral';
  name: string;
  scope: FunctionScope;
  body: Statement[];
  languageMode: LanguageMode;
}

export interface ClassLiteral extends AstNodeBase {
  kind: 'classLiteral';
  name?: string;
}

export interface NativeFunctionLiteral extends AstNodeBase {
  kind: 'nativeFunctionLiteral';
  name: string;
}

export interface RegExpLiteral extends AstNodeBase {
  kind: 'regExpLiteral';
  pattern: string;
  flags: string;
}

export interface ObjectLiteralProperty {
  key: Expression;
  value: Expression;
}

export interface ObjectLiteral extends AstNodeBase {
  kind: 'objectLiteral';
  properties: ObjectLiteralProperty[];
}

export interface ArrayLiteral extends AstNodeBase {
  kind: 'arrayLiteral';
  values: Expression[];
}

export interface Yield extends AstNodeBase {
  kind: 'yield';
  expression: Expression;
}

export interface Throw extends AstNodeBase {
  kind: 'throw';
  exception: Expression;
}

export interface Spread extends AstNodeBase {
  kind: 'spread';
  expression: Expression;
}

export interface EmptyParentheses extends AstNodeBase {
  kind: 'emptyParentheses';
}

export interface ThisFunction extends AstNodeBase {
  kind: 'thisFunction';
}

export interface SuperPropertyReference extends AstNodeBase {
  kind: 'superPropertyReference';
}

export interface SuperCallReference extends AstNodeBase {
  kind: 'superCallReference';
}

export type Expression =
  | Literal
  | VariableProxy
  | Property
  | Assignment
  | Call
  | CallNew
  | CallRuntime
  | BinaryOperation
  | CompareOperation
  | UnaryOperation
  | CountOperation
  | Conditional
  | FunctionLiteral
  | ClassLiteral
  | NativeFunctionLiteral
  | RegExpLiteral
  | ObjectLiteral
  | ArrayLiteral
  | Yield
  | Throw
  | Spread
  | EmptyParentheses
  | ThisFunction
  | SuperPropertyReference
  | SuperCallReference;

export type AstNode = Statement | Expression | Declaration | CaseClause;

// Classification helpers

export type PropertyKind =
  | 'namedProperty'
  | 'keyedProperty'
  | 'namedSuperProperty'
  | 'keyedSuperProperty';

export type AssignTargetKind = 'variable' | PropertyKind;

export type CallType =
  | 'propertyCall'
  | 'globalCall'
  | 'lookupSlotCall'
  | 'superCall'
  | 'possiblyEvalCall'
  | 'otherCall';

const MAX_ARRAY_INDEX = 4294967294; // 2^32 - 2

/**
 * True for string keys that name a property rather than an array element.
 */
export function isPropertyName(value: LiteralValue): value is string {
  if (typeof value !== 'string') {
    return false;
  }
  if (!/^(0|[1-9][0-9]*)$/.test(value)) {
    return true;
  }
  return Number(value) > MAX_ARRAY_INDEX;
}

export function propertyKind(property: Property): PropertyKind {
  const named = property.key.kind === 'literal' && isPropertyName(property.key.value);
  if (property.object.kind === 'superPropertyReference') {
    return named ? 'namedSuperProperty' : 'keyedSuperProperty';
  }
  return named ? 'namedProperty' : 'keyedProperty';
}

/**
 * Classify an assignment target, or undefined when the expression is not a
 * storable reference.
 */
export function assignTargetKind(target: Expression): AssignTargetKind | undefined {
  switch (target.kind) {
    case 'variableProxy':
      return 'variable';
    case 'property':
      return propertyKind(target);
    default:
      return undefined;
  }
}

export function callType(call: Call): CallType {
  const callee = call.expression;
  switch (callee.kind) {
    case 'variableProxy': {
      const location = callee.variable.location;
      if (callee.variable.name === 'eval' && (location === 'lookup' || location === 'unallocated')) {
        return 'possiblyEvalCall';
      }
      if (location === 'lookup') {
        return 'lookupSlotCall';
      }
      if (location === 'context') {
        return 'otherCall';
      }
      return 'globalCall';
    }
    case 'property':
      return 'propertyCall';
    case 'superCallReference':
      return 'superCall';
    default:
      return 'otherCall';
  }
}

const STATEMENT_KINDS: ReadonlySet<string> = new Set<Statement['kind']>([
  'block',
  'expressionStatement',
  'emptyStatement',
  'sloppyBlockFunctionStatement',
  'ifStatement',
  'continueStatement',
  'breakStatement',
  'returnStatement',
  'withStatement',
  'switchStatement',
  'doWhileStatement',
  'whileStatement',
  'forStatement',
  'forInStatement',
  'forOfStatement',
  'tryCatchStatement',
  'tryFinallyStatement',
  'debuggerStatement'
]);

export function isStatement(node: AstNode): node is Statement {
  return STATEMENT_KINDS.has(node.kind);
}
