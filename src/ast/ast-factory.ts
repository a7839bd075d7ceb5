// Builds resolved syntax trees, allocating variable indices and feedback slots

import { CompilationInfo } from '../codegen/compilation-info';
import { FeedbackVectorLayout } from '../feedback/feedback-vector';
import { RuntimeFunctionId } from '../runtime/runtime-functions';
import {
  ArrayLiteral,
  Assignment,
  AssignmentOperator,
  AstNodeBase,
  BinaryOperation,
  BinaryOperator,
  Block,
  BlockScope,
  BreakStatement,
  BreakableStatement,
  Call,
  CallRuntime,
  CompareOperation,
  CompareOperator,
  Conditional,
  ContinueStatement,
  DebuggerStatement,
  DeclarationMode,
  DoWhileStatement,
  EmptyStatement,
  Expression,
  ExpressionStatement,
  ForStatement,
  FunctionLiteral,
  FunctionScope,
  IfStatement,
  IterationStatement,
  LanguageMode,
  Literal,
  LiteralValue,
  Property,
  ReturnStatement,
  SourceLocation,
  Statement,
  Throw,
  UnaryOperation,
  UnaryOperator,
  Variable,
  VariableDeclaration,
  VariableLocation,
  VariableProxy,
  WhileStatement,
  WithStatement,
  isPropertyName
} from './ast';

export class AstFactory {
  readonly feedbackVector = new FeedbackVectorLayout();

  // Scopes and variables

  newFunctionScope(): FunctionScope {
    return { parameters: [], stackSlotCount: 0, contextLocalCount: 0, declarations: [] };
  }

  newBlockScope(): BlockScope {
    return { declarations: [], contextLocalCount: 0 };
  }

  declareParameter(scope: FunctionScope, name: string): Variable {
    const variable: Variable = { name, location: 'parameter', index: scope.parameters.length };
    scope.parameters.push(variable);
    return variable;
  }

  /**
   * Reserve a stack slot. The declaration goes on `blockScope` when given,
   * otherwise on the function scope.
   */
  declareLocal(scope: FunctionScope, name: string, mode: DeclarationMode = 'var', blockScope?: BlockScope): Variable {
    const variable: Variable = { name, location: 'local', index: scope.stackSlotCount++ };
    const declaration = this.variableDeclaration(variable, mode);
    (blockScope ?? scope).declarations.push(declaration);
    return variable;
  }

  globalVariable(name: string, index: number): Variable {
    return { name, location: 'global', index };
  }

  // Variables the generator has no storage rule for; index is meaningless.
  unresolvedVariable(name: string, location: Exclude<VariableLocation, 'parameter' | 'local' | 'global'>): Variable {
    return { name, location, index: -1 };
  }

  variableDeclaration(variable: Variable, mode: DeclarationMode = 'var', location?: SourceLocation): VariableDeclaration {
    return located<VariableDeclaration>({ kind: 'variableDeclaration', variable, mode }, location);
  }

  functionLiteral(
    name: string,
    scope: FunctionScope,
    body: Statement[],
    languageMode: LanguageMode = 'sloppy',
    location?: SourceLocation
  ): FunctionLiteral {
    return located<FunctionLiteral>({ kind: 'functionLiteral', name, scope, body, languageMode }, location);
  }

  compilationInfo(literal: FunctionLiteral): CompilationInfo {
    return new CompilationInfo(literal, this.feedbackVector);
  }

  // Statements

  block(statements: Statement[], scope?: BlockScope, location?: SourceLocation): Block {
    const node: Block = { kind: 'block', statements };
    if (scope) {
      node.scope = scope;
    }
    return located(node, location);
  }

  expressionStatement(expression: Expression, location?: SourceLocation): ExpressionStatement {
    return located<ExpressionStatement>({ kind: 'expressionStatement', expression }, location);
  }

  emptyStatement(location?: SourceLocation): EmptyStatement {
    return located<EmptyStatement>({ kind: 'emptyStatement' }, location);
  }

  ifStatement(condition: Expression, thenStatement: Statement, elseStatement?: Statement, location?: SourceLocation): IfStatement {
    const node: IfStatement = { kind: 'ifStatement', condition, thenStatement };
    if (elseStatement) {
      node.elseStatement = elseStatement;
    }
    return located(node, location);
  }

  returnStatement(expression: Expression, location?: SourceLocation): ReturnStatement {
    return located<ReturnStatement>({ kind: 'returnStatement', expression }, location);
  }

  breakStatement(target: BreakableStatement, location?: SourceLocation): BreakStatement {
    return located<BreakStatement>({ kind: 'breakStatement', target }, location);
  }

  continueStatement(target: IterationStatement, location?: SourceLocation): ContinueStatement {
    return located<ContinueStatement>({ kind: 'continueStatement', target }, location);
  }

  // Loops are created before their bodies so that break and continue
  // statements inside can reference them; assign `body` afterwards.

  whileStatement(condition: Expression, body?: Statement, location?: SourceLocation): WhileStatement {
    return located<WhileStatement>({ kind: 'whileStatement', condition, body: body ?? this.emptyStatement() }, location);
  }

  doWhileStatement(condition: Expression, body?: Statement, location?: SourceLocation): DoWhileStatement {
    return located<DoWhileStatement>({ kind: 'doWhileStatement', condition, body: body ?? this.emptyStatement() }, location);
  }

  forStatement(
    parts: { init?: Statement; condition?: Expression; next?: Statement },
    body?: Statement,
    location?: SourceLocation
  ): ForStatement {
    const node: ForStatement = { kind: 'forStatement', body: body ?? this.emptyStatement() };
    if (parts.init) node.init = parts.init;
    if (parts.condition) node.condition = parts.condition;
    if (parts.next) node.next = parts.next;
    return located(node, location);
  }

  withStatement(object: Expression, statement: Statement, location?: SourceLocation): WithStatement {
    return located<WithStatement>({ kind: 'withStatement', object, statement }, location);
  }

  debuggerStatement(location?: SourceLocation): DebuggerStatement {
    return located<DebuggerStatement>({ kind: 'debuggerStatement' }, location);
  }

  // Expressions

  literal(value: LiteralValue, location?: SourceLocation): Literal {
    return located<Literal>({ kind: 'literal', value }, location);
  }

  variableProxy(variable: Variable, location?: SourceLocation): VariableProxy {
    return located<VariableProxy>({ kind: 'variableProxy', variable }, location);
  }

  /**
   * Property load. Literal keys that are not array indices make a named
   * access; everything else is keyed.
   */
  property(object: Expression, key: Expression, location?: SourceLocation): Property {
    const named = key.kind === 'literal' && isPropertyName(key.value);
    const slot = named ? this.feedbackVector.addLoadICSlot() : this.feedbackVector.addKeyedLoadICSlot();
    return located<Property>({ kind: 'property', object, key, slot }, location);
  }

  namedProperty(object: Expression, name: string, location?: SourceLocation): Property {
    return this.property(object, this.literal(name), location);
  }

  assignment(target: Expression, value: Expression, op: AssignmentOperator = '=', location?: SourceLocation): Assignment {
    const node: Assignment = { kind: 'assignment', op, target, value };
    if (target.kind === 'property') {
      const named = target.key.kind === 'literal' && isPropertyName(target.key.value);
      node.slot = named ? this.feedbackVector.addStoreICSlot() : this.feedbackVector.addKeyedStoreICSlot();
    }
    return located(node, location);
  }

  call(expression: Expression, args: Expression[], location?: SourceLocation): Call {
    return located<Call>({ kind: 'call', expression, arguments: args }, location);
  }

  callRuntime(functionId: RuntimeFunctionId, args: Expression[], isJsRuntime = false, location?: SourceLocation): CallRuntime {
    return located<CallRuntime>({ kind: 'callRuntime', functionId, arguments: args, isJsRuntime }, location);
  }

  binaryOperation(op: BinaryOperator, left: Expression, right: Expression, location?: SourceLocation): BinaryOperation {
    return located<BinaryOperation>({ kind: 'binaryOperation', op, left, right }, location);
  }

  compareOperation(op: CompareOperator, left: Expression, right: Expression, location?: SourceLocation): CompareOperation {
    return located<CompareOperation>({ kind: 'compareOperation', op, left, right }, location);
  }

  unaryOperation(op: UnaryOperator, expression: Expression, location?: SourceLocation): UnaryOperation {
    return located<UnaryOperation>({ kind: 'unaryOperation', op, expression }, location);
  }

  conditional(condition: Expression, thenExpression: Expression, elseExpression: Expression, location?: SourceLocation): Conditional {
    return located<Conditional>({ kind: 'conditional', condition, thenExpression, elseExpression }, location);
  }

  arrayLiteral(values: Expression[], location?: SourceLocation): ArrayLiteral {
    return located<ArrayLiteral>({ kind: 'arrayLiteral', values }, location);
  }

  throw(exception: Expression, location?: SourceLocation): Throw {
    return located<Throw>({ kind: 'throw', exception }, location);
  }
}

function located<T extends AstNodeBase>(node: T, location: SourceLocation | undefined): T {
  if (location) {
    node.location = location;
  }
  return node;
}
