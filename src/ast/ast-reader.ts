/**
 * Reads a resolved function from JSON.
 *
 * Document shape:
 *
 *   {
 *     "name": "sum",
 *     "languageMode": "strict",
 *     "parameters": ["n"],
 *     "locals": ["i", { "name": "total", "mode": "let" }],
 *     "globals": ["print"],
 *     "body": [ <statement>, ... ]
 *   }
 *
 * Nodes are objects with a "kind" matching the syntax tree. Names resolve to
 * locals, then parameters, then globals; anything else is an unallocated
 * global. Loops may carry an "id"; break and continue name it in "target",
 * or default to the innermost enclosing loop.
 */

import { AstFormatError } from '../errors';
import { CompilationInfo } from '../codegen/compilation-info';
import { findRuntimeFunctionByName } from '../runtime/runtime-functions';
import {
  AssignmentOperator,
  BinaryOperator,
  CompareOperator,
  DeclarationMode,
  Expression,
  FunctionScope,
  IterationStatement,
  LanguageMode,
  LiteralValue,
  SourceLocation,
  Statement,
  THE_HOLE,
  UnaryOperator,
  Variable
} from './ast';
import { AstFactory } from './ast-factory';

type JsonObject = { [key: string]: unknown };

const BINARY_OPERATORS: readonly BinaryOperator[] = [',', '||', '&&', '|', '^', '&', '<<', '>>', '>>>', '+', '-', '*', '/', '%'];
const COMPARE_OPERATORS: readonly CompareOperator[] = ['==', '!=', '===', '!==', '<', '>', '<=', '>=', 'instanceof', 'in'];
const ASSIGNMENT_OPERATORS: readonly AssignmentOperator[] = ['=', '+=', '-=', '*=', '/=', '%=', '|=', '^=', '&=', '<<=', '>>=', '>>>='];
const UNARY_OPERATORS: readonly UnaryOperator[] = ['!', '~', '-', '+', 'typeof', 'void', 'delete'];
const DECLARATION_MODES: readonly DeclarationMode[] = ['var', 'let', 'const'];
const LANGUAGE_MODES: readonly LanguageMode[] = ['sloppy', 'strict'];

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function oneOf<T extends string>(allowed: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && allowed.some(candidate => candidate === value);
}

export interface ParsedFunction {
  info: CompilationInfo;
  // Global names in slot order.
  globals: string[];
}

export function parseFunctionJson(text: string, factory: AstFactory = new AstFactory()): ParsedFunction {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new AstFormatError(`invalid JSON: ${message}`, '$');
  }
  const reader = new AstReader(factory);
  const info = reader.readFunction(document);
  return { info, globals: [...reader.globalNames] };
}

export class AstReader {
  readonly globalNames: string[] = [];
  private readonly names = new Map<string, Variable>();
  private readonly loops: IterationStatement[] = [];
  private readonly loopIds = new Map<string, IterationStatement>();
  private scope: FunctionScope;

  constructor(private readonly factory: AstFactory = new AstFactory()) {
    this.scope = factory.newFunctionScope();
  }

  readFunction(document: unknown): CompilationInfo {
    const root = this.object(document, '$');
    const name = root.name === undefined ? 'anonymous' : this.string(root.name, '$.name');
    const languageMode = root.languageMode === undefined ? 'sloppy' : root.languageMode;
    if (!oneOf(LANGUAGE_MODES, languageMode)) {
      throw new AstFormatError(`expected "sloppy" or "strict"`, '$.languageMode');
    }

    this.scope = this.factory.newFunctionScope();
    this.names.clear();
    this.loopIds.clear();
    this.globalNames.length = 0;

    this.array(root.globals ?? [], '$.globals').forEach((entry, i) => {
      const global = this.string(entry, `$.globals[${i}]`);
      this.globalNames.push(global);
      this.names.set(global, this.factory.globalVariable(global, i));
    });
    this.array(root.parameters ?? [], '$.parameters').forEach((entry, i) => {
      const parameter = this.string(entry, `$.parameters[${i}]`);
      this.names.set(parameter, this.factory.declareParameter(this.scope, parameter));
    });
    this.array(root.locals ?? [], '$.locals').forEach((entry, i) => {
      const path = `$.locals[${i}]`;
      if (typeof entry === 'string') {
        this.names.set(entry, this.factory.declareLocal(this.scope, entry));
        return;
      }
      const local = this.object(entry, path);
      const localName = this.string(local.name, `${path}.name`);
      const mode = local.mode ?? 'var';
      if (!oneOf(DECLARATION_MODES, mode)) {
        throw new AstFormatError(`unknown declaration mode`, `${path}.mode`);
      }
      this.names.set(localName, this.factory.declareLocal(this.scope, localName, mode));
    });

    const body = this.array(root.body, '$.body').map((stmt, i) => this.statement(stmt, `$.body[${i}]`));
    return this.factory.compilationInfo(this.factory.functionLiteral(name, this.scope, body, languageMode));
  }

  private statement(value: unknown, path: string): Statement {
    const node = this.object(value, path);
    const location = this.location(node, path);
    const kind = this.string(node.kind, `${path}.kind`);
    const f = this.factory;

    switch (kind) {
      case 'block': {
        const statements = this.array(node.body, `${path}.body`).map((stmt, i) => this.statement(stmt, `${path}.body[${i}]`));
        return f.block(statements, undefined, location);
      }
      case 'expressionStatement':
        return f.expressionStatement(this.expression(node.expression, `${path}.expression`), location);
      case 'emptyStatement':
        return f.emptyStatement(location);
      case 'ifStatement': {
        const condition = this.expression(node.condition, `${path}.condition`);
        const thenStatement = this.statement(node.then, `${path}.then`);
        const elseStatement = node.else === undefined ? undefined : this.statement(node.else, `${path}.else`);
        return f.ifStatement(condition, thenStatement, elseStatement, location);
      }
      case 'returnStatement': {
        const expression = node.expression === undefined
          ? f.literal(undefined)
          : this.expression(node.expression, `${path}.expression`);
        return f.returnStatement(expression, location);
      }
      case 'whileStatement': {
        const loop = f.whileStatement(this.expression(node.condition, `${path}.condition`), undefined, location);
        loop.body = this.loopBody(loop, node, path);
        return loop;
      }
      case 'doWhileStatement': {
        const loop = f.doWhileStatement(this.expression(node.condition, `${path}.condition`), undefined, location);
        loop.body = this.loopBody(loop, node, path);
        return loop;
      }
      case 'forStatement': {
        const loop = f.forStatement({
          init: node.init === undefined ? undefined : this.statement(node.init, `${path}.init`),
          condition: node.condition === undefined ? undefined : this.expression(node.condition, `${path}.condition`),
          next: node.next === undefined ? undefined : this.statement(node.next, `${path}.next`)
        }, undefined, location);
        loop.body = this.loopBody(loop, node, path);
        return loop;
      }
      case 'breakStatement':
        return f.breakStatement(this.loopTarget(node, path), location);
      case 'continueStatement':
        return f.continueStatement(this.loopTarget(node, path), location);
      case 'withStatement':
        return f.withStatement(
          this.expression(node.object, `${path}.object`),
          this.statement(node.body, `${path}.body`),
          location
        );
      case 'debuggerStatement':
        return f.debuggerStatement(location);
      default:
        throw new AstFormatError(`unknown statement kind '${kind}'`, `${path}.kind`);
    }
  }

  private loopBody(loop: IterationStatement, node: JsonObject, path: string): Statement {
    if (node.id !== undefined) {
      const id = this.string(node.id, `${path}.id`);
      if (this.loopIds.has(id)) {
        throw new AstFormatError(`duplicate loop id '${id}'`, `${path}.id`);
      }
      this.loopIds.set(id, loop);
    }
    this.loops.push(loop);
    try {
      return this.statement(node.body, `${path}.body`);
    } finally {
      this.loops.pop();
    }
  }

  private loopTarget(node: JsonObject, path: string): IterationStatement {
    if (node.target === undefined) {
      const innermost = this.loops[this.loops.length - 1];
      if (!innermost) {
        throw new AstFormatError(`${node.kind} outside of a loop`, path);
      }
      return innermost;
    }
    const id = this.string(node.target, `${path}.target`);
    const target = this.loopIds.get(id);
    if (!target || !this.loops.includes(target)) {
      throw new AstFormatError(`no enclosing loop with id '${id}'`, `${path}.target`);
    }
    return target;
  }

  private expression(value: unknown, path: string): Expression {
    const node = this.object(value, path);
    const location = this.location(node, path);
    const kind = this.string(node.kind, `${path}.kind`);
    const f = this.factory;

    switch (kind) {
      case 'literal':
        return f.literal(this.literalValue(node, path), location);
      case 'variableProxy':
        return f.variableProxy(this.resolve(this.string(node.name, `${path}.name`)), location);
      case 'property': {
        const object = this.expression(node.object, `${path}.object`);
        if (node.name !== undefined) {
          return f.namedProperty(object, this.string(node.name, `${path}.name`), location);
        }
        return f.property(object, this.expression(node.key, `${path}.key`), location);
      }
      case 'assignment': {
        const op = node.op ?? '=';
        if (!oneOf(ASSIGNMENT_OPERATORS, op)) {
          throw new AstFormatError(`unknown assignment operator`, `${path}.op`);
        }
        const target = this.expression(node.target, `${path}.target`);
        const assigned = this.expression(node.value, `${path}.value`);
        return f.assignment(target, assigned, op, location);
      }
      case 'call': {
        const callee = this.expression(node.callee, `${path}.callee`);
        return f.call(callee, this.expressions(node.arguments ?? [], `${path}.arguments`), location);
      }
      case 'callRuntime': {
        const name = this.string(node.function, `${path}.function`);
        const fn = findRuntimeFunctionByName(name);
        if (!fn) {
          throw new AstFormatError(`unknown runtime function '${name}'`, `${path}.function`);
        }
        const args = this.expressions(node.arguments ?? [], `${path}.arguments`);
        return f.callRuntime(fn.id, args, node.jsRuntime === true, location);
      }
      case 'binaryOperation': {
        if (!oneOf(BINARY_OPERATORS, node.op)) {
          throw new AstFormatError(`unknown binary operator`, `${path}.op`);
        }
        return f.binaryOperation(
          node.op,
          this.expression(node.left, `${path}.left`),
          this.expression(node.right, `${path}.right`),
          location
        );
      }
      case 'compareOperation': {
        if (!oneOf(COMPARE_OPERATORS, node.op)) {
          throw new AstFormatError(`unknown compare operator`, `${path}.op`);
        }
        return f.compareOperation(
          node.op,
          this.expression(node.left, `${path}.left`),
          this.expression(node.right, `${path}.right`),
          location
        );
      }
      case 'unaryOperation': {
        if (!oneOf(UNARY_OPERATORS, node.op)) {
          throw new AstFormatError(`unknown unary operator`, `${path}.op`);
        }
        return f.unaryOperation(node.op, this.expression(node.expression, `${path}.expression`), location);
      }
      case 'conditional':
        return f.conditional(
          this.expression(node.condition, `${path}.condition`),
          this.expression(node.then, `${path}.then`),
          this.expression(node.else, `${path}.else`),
          location
        );
      case 'arrayLiteral':
        return f.arrayLiteral(this.expressions(node.values ?? [], `${path}.values`), location);
      case 'throw':
        return f.throw(this.expression(node.exception, `${path}.exception`), location);
      default:
        throw new AstFormatError(`unknown expression kind '${kind}'`, `${path}.kind`);
    }
  }

  private expressions(value: unknown, path: string): Expression[] {
    return this.array(value, path).map((item, i) => this.expression(item, `${path}[${i}]`));
  }

  private literalValue(node: JsonObject, path: string): LiteralValue {
    if (node.hole === true) {
      return THE_HOLE;
    }
    const value = node.value;
    if (value === undefined || value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      return value;
    }
    throw new AstFormatError('literal value must be a string, number, boolean or null', `${path}.value`);
  }

  private resolve(name: string): Variable {
    return this.names.get(name) ?? this.factory.unresolvedVariable(name, 'unallocated');
  }

  private location(node: JsonObject, path: string): SourceLocation | undefined {
    if (node.loc === undefined) {
      return undefined;
    }
    const loc = this.object(node.loc, `${path}.loc`);
    const line = loc.line;
    const column = loc.column ?? 0;
    if (typeof line !== 'number' || typeof column !== 'number') {
      throw new AstFormatError('expected numeric line and column', `${path}.loc`);
    }
    if (!Number.isInteger(line) || line < 1) {
      throw new AstFormatError('line must be an integer of at least 1', `${path}.loc.line`);
    }
    if (!Number.isInteger(column) || column < 0) {
      throw new AstFormatError('column must be a non-negative integer', `${path}.loc.column`);
    }
    return { start: { line, column }, end: { line, column } };
  }

  private object(value: unknown, path: string): JsonObject {
    if (!isJsonObject(value)) {
      throw new AstFormatError('expected an object', path);
    }
    return value;
  }

  private array(value: unknown, path: string): unknown[] {
    if (!Array.isArray(value)) {
      throw new AstFormatError('expected an array', path);
    }
    return value;
  }

  private string(value: unknown, path: string): string {
    if (typeof value !== 'string') {
      throw new AstFormatError('expected a string', path);
    }
    return value;
  }
}
