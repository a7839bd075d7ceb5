import { describe, it, expect } from 'vitest';
import { Call, Literal, Property, ReturnStatement, VariableDeclaration, WhileStatement } from '../src/ast/ast';
import { AstFactory } from '../src/ast/ast-factory';
import { loc } from './helpers/lowering';

describe('AstFactory', () => {
  it('tags each node with its kind and keeps the fields it was given', () => {
    const f = new AstFactory();
    const scope = f.newFunctionScope();
    const x = f.declareLocal(scope, 'x', 'let');

    const declaration: VariableDeclaration = f.variableDeclaration(x, 'const');
    const literal: Literal = f.literal(7);
    const loop: WhileStatement = f.whileStatement(literal);
    const ret: ReturnStatement = f.returnStatement(f.variableProxy(x));
    const call: Call = f.call(f.variableProxy(x), [literal]);

    expect(declaration).toEqual({ kind: 'variableDeclaration', variable: x, mode: 'const' });
    expect(loop).toEqual({ kind: 'whileStatement', condition: literal, body: { kind: 'emptyStatement' } });
    expect(ret.expression).toEqual({ kind: 'variableProxy', variable: x });
    expect(call.arguments).toEqual([literal]);
  });

  it('attaches a location only when one is given', () => {
    const f = new AstFactory();

    expect(f.literal('a', loc(2, 4)).location).toEqual({ start: { line: 2, column: 4 }, end: { line: 2, column: 4 } });
    expect('location' in f.literal('a')).toBe(false);
    expect(f.debuggerStatement(loc(1, 0))).toEqual({ kind: 'debuggerStatement', location: loc(1, 0) });
  });

  it('allocates named and keyed feedback slots for property accesses', () => {
    const f = new AstFactory();
    const object = f.literal(null);

    const named: Property = f.namedProperty(object, 'foo');
    const keyed: Property = f.property(object, f.literal('0'));
    const store = f.assignment(f.namedProperty(object, 'bar'), f.literal(1));

    expect(named.slot).toEqual({ id: 0, kind: 'loadIC' });
    expect(keyed.slot).toEqual({ id: 1, kind: 'keyedLoadIC' });
    expect(store.slot).toEqual({ id: 3, kind: 'storeIC' });
    expect(f.feedbackVector.slotCount).toBe(4);
  });
});
