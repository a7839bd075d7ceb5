import { describe, it, expect } from 'vitest';
import { LiteralValue, THE_HOLE } from '../src/ast/ast';
import { Interpreter } from '../src/interpreter/interpreter';
import { createHostGlobals } from '../src/interpreter/host';
import { RuntimeFunctionId } from '../src/runtime/runtime-functions';
import { VMValue, bytecodeFunction, createObject, isObject, nativeFunction, toNumber } from '../src/runtime/values';
import { compile, newFunction } from './helpers/lowering';

describe('Interpreter', () => {
  it('returns the accumulator and counts steps', () => {
    const fn = newFunction();
    const bytecode = compile(fn, [fn.f.returnStatement(fn.f.literal(7))]);

    expect(new Interpreter().run(bytecode)).toEqual({ value: 7, steps: 2 });
  });

  it('passes arguments in parameter registers', () => {
    const fn = newFunction();
    const { f, scope } = fn;
    const a = f.declareParameter(scope, 'a');
    const b = f.declareParameter(scope, 'b');
    const bytecode = compile(fn, [f.returnStatement(f.binaryOperation('-', f.variableProxy(a), f.variableProxy(b)))]);

    expect(new Interpreter().run(bytecode, [10, 4]).value).toBe(6);
  });

  it('concatenates when either side of + is a string', () => {
    const fn = newFunction();
    const { f } = fn;
    const bytecode = compile(fn, [f.returnStatement(f.binaryOperation('+', f.literal('n='), f.literal(4)))]);

    expect(new Interpreter().run(bytecode).value).toBe('n=4');
  });

  it('keeps the hole distinct from undefined under strict equality', () => {
    const fn = newFunction();
    const { f } = fn;
    const compare = (op: '===' | '==', right: LiteralValue) =>
      new Interpreter().run(compile(newFunction(), [f.returnStatement(f.compareOperation(op, f.literal(THE_HOLE), f.literal(right)))])).value;

    expect(new Interpreter().run(compile(fn, [f.returnStatement(f.literal(THE_HOLE))])).value).toBe(THE_HOLE);
    expect(compare('===', undefined)).toBe(false);
    expect(compare('===', THE_HOLE)).toBe(true);
    expect(compare('==', undefined)).toBe(true);
    expect(compare('==', null)).toBe(true);
  });

  describe('properties', () => {
    function storeThenLoad(mode: 'sloppy' | 'strict') {
      const fn = newFunction();
      const { f, scope } = fn;
      const o = f.declareParameter(scope, 'o');
      return compile(
        fn,
        [
          f.expressionStatement(f.assignment(f.namedProperty(f.variableProxy(o), 'foo'), f.literal(7))),
          f.returnStatement(f.namedProperty(f.variableProxy(o), 'foo'))
        ],
        mode
      );
    }

    it('stores and loads named properties on objects', () => {
      const object = createObject();

      expect(new Interpreter().run(storeThenLoad('sloppy'), [object]).value).toBe(7);
      expect(object.properties.get('foo')).toBe(7);
    });

    it('ignores stores to primitives in sloppy mode', () => {
      expect(new Interpreter().run(storeThenLoad('sloppy'), [5]).value).toBeUndefined();
    });

    it('rejects stores to primitives in strict mode', () => {
      expect(() => new Interpreter().run(storeThenLoad('strict'), [5])).toThrow(
        "Cannot create property 'foo' on number (at instruction 5)"
      );
    });

    it('rejects loads from undefined', () => {
      const fn = newFunction();
      const { f, scope } = fn;
      const o = f.declareParameter(scope, 'o');
      const bytecode = compile(fn, [f.returnStatement(f.namedProperty(f.variableProxy(o), 'foo'))]);

      expect(() => new Interpreter().run(bytecode)).toThrow("Cannot read property 'foo' of undefined (at instruction 3)");
    });

    it('converts keyed access keys to strings', () => {
      const fn = newFunction();
      const { f, scope } = fn;
      const o = f.declareParameter(scope, 'o');
      const bytecode = compile(fn, [f.returnStatement(f.property(f.variableProxy(o), f.literal(1)))]);

      expect(new Interpreter().run(bytecode, [createObject({ '1': 'one' })]).value).toBe('one');
    });
  });

  describe('calls', () => {
    it('calls native globals with their arguments', () => {
      const fn = newFunction();
      const { f } = fn;
      const twice = f.globalVariable('twice', 0);
      const bytecode = compile(fn, [f.returnStatement(f.call(f.variableProxy(twice), [f.literal(21)]))]);
      const globals: VMValue[] = [nativeFunction('twice', (_receiver, [x]) => toNumber(x) * 2)];

      expect(new Interpreter(globals).run(bytecode).value).toBe(42);
    });

    it('passes the object as receiver for method calls', () => {
      const fn = newFunction();
      const { f, scope } = fn;
      const o = f.declareParameter(scope, 'o');
      const bytecode = compile(fn, [f.returnStatement(f.call(f.namedProperty(f.variableProxy(o), 'name'), []))]);
      const object = createObject({
        tag: 'self',
        name: nativeFunction('name', receiver => (isObject(receiver) ? receiver.properties.get('tag') : undefined))
      });

      expect(new Interpreter().run(bytecode, [object]).value).toBe('self');
    });

    it('runs bytecode callees in their own frame', () => {
      const callee = newFunction();
      const a = callee.f.declareParameter(callee.scope, 'a');
      const increment = compile(callee, [
        callee.f.returnStatement(callee.f.binaryOperation('+', callee.f.variableProxy(a), callee.f.literal(1)))
      ]);

      const caller = newFunction();
      const { f } = caller;
      const inc = f.globalVariable('inc', 0);
      const bytecode = compile(caller, [f.returnStatement(f.call(f.variableProxy(inc), [f.literal(41)]))]);

      expect(new Interpreter([bytecodeFunction(increment)]).run(bytecode).value).toBe(42);
    });

    it('rejects calling a non-function', () => {
      const fn = newFunction();
      const { f } = fn;
      const g = f.globalVariable('g', 0);
      const bytecode = compile(fn, [f.returnStatement(f.call(f.variableProxy(g), []))]);

      expect(() => new Interpreter([5]).run(bytecode)).toThrow('5 is not a function (at instruction 4)');
    });

    it('rejects reading an undefined global slot', () => {
      const fn = newFunction();
      const { f } = fn;
      const bytecode = compile(fn, [f.returnStatement(f.variableProxy(f.globalVariable('g', 0)))]);

      expect(() => new Interpreter([]).run(bytecode)).toThrow('Global slot 0 is not defined (at instruction 0)');
    });

    it('limits recursion depth', () => {
      const fn = newFunction();
      const { f } = fn;
      const self = f.globalVariable('self', 0);
      const bytecode = compile(fn, [f.returnStatement(f.call(f.variableProxy(self), []))]);
      const globals: VMValue[] = [];
      globals.push(bytecodeFunction(bytecode));

      expect(() => new Interpreter(globals).run(bytecode)).toThrow('Maximum call depth of 512 exceeded');
    });
  });

  describe('runtime calls', () => {
    it('runs runtime function implementations', () => {
      const fn = newFunction();
      const { f } = fn;
      const bytecode = compile(fn, [
        f.returnStatement(f.callRuntime(RuntimeFunctionId.StringAdd, [f.literal('a'), f.literal(1)]))
      ]);

      expect(new Interpreter().run(bytecode).value).toBe('a1');
    });

    it('creates objects', () => {
      const fn = newFunction();
      const { f } = fn;
      const bytecode = compile(fn, [f.returnStatement(f.callRuntime(RuntimeFunctionId.TypeOf, [f.callRuntime(RuntimeFunctionId.ObjectCreate, [])]))]);

      expect(new Interpreter().run(bytecode).value).toBe('object');
    });
  });

  it('rejects a step limit that is not a positive integer', () => {
    expect(() => new Interpreter([], { maxSteps: 0 })).toThrow('Invalid maxSteps: 0. Must be a positive integer');
  });
});

describe('createHostGlobals', () => {
  it('provides print and leaves unknown names undefined', () => {
    const lines: string[] = [];
    const globals = createHostGlobals(['print', 'nothing'], line => lines.push(line));

    const fn = newFunction();
    const { f } = fn;
    const print = f.globalVariable('print', 0);
    const bytecode = compile(fn, [
      f.expressionStatement(f.call(f.variableProxy(print), [f.literal('hi'), f.literal(null), f.literal(3)])),
      f.returnStatement(f.variableProxy(f.globalVariable('nothing', 1)))
    ]);

    expect(new Interpreter(globals).run(bytecode).value).toBeUndefined();
    expect(lines).toEqual(['hi null 3']);
  });
});
