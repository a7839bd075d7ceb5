import { describe, it, expect } from 'vitest';
import { Interpreter } from '../src/interpreter/interpreter';
import { VMRuntimeError } from '../src/errors';
import { compile, listing, newFunction } from './helpers/lowering';

describe('lowered control flow', () => {
  it('counts loop iterations through continue and the step', () => {
    const fn = newFunction();
    const { f, scope } = fn;
    const count = f.declareLocal(scope, 'count');
    const i = f.declareLocal(scope, 'i');
    const loop = f.forStatement({
      init: f.expressionStatement(f.assignment(f.variableProxy(i), f.literal(0))),
      condition: f.compareOperation('<', f.variableProxy(i), f.literal(3)),
      next: f.expressionStatement(f.assignment(f.variableProxy(i), f.binaryOperation('+', f.variableProxy(i), f.literal(1))))
    });
    loop.body = f.block([
      f.expressionStatement(
        f.assignment(f.variableProxy(count), f.binaryOperation('+', f.variableProxy(count), f.literal(1)))
      ),
      f.continueStatement(loop)
    ]);

    const bytecode = compile(fn, [
      f.expressionStatement(f.assignment(f.variableProxy(count), f.literal(0))),
      loop,
      f.returnStatement(f.variableProxy(count))
    ]);

    const code = listing(bytecode);
    expect(code[4]).toBe('Jump 12');
    expect(code[10]).toBe('Jump 1');
    expect(code[21]).toBe('JumpIfTrue -16');
    expect(code.slice(22)).toEqual(['Ldar 1', 'Return']);
    expect(new Interpreter().run(bytecode).value).toBe(3);
  });

  it('runs a while loop until its condition fails', () => {
    const fn = newFunction();
    const { f, scope } = fn;
    const x = f.declareLocal(scope, 'x');

    const bytecode = compile(fn, [
      f.expressionStatement(f.assignment(f.variableProxy(x), f.literal(0))),
      f.whileStatement(
        f.compareOperation('<', f.variableProxy(x), f.literal(5)),
        f.expressionStatement(f.assignment(f.variableProxy(x), f.binaryOperation('+', f.variableProxy(x), f.literal(2))))
      ),
      f.returnStatement(f.variableProxy(x))
    ]);

    expect(new Interpreter().run(bytecode).value).toBe(6);
  });

  it('runs a do-while body at least once', () => {
    const fn = newFunction();
    const { f, scope } = fn;
    const x = f.declareLocal(scope, 'x');

    const bytecode = compile(fn, [
      f.expressionStatement(f.assignment(f.variableProxy(x), f.literal(10))),
      f.doWhileStatement(
        f.literal(false),
        f.expressionStatement(f.assignment(f.variableProxy(x), f.binaryOperation('+', f.variableProxy(x), f.literal(1))))
      ),
      f.returnStatement(f.variableProxy(x))
    ]);

    expect(new Interpreter().run(bytecode).value).toBe(11);
  });

  it('leaves both loops on a break aimed at the outer one', () => {
    const fn = newFunction();
    const { f } = fn;
    const outer = f.forStatement({});
    const inner = f.whileStatement(f.literal(true));
    inner.body = f.block([f.breakStatement(outer)]);
    outer.body = f.block([inner]);

    const bytecode = compile(fn, [outer, f.returnStatement(f.literal('done'))]);

    expect(new Interpreter().run(bytecode).value).toBe('done');
  });

  it('loops forever when break only leaves the inner loop', () => {
    const fn = newFunction();
    const { f } = fn;
    const outer = f.forStatement({});
    const inner = f.whileStatement(f.literal(true));
    inner.body = f.block([f.breakStatement(inner)]);
    outer.body = f.block([inner]);

    const bytecode = compile(fn, [outer]);

    expect(() => new Interpreter([], { maxSteps: 100 }).run(bytecode)).toThrow(VMRuntimeError);
    expect(() => new Interpreter([], { maxSteps: 100 }).run(bytecode)).toThrow(/^Step limit of 100 exceeded/);
  });

  it('takes the branch picked by the condition', () => {
    const fn = newFunction();
    const { f, scope } = fn;
    const flag = f.declareParameter(scope, 'flag');

    const bytecode = compile(fn, [
      f.ifStatement(f.variableProxy(flag), f.returnStatement(f.literal('yes')), f.returnStatement(f.literal('no')))
    ]);
    const interpreter = new Interpreter();

    expect(interpreter.run(bytecode, [1]).value).toBe('yes');
    expect(interpreter.run(bytecode, ['']).value).toBe('no');
    expect(interpreter.run(bytecode, []).value).toBe('no');
  });

  it('runs a loop whose body spans more than 32767 instructions', () => {
    const fn = newFunction();
    const { f, scope } = fn;
    const x = f.declareLocal(scope, 'x');
    const body = Array.from({ length: 17000 }, () =>
      f.expressionStatement(f.assignment(f.variableProxy(x), f.binaryOperation('+', f.variableProxy(x), f.literal(1))))
    );

    const bytecode = compile(fn, [
      f.expressionStatement(f.assignment(f.variableProxy(x), f.literal(0))),
      f.whileStatement(f.compareOperation('<', f.variableProxy(x), f.literal(1)), f.block(body)),
      f.returnStatement(f.variableProxy(x))
    ]);

    const offsets = bytecode.instructions.filter(instr => instr.bytecode.startsWith('Jump')).map(instr => instr.operands[0]);
    expect(Math.max(...offsets)).toBeGreaterThan(32767);
    expect(Math.min(...offsets)).toBeLessThan(-32768);
    expect(new Interpreter().run(bytecode).value).toBe(17000);
  });
});
