import { describe, it, expect } from 'vitest';
import { TemporaryRegisterAllocator, withTemporaryRegisterScope } from '../src/codegen/register-allocator';
import { InternalCompilerError } from '../src/errors';

describe('TemporaryRegisterAllocator', () => {
  it('starts allocating at the first temporary register', () => {
    const allocator = new TemporaryRegisterAllocator(3);
    const scope = allocator.open();

    expect(scope.newRegister().index).toBe(3);
    expect(scope.newRegister().index).toBe(4);
    scope.close();
  });

  it('reuses indices across sequential scopes', () => {
    const allocator = new TemporaryRegisterAllocator(3);

    const first = allocator.open();
    const a = first.newRegister();
    first.close();

    const second = allocator.open();
    const b = second.newRegister();
    second.close();

    expect(a.index).toBe(3);
    expect(b.index).toBe(3);
    expect(allocator.maxTemporaries).toBe(1);
    expect(allocator.registerCount).toBe(4);
  });

  it('restores the frontier of the enclosing scope on close', () => {
    const allocator = new TemporaryRegisterAllocator(3);
    const outer = allocator.open();
    expect(outer.newRegister().index).toBe(3);

    const inner = allocator.open();
    expect(inner.newRegister().index).toBe(4);
    expect(inner.newRegister().index).toBe(5);
    inner.close();

    expect(outer.newRegister().index).toBe(4);
    outer.close();

    expect(allocator.maxTemporaries).toBe(3);
    expect(allocator.registerCount).toBe(6);
    expect(allocator.depth).toBe(0);
  });

  it('rejects allocation from a scope that is not innermost', () => {
    const allocator = new TemporaryRegisterAllocator(0);
    const outer = allocator.open();
    allocator.open();

    expect(() => outer.newRegister()).toThrow(InternalCompilerError);
  });

  it('rejects closing scopes out of order', () => {
    const allocator = new TemporaryRegisterAllocator(0);
    const outer = allocator.open();
    allocator.open();

    expect(() => outer.close()).toThrow(InternalCompilerError);
  });

  it('rejects closing a scope twice', () => {
    const allocator = new TemporaryRegisterAllocator(0);
    const scope = allocator.open();
    scope.close();

    expect(() => scope.close()).toThrow(InternalCompilerError);
  });

  it('rejects allocation from a closed scope', () => {
    const allocator = new TemporaryRegisterAllocator(0);
    const scope = allocator.open();
    scope.close();

    expect(() => scope.newRegister()).toThrow(InternalCompilerError);
  });

  it('rejects a negative first temporary', () => {
    expect(() => new TemporaryRegisterAllocator(-1)).toThrow(InternalCompilerError);
  });

  it('reports zero temporaries when nothing was allocated', () => {
    const allocator = new TemporaryRegisterAllocator(2);
    allocator.open().close();

    expect(allocator.maxTemporaries).toBe(0);
    expect(allocator.registerCount).toBe(2);
  });
});

describe('withTemporaryRegisterScope', () => {
  it('returns the body result and closes the scope', () => {
    const allocator = new TemporaryRegisterAllocator(1);
    const index = withTemporaryRegisterScope(allocator, scope => scope.newRegister().index);

    expect(index).toBe(1);
    expect(allocator.depth).toBe(0);
  });

  it('closes the scope when the body throws', () => {
    const allocator = new TemporaryRegisterAllocator(1);

    expect(() =>
      withTemporaryRegisterScope(allocator, scope => {
        scope.newRegister();
        scope.newRegister();
        throw new Error('boom');
      })
    ).toThrow('boom');

    expect(allocator.depth).toBe(0);
    expect(withTemporaryRegisterScope(allocator, scope => scope.newRegister().index)).toBe(1);
  });
});
