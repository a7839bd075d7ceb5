import { describe, it, expect } from 'vitest';
import { compileFunction, tryCompileFunction } from '../src/compiler';
import { InternalCompilerError } from '../src/errors';
import { newFunction } from './helpers/lowering';

describe('tryCompileFunction', () => {
  it('returns the bytecode for supported functions', () => {
    const { f, scope } = newFunction();
    const info = f.compilationInfo(f.functionLiteral('ok', scope, [f.returnStatement(f.literal(1))]));

    const result = tryCompileFunction(info);

    expect(result.status).toBe('compiled');
    if (result.status === 'compiled') {
      expect(result.bytecode.name).toBe('ok');
      expect(result.bytecode.toJSON()).toEqual(compileFunction(info).toJSON());
    }
  });

  it('reports unsupported constructs without throwing', () => {
    const { f, scope } = newFunction();
    const info = f.compilationInfo(f.functionLiteral('later', scope, [f.debuggerStatement()]));

    const result = tryCompileFunction(info);

    expect(result.status).toBe('unsupported');
    if (result.status === 'unsupported') {
      expect(result.error.nodeKind).toBe('debuggerStatement');
    }
  });

  it('lets internal errors through', () => {
    const { f, scope } = newFunction();
    const loop = f.whileStatement(f.literal(true));
    const info = f.compilationInfo(f.functionLiteral('broken', scope, [f.breakStatement(loop)]));

    expect(() => tryCompileFunction(info)).toThrow(InternalCompilerError);
  });
});
