/**
 * Temporary register allocation for the bytecode generator.
 *
 * Register layout:
 * - r0: receiver
 * - r1..rP-1: declared parameters
 * - rP..rP+L-1: locals
 * - rP+L+: temporaries, handed out by nested scopes in stack order
 */

import { Register } from '../bytecode/register';
import { InternalCompilerError } from '../errors';

export class TemporaryRegisterAllocator {
  private readonly openScopes: TemporaryRegisterScope[] = [];
  private nextTemporary: number;
  private highWaterMark: number;

  constructor(readonly firstTemporary: number) {
    if (!Number.isInteger(firstTemporary) || firstTemporary < 0) {
      throw new InternalCompilerError(`Invalid first temporary register: ${firstTemporary}`);
    }
    this.nextTemporary = firstTemporary;
    this.highWaterMark = firstTemporary;
  }

  /**
   * Open a scope. Registers it hands out are released together on close.
   */
  open(): TemporaryRegisterScope {
    const scope = new TemporaryRegisterScope(this, this.nextTemporary);
    this.openScopes.push(scope);
    return scope;
  }

  get depth(): number {
    return this.openScopes.length;
  }

  // Peak number of temporaries live at once.
  get maxTemporaries(): number {
    return this.highWaterMark - this.firstTemporary;
  }

  get registerCount(): number {
    return this.highWaterMark;
  }

  /** @internal */
  allocate(scope: TemporaryRegisterScope): Register {
    if (this.openScopes[this.openScopes.length - 1] !== scope) {
      throw new InternalCompilerError('Temporary registers may only be allocated from the innermost open scope');
    }
    const register = new Register(this.nextTemporary++);
    if (this.nextTemporary > this.highWaterMark) {
      this.highWaterMark = this.nextTemporary;
    }
    return register;
  }

  /** @internal */
  release(scope: TemporaryRegisterScope): void {
    if (this.openScopes[this.openScopes.length - 1] !== scope) {
      throw new InternalCompilerError('Temporary register scopes must be closed in reverse order of opening');
    }
    this.openScopes.pop();
    this.nextTemporary = scope.frontier;
  }
}

export class TemporaryRegisterScope {
  private closed = false;

  constructor(private readonly allocator: TemporaryRegisterAllocator, readonly frontier: number) {}

  newRegister(): Register {
    if (this.closed) {
      throw new InternalCompilerError('Cannot allocate from a closed temporary register scope');
    }
    return this.allocator.allocate(this);
  }

  close(): void {
    if (this.closed) {
      throw new InternalCompilerError('Temporary register scope closed twice');
    }
    this.allocator.release(this);
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}

export function withTemporaryRegisterScope<T>(
  allocator: TemporaryRegisterAllocator,
  body: (scope: TemporaryRegisterScope) => T
): T {
  const scope = allocator.open();
  try {
    return body(scope);
  } finally {
    if (!scope.isClosed) {
      scope.close();
    }
  }
}
