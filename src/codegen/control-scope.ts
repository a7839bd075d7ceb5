/**
 * Control scope chain for resolving break and continue.
 *
 * Each breakable construct being lowered pushes a scope. A break or continue
 * walks the chain outward from the head until a scope recognizes the target
 * statement by identity and emits the jump.
 */

import { AstNode, IterationStatement } from '../ast/ast';
import { InternalCompilerError } from '../errors';
import { CodegenContext } from './codegen-context';
import { LoopBuilder } from './loop-builder';

export type ControlCommand = 'break' | 'continue';

export abstract class ControlScope {
  readonly outer: ControlScope | undefined;

  constructor(private readonly context: CodegenContext) {
    this.outer = context.controlScope;
    context.controlScope = this;
  }

  exit(): void {
    if (this.context.controlScope !== this) {
      throw new InternalCompilerError('Control scopes must be exited innermost first');
    }
    this.context.controlScope = this.outer;
  }

  break(target: AstNode): void {
    this.performCommand('break', target);
  }

  continue(target: AstNode): void {
    this.performCommand('continue', target);
  }

  /**
   * Handle the command if `target` is this scope's statement. Returns false
   * to pass it to the outer scope.
   */
  protected abstract execute(command: ControlCommand, target: AstNode): boolean;

  private performCommand(command: ControlCommand, target: AstNode): void {
    let current: ControlScope | undefined = this;
    while (current) {
      if (current.execute(command, target)) {
        return;
      }
      current = current.outer;
    }
    throw new InternalCompilerError(`No enclosing construct handles ${command} for ${target.kind}`);
  }
}

export class ControlScopeForIteration extends ControlScope {
  constructor(
    context: CodegenContext,
    private readonly statement: IterationStatement,
    private readonly loopBuilder: LoopBuilder
  ) {
    super(context);
  }

  protected execute(command: ControlCommand, target: AstNode): boolean {
    if (target !== this.statement) {
      return false;
    }
    switch (command) {
      case 'break':
        this.loopBuilder.break();
        return true;
      case 'continue':
        this.loopBuilder.continue();
        return true;
    }
  }
}

export function withControlScope<T>(context: CodegenContext, scope: ControlScope, body: () => T): T {
  if (context.controlScope !== scope) {
    throw new InternalCompilerError('Control scope must be the chain head when its body is lowered');
  }
  try {
    return body();
  } finally {
    scope.exit();
  }
}

/**
 * Route a break or continue through the chain starting at the current head.
 */
export function performControlCommand(context: CodegenContext, command: ControlCommand, target: AstNode): void {
  const head = context.controlScope;
  if (!head) {
    throw new InternalCompilerError(`${command} outside of any breakable construct`);
  }
  if (command === 'break') {
    head.break(target);
  } else {
    head.continue(target);
  }
}
