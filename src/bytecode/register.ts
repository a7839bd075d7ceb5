import { InternalCompilerError } from '../errors';

/**
 * A slot in the activation record. Parameters (receiver first), locals and
 * temporaries share one index space.
 */
export class Register {
  constructor(public readonly index: number) {
    if (!Number.isInteger(index) || index < 0) {
      throw new InternalCompilerError(`Invalid register index: ${index}`);
    }
  }

  toString(): string {
    return `r${this.index}`;
  }
}
