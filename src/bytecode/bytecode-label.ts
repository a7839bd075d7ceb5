import { InternalCompilerError } from '../errors';

/**
 * Jump target. Any number of jumps may reference a label before or after it
 * is bound; it is bound exactly once.
 */
export class BytecodeLabel {
  private boundAt: number | undefined;
  // Forward jumps waiting for the label to be bound.
  readonly pendingReferences: number[] = [];
  private referenceCount = 0;

  constructor(public readonly id: number) {}

  get isBound(): boolean {
    return this.boundAt !== undefined;
  }

  get isReferenced(): boolean {
    return this.referenceCount > 0;
  }

  get offset(): number {
    if (this.boundAt === undefined) {
      throw new InternalCompilerError(`Label L${this.id} is not bound`);
    }
    return this.boundAt;
  }

  bindTo(instructionIndex: number): void {
    if (this.boundAt !== undefined) {
      throw new InternalCompilerError(`Label L${this.id} is already bound at ${this.boundAt}`);
    }
    this.boundAt = instructionIndex;
  }

  addReference(instructionIndex: number): void {
    this.referenceCount++;
    if (this.boundAt === undefined) {
      this.pendingReferences.push(instructionIndex);
    }
  }

  toString(): string {
    return `L${this.id}`;
  }
}
