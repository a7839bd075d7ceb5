// Per-function facts the generator needs beyond the syntax tree itself

import { FunctionLiteral, LanguageMode } from '../ast/ast';
import { FeedbackSlot, FeedbackVectorLayout } from '../feedback/feedback-vector';

export class CompilationInfo {
  constructor(readonly literal: FunctionLiteral, readonly feedbackVector: FeedbackVectorLayout) {}

  get functionName(): string {
    return this.literal.name;
  }

  // Declared parameters plus the receiver.
  get parameterCount(): number {
    return this.literal.scope.parameters.length + 1;
  }

  get localCount(): number {
    return this.literal.scope.stackSlotCount;
  }

  get languageMode(): LanguageMode {
    return this.literal.languageMode;
  }

  feedbackIndex(slot: FeedbackSlot): number {
    return this.feedbackVector.getIndex(slot);
  }
}
