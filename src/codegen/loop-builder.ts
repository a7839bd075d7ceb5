// Break and continue targets for a single loop

import { BytecodeLabel } from '../bytecode/bytecode-label';
import { InstructionSink } from '../bytecode/instruction-sink';

export class LoopBuilder {
  private readonly breakLabel: BytecodeLabel;
  private readonly continueLabel: BytecodeLabel;

  constructor(private readonly builder: InstructionSink) {
    this.breakLabel = builder.newLabel();
    this.continueLabel = builder.newLabel();
  }

  break(): void {
    this.builder.jump(this.breakLabel);
  }

  continue(): void {
    this.builder.jump(this.continueLabel);
  }

  bindBreakTarget(): void {
    this.builder.bind(this.breakLabel);
  }

  bindContinueTarget(): void {
    this.builder.bind(this.continueLabel);
  }
}
