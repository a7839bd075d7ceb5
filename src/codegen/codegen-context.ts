import { InstructionSink } from '../bytecode/instruction-sink';
import { CompilationInfo } from './compilation-info';
import type { ControlScope } from './control-scope';
import { TemporaryRegisterAllocator } from './register-allocator';

/**
 * State threaded through every lowering rule for one function.
 */
export interface CodegenContext {
  builder: InstructionSink;
  allocator: TemporaryRegisterAllocator;
  info: CompilationInfo;
  // Head of the control scope chain; undefined outside any breakable construct.
  controlScope: ControlScope | undefined;
}
