// Main exports for regline

export * from './ast/ast';
export { AstFactory } from './ast/ast-factory';
export { AstReader, parseFunctionJson } from './ast/ast-reader';
export type { ParsedFunction } from './ast/ast-reader';
export { BytecodeArray, BYTECODE_FORMAT_VERSION } from './bytecode/bytecode-array';
export type { BytecodeFormat, Constant, Instruction, SourcePositionEntry } from './bytecode/bytecode-array';
export { BytecodeArrayBuilder } from './bytecode/bytecode-array-builder';
export { BytecodeLabel } from './bytecode/bytecode-label';
export { BYTECODES, bytecodeFromCode } from './bytecode/bytecodes';
export type { Bytecode, OperandKind } from './bytecode/bytecodes';
export { disassemble, formatListing } from './bytecode/disassembler';
export type { InstructionSink } from './bytecode/instruction-sink';
export { generateListingWithSourceMap } from './bytecode/listing-source-map';
export { Register } from './bytecode/register';
export { BytecodeGenerator } from './codegen/bytecode-generator';
export { CompilationInfo } from './codegen/compilation-info';
export { ControlScope, ControlScopeForIteration } from './codegen/control-scope';
export { LoopBuilder } from './codegen/loop-builder';
export { TemporaryRegisterAllocator, TemporaryRegisterScope } from './codegen/register-allocator';
export { compileFunction, tryCompileFunction } from './compiler';
export type { CompileResult } from './compiler';
export type { InterpreterOptions, LoweringOptions } from './config';
export { AstFormatError, InternalCompilerError, UnsupportedConstructError, VMRuntimeError } from './errors';
export { FeedbackVectorLayout } from './feedback/feedback-vector';
export type { FeedbackSlot, FeedbackSlotKind } from './feedback/feedback-vector';
export { Interpreter } from './interpreter/interpreter';
export type { ExecutionResult } from './interpreter/interpreter';
export { logger, LogLevel } from './logger';
export { RuntimeFunctionId, findRuntimeFunction } from './runtime/runtime-functions';
export * from './runtime/values';
