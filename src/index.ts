export { Emulator } from './emulator/core';
export type { EmulatorOptions } from './emulator/core';
export { Scheduler, formatTrace, DEFAULT_INSTRUCTIONS_PER_FRAME } from './emulator/scheduler';
export type { CpuErrorMode, FrameResult, SchedulerOptions } from './emulator/scheduler';
export { readSchedulerOptionsFromEnv } from './emulator/config';
export type { Byte, Word, StepEffects, TimerEffects, IEmulator } from './emulator/types';
export {
  MachineState,
  MEMORY_SIZE,
  PROGRAM_START,
  MAX_PROGRAM_SIZE,
  STACK_DEPTH,
  DISPLAY_WIDTH,
  DISPLAY_HEIGHT,
  KEY_COUNT,
} from './cpu/machine';
export { decode, encode, OPERATION_KINDS } from './cpu/decoder';
export type { Operation, OperationKind } from './cpu/decoder';
export { execute } from './cpu/executor';
export { DEFAULT_FONT, glyphAddress } from './cpu/font';
export { mathRandomSource, createSeededRandom, createSequenceRandom } from './cpu/random';
export type { RandomSource } from './cpu/random';
export {
  Chip8Fault,
  UnknownOpcodeError,
  ProgramTooLargeError,
  StackOverflowError,
  StackUnderflowError,
  OutOfBoundsError,
  EntropySourceFailureError,
} from './cpu/errors';
export type { FaultCode } from './cpu/errors';
export { renderDisplayRGBA } from './display/renderer';
export type { RenderOptions, RGB } from './display/renderer';
export { encodeDisplayPng } from './display/png';
export { normaliseRom } from './rom/loader';
