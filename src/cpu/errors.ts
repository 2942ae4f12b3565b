const hex = (v: number, width: number) => v.toString(16).toUpperCase().padStart(width, '0');

export type FaultCode =
  | 'UNKNOWN_OPCODE'
  | 'PROGRAM_TOO_LARGE'
  | 'STACK_OVERFLOW'
  | 'STACK_UNDERFLOW'
  | 'OUT_OF_BOUNDS'
  | 'ENTROPY_SOURCE_FAILURE';

// Base for every fault that halts the interpreter.
export abstract class Chip8Fault extends Error {
  abstract readonly code: FaultCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnknownOpcodeError extends Chip8Fault {
  readonly code = 'UNKNOWN_OPCODE';

  // address is where the word was fetched from, when known
  constructor(public readonly word: number, public readonly address?: number) {
    super(
      address === undefined
        ? `Unknown opcode ${hex(word, 4)}`
        : `Unknown opcode ${hex(word, 4)} at ${hex(address, 3)}`
    );
  }
}

export class ProgramTooLargeError extends Chip8Fault {
  readonly code = 'PROGRAM_TOO_LARGE';

  constructor(public readonly size: number, public readonly limit: number) {
    super(`Program is ${size} bytes; at most ${limit} fit in memory`);
  }
}

export class StackOverflowError extends Chip8Fault {
  readonly code = 'STACK_OVERFLOW';

  constructor(public readonly address: number) {
    super(`Stack overflow: CALL at ${hex(address, 3)} exceeds 16 nested subroutines`);
  }
}

export class StackUnderflowError extends Chip8Fault {
  readonly code = 'STACK_UNDERFLOW';

  constructor(public readonly address: number) {
    super(`Stack underflow: RET at ${hex(address, 3)} with an empty stack`);
  }
}

export class OutOfBoundsError extends Chip8Fault {
  readonly code = 'OUT_OF_BOUNDS';

  constructor(public readonly address: number) {
    super(`Memory access out of bounds at ${hex(address, 4)}`);
  }
}

export class EntropySourceFailureError extends Chip8Fault {
  readonly code = 'ENTROPY_SOURCE_FAILURE';

  constructor(message: string, cause?: unknown) {
    super(`Random source failed: ${message}`, { cause });
  }
}
