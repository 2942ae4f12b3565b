import { decode, type Operation } from '../cpu/decoder';
import { Chip8Fault, UnknownOpcodeError } from '../cpu/errors';
import { execute } from '../cpu/executor';
import { DEFAULT_FONT } from '../cpu/font';
import { MachineState } from '../cpu/machine';
import { type RandomSource, mathRandomSource } from '../cpu/random';
import type { IEmulator, StepEffects, TimerEffects } from './types';

export interface EmulatorOptions {
  random?: RandomSource;
  font?: Uint8Array;
}

/**
 * Cycle driver. The host calls runInstructionCycle at its CPU rate and tickTimers at 60 Hz;
 * the two are never coupled here.
 */
export class Emulator implements IEmulator {
  readonly state: MachineState;
  private readonly random: RandomSource;
  private readonly font: Uint8Array;
  private lastFault: Chip8Fault | null = null;

  constructor(opts: EmulatorOptions = {}) {
    this.random = opts.random ?? mathRandomSource;
    this.font = opts.font ?? DEFAULT_FONT;
    this.state = new MachineState(this.font);
  }

  static fromRom(rom: Uint8Array, opts: EmulatorOptions = {}): Emulator {
    const emu = new Emulator(opts);
    emu.loadProgram(rom);
    return emu;
  }

  reset(): void {
    this.state.reset(this.font);
    this.lastFault = null;
  }

  loadProgram(bytes: Uint8Array): void {
    this.state.loadProgram(bytes);
  }

  get halted(): boolean {
    return this.lastFault !== null;
  }

  get fault(): Chip8Fault | null {
    return this.lastFault;
  }

  runInstructionCycle(): StepEffects {
    if (this.lastFault) throw this.lastFault;
    const s = this.state;
    const pc = s.PC;
    try {
      const op = this.fetchDecode(pc);
      return execute(s, op, this.random);
    } catch (e) {
      if (e instanceof Chip8Fault) this.lastFault = e;
      throw e;
    }
  }

  private fetchDecode(pc: number): Operation {
    const word = this.state.read16(pc);
    try {
      return decode(word);
    } catch (e) {
      // attach the fetch address
      if (e instanceof UnknownOpcodeError) throw new UnknownOpcodeError(e.word, pc);
      throw e;
    }
  }

  tickTimers(): TimerEffects {
    const s = this.state;
    if (s.delayTimer > 0) s.delayTimer--;
    if (s.soundTimer > 0) s.soundTimer--;
    return { beeping: s.isBeeping() };
  }

  get display(): Uint8Array {
    return this.state.display;
  }

  isBeeping(): boolean {
    return this.state.isBeeping();
  }

  setKey(key: number, pressed: boolean): void {
    this.state.setKey(key, pressed);
  }

  getKey(key: number): boolean {
    return this.state.getKey(key);
  }
}
