import type { Byte, Word } from '../emulator/types';
import { OutOfBoundsError, ProgramTooLargeError } from './errors';
import { DEFAULT_FONT, FONT_BASE } from './font';

export const MEMORY_SIZE = 0x1000;
export const PROGRAM_START = 0x200;
export const MAX_PROGRAM_SIZE = MEMORY_SIZE - PROGRAM_START;
export const STACK_DEPTH = 16;
export const DISPLAY_WIDTH = 64;
export const DISPLAY_HEIGHT = 32;
export const KEY_COUNT = 16;
export const FONT_SIZE = 80;

export class MachineState {
  readonly memory = new Uint8Array(MEMORY_SIZE);
  readonly V = new Uint8Array(16);
  I: Word = 0;
  PC: Word = PROGRAM_START;
  readonly stack: Word[] = [];
  delayTimer: Byte = 0;
  soundTimer: Byte = 0;
  // One byte per pixel (0/1), row-major.
  private readonly pixels = new Uint8Array(DISPLAY_WIDTH * DISPLAY_HEIGHT);
  private readonly keys: boolean[] = new Array<boolean>(KEY_COUNT).fill(false);
  // Register a pending LD Vx, K will fill, or null.
  awaitingKey: number | null = null;
  // First key that went down while a key wait was pending.
  private pressedKey: number | null = null;

  constructor(font: Uint8Array = DEFAULT_FONT) {
    this.reset(font);
  }

  reset(font: Uint8Array = DEFAULT_FONT): void {
    if (font.length !== FONT_SIZE) {
      throw new RangeError(`Font must be ${FONT_SIZE} bytes, got ${font.length}`);
    }
    this.memory.fill(0);
    this.memory.set(font, FONT_BASE);
    this.V.fill(0);
    this.I = 0;
    this.PC = PROGRAM_START;
    this.stack.length = 0;
    this.delayTimer = 0;
    this.soundTimer = 0;
    this.pixels.fill(0);
    this.keys.fill(false);
    this.awaitingKey = null;
    this.pressedKey = null;
  }

  loadProgram(bytes: Uint8Array): void {
    if (bytes.length > MAX_PROGRAM_SIZE) {
      throw new ProgramTooLargeError(bytes.length, MAX_PROGRAM_SIZE);
    }
    this.memory.set(bytes, PROGRAM_START);
  }

  // Copy of the pixel buffer; only DRW, CLS and reset write the live one.
  get display(): Uint8Array {
    return this.pixels.slice();
  }

  pixel(x: number, y: number): number {
    return this.pixels[(y % DISPLAY_HEIGHT) * DISPLAY_WIDTH + (x % DISPLAY_WIDTH)];
  }

  clearDisplay(): void {
    this.pixels.fill(0);
  }

  // XOR one pixel (wrapping); returns true when a set pixel was cleared.
  flipPixel(x: number, y: number): boolean {
    const idx = (y % DISPLAY_HEIGHT) * DISPLAY_WIDTH + (x % DISPLAY_WIDTH);
    const was = this.pixels[idx];
    this.pixels[idx] = was ^ 1;
    return was === 1;
  }

  isBeeping(): boolean {
    return this.soundTimer > 0;
  }

  getKey(key: number): boolean {
    return this.keys[checkKey(key)];
  }

  setKey(key: number, pressed: boolean): void {
    const k = checkKey(key);
    if (pressed && !this.keys[k] && this.awaitingKey !== null && this.pressedKey === null) {
      this.pressedKey = k;
    }
    this.keys[k] = pressed;
  }

  // Key pressed since the wait began, cleared once taken.
  takePressedKey(): number | null {
    const k = this.pressedKey;
    this.pressedKey = null;
    return k;
  }

  // Fails before anything is read or written so callers stay fault-atomic.
  assertRange(addr: number, length: number): void {
    if (addr < 0) throw new OutOfBoundsError(addr);
    if (length > 0 && addr + length - 1 >= MEMORY_SIZE) {
      throw new OutOfBoundsError(Math.max(addr, MEMORY_SIZE));
    }
  }

  // Big-endian instruction word.
  read16(addr: number): Word {
    this.assertRange(addr, 2);
    return (this.memory[addr] << 8) | this.memory[addr + 1];
  }
}

function checkKey(key: number): number {
  if (!Number.isInteger(key) || key < 0 || key >= KEY_COUNT) {
    throw new RangeError(`Key must be 0-F, got ${key}`);
  }
  return key;
}
