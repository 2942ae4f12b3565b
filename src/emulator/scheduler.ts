import type { Emulator } from './core';

export type CpuErrorMode = 'throw' | 'record';

export interface SchedulerOptions {
  instructionsPerFrame?: number;
  onCpuError?: CpuErrorMode;
  traceEveryInstr?: number; // if >0, log CPU state every N instructions
}

export interface FrameResult {
  instructions: number; // cycles actually executed this frame
  redraw: boolean;
  beeping: boolean;
  error?: unknown;
}

export const DEFAULT_INSTRUCTIONS_PER_FRAME = 10; // ~600 Hz at 60 frames per second

const hex = (v: number, w: number) => v.toString(16).toUpperCase().padStart(w, '0');

export function formatTrace(emu: Emulator): string {
  const s = emu.state;
  const regs = Array.from(s.V, (v) => hex(v, 2)).join(' ');
  return `[TRACE] PC=${hex(s.PC, 4)} I=${hex(s.I, 4)} SP=${s.stack.length} DT=${hex(s.delayTimer, 2)} ST=${hex(s.soundTimer, 2)} V=${regs}`;
}

// Deterministic frame stepper: N instruction cycles, then one 60 Hz timer tick. No real-time pacing.
export class Scheduler {
  private readonly instructionsPerFrame: number;
  private readonly onCpuError: CpuErrorMode;
  private readonly traceEveryInstr: number;
  public lastCpuError: unknown = undefined;
  private execCount = 0;

  constructor(private readonly emu: Emulator, opts: SchedulerOptions = {}) {
    this.instructionsPerFrame = Math.max(1, (opts.instructionsPerFrame ?? DEFAULT_INSTRUCTIONS_PER_FRAME) | 0);
    this.onCpuError = opts.onCpuError ?? 'throw';
    this.traceEveryInstr = Math.max(0, opts.traceEveryInstr ?? 0) | 0;
  }

  get executed(): number {
    return this.execCount;
  }

  stepFrame(): FrameResult {
    const result: FrameResult = { instructions: 0, redraw: false, beeping: false };
    if (!this.emu.halted) {
      for (let i = 0; i < this.instructionsPerFrame; i++) {
        try {
          const fx = this.emu.runInstructionCycle();
          if (fx.redraw) result.redraw = true;
        } catch (e) {
          this.lastCpuError = e;
          if (this.onCpuError === 'throw') throw e;
          result.error = e;
          break;
        }
        result.instructions++;
        this.execCount++;
        if (this.traceEveryInstr > 0 && this.execCount % this.traceEveryInstr === 0) {
          // eslint-disable-next-line no-console
          console.log(formatTrace(this.emu));
        }
      }
    }
    result.beeping = this.emu.tickTimers().beeping;
    return result;
  }

  runFrames(frames: number): FrameResult[] {
    const out: FrameResult[] = [];
    for (let f = 0; f < frames; f++) out.push(this.stepFrame());
    return out;
  }
}
