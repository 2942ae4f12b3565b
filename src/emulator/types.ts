export type Byte = number; // 0..255
export type Word = number; // 0..65535

export interface StepEffects {
  redraw: boolean; // display buffer changed (DRW/CLS)
  beeping: boolean; // sound timer non-zero after the step
}

export interface TimerEffects {
  beeping: boolean;
}

export interface IEmulator {
  reset(): void;
  runInstructionCycle(): StepEffects; // fetch/decode/execute one instruction
  tickTimers(): TimerEffects; // one 60 Hz timer tick
}
