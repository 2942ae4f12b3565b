import { type CpuErrorMode, DEFAULT_INSTRUCTIONS_PER_FRAME, type SchedulerOptions } from './scheduler';

export type Env = Record<string, string | undefined>;

export function intFromEnv(raw: string | undefined, min: number): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const n = Number(raw.trim());
  if (!Number.isInteger(n) || n < min) return undefined;
  return n;
}

function errorModeFromEnv(raw: string | undefined): CpuErrorMode | undefined {
  const v = (raw ?? '').trim().toLowerCase();
  if (v === 'throw' || v === 'record') return v;
  return undefined;
}

// CHIP8_IPF, CHIP8_CPU_ERROR, CHIP8_TRACE; invalid values fall back to defaults.
export function readSchedulerOptionsFromEnv(env: Env = process.env): Required<SchedulerOptions> {
  return {
    instructionsPerFrame: intFromEnv(env.CHIP8_IPF, 1) ?? DEFAULT_INSTRUCTIONS_PER_FRAME,
    onCpuError: errorModeFromEnv(env.CHIP8_CPU_ERROR) ?? 'throw',
    traceEveryInstr: intFromEnv(env.CHIP8_TRACE, 0) ?? 0,
  };
}
