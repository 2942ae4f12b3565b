import fs from 'fs';
import { normaliseRom } from '../src/rom/loader';
import { Emulator } from '../src/emulator/core';
import { Scheduler } from '../src/emulator/scheduler';
import { intFromEnv, readSchedulerOptionsFromEnv } from '../src/emulator/config';
import { createSeededRandom, mathRandomSource } from '../src/cpu/random';
import { encodeDisplayPng } from '../src/display/png';

function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const a of argv.slice(2)) {
    const m = a.match(/^--([^=]+)=(.*)$/);
    if (m) out[m[1]] = m[2];
  }
  return out;
}

async function main() {
  const args = parseArgs(process.argv);
  const romPath = args.rom || process.env.CHIP8_ROM;
  const outPath = args.out || 'screenshot.png';
  const frames = intFromEnv(args.frames ?? process.env.CHIP8_FRAMES, 1) ?? 120;
  const scale = intFromEnv(args.scale ?? process.env.CHIP8_SCALE, 1) ?? 8;
  const seed = intFromEnv(args.seed ?? process.env.CHIP8_SEED, 0);
  // --hold=A,5 keeps those keys pressed for the whole run
  const held = (args.hold ?? '').split(',').filter((k) => k.trim() !== '').map((k) => parseInt(k.trim(), 16));

  if (!romPath) {
    console.error('Usage: npm run screenshot -- --rom=path/to/game.ch8 --out=./out.png [--frames=120] [--scale=8] [--seed=N] [--hold=1,A]');
    process.exit(1);
  }

  const envOpts = readSchedulerOptionsFromEnv({
    ...process.env,
    CHIP8_IPF: args.ipf ?? process.env.CHIP8_IPF,
    CHIP8_CPU_ERROR: args.onCpuError ?? process.env.CHIP8_CPU_ERROR,
    CHIP8_TRACE: args.trace ?? process.env.CHIP8_TRACE,
  });
  console.log(`[screenshot] ROM: ${romPath}  out: ${outPath}  frames: ${frames}  ipf: ${envOpts.instructionsPerFrame}  scale: ${scale}  seed: ${seed ?? 'none'}  onCpuError=${envOpts.onCpuError}`);

  const { rom } = normaliseRom(new Uint8Array(fs.readFileSync(romPath)));
  const emu = Emulator.fromRom(rom, { random: seed === undefined ? mathRandomSource : createSeededRandom(seed) });
  for (const k of held) emu.setKey(k, true);

  const sched = new Scheduler(emu, envOpts);
  for (let i = 0; i < frames; i++) {
    const res = sched.stepFrame();
    if (res.error !== undefined) {
      console.error('[screenshot] CPU error during stepping:', res.error);
      break;
    }
    if (i % 30 === 29) console.log(`[screenshot] stepped ${i + 1} frames`);
  }

  fs.writeFileSync(outPath, encodeDisplayPng(emu.display, { scale }));
  console.log(`Wrote ${outPath} after ${sched.executed} instructions`);
}

main().catch((e) => {
  console.error('[screenshot] Unhandled error:', e);
  process.exit(1);
});
