import { EntropySourceFailureError } from './errors';

// Supplies bytes for RND. Implementations may throw; the executor reports that as a fault.
export interface RandomSource {
  nextByte(): number;
}

export const mathRandomSource: RandomSource = {
  nextByte: () => Math.floor(Math.random() * 256) & 0xff,
};

// Deterministic source (mulberry32) for reproducible runs and tests.
export function createSeededRandom(seed: number): RandomSource {
  let s = seed >>> 0;
  return {
    nextByte(): number {
      s = (s + 0x6d2b79f5) >>> 0;
      let t = s;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 24) & 0xff;
    },
  };
}

// Replays a fixed list of bytes, then fails. Useful to script RND in tests.
export function createSequenceRandom(bytes: readonly number[]): RandomSource {
  let pos = 0;
  return {
    nextByte(): number {
      if (pos >= bytes.length) throw new Error(`sequence exhausted after ${bytes.length} bytes`);
      return bytes[pos++];
    },
  };
}

export function drawRandomByte(source: RandomSource): number {
  let value: number;
  try {
    value = source.nextByte();
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new EntropySourceFailureError(msg, e);
  }
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new EntropySourceFailureError(`expected a byte, got ${value}`);
  }
  return value;
}
