import { ProgramTooLargeError } from '../cpu/errors';
import { MAX_PROGRAM_SIZE } from '../cpu/machine';

// Raw ROM images have no header; only the size is checked.
export function normaliseRom(raw: Uint8Array): { rom: Uint8Array } {
  if (raw.length === 0) throw new RangeError('ROM image is empty');
  if (raw.length > MAX_PROGRAM_SIZE) throw new ProgramTooLargeError(raw.length, MAX_PROGRAM_SIZE);
  return { rom: raw.slice() };
}
