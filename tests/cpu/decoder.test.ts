import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { decode, encode, OPERATION_KINDS } from '../../src/cpu/decoder';
import { UnknownOpcodeError } from '../../src/cpu/errors';

function isSupported(w: number): boolean {
  try {
    decode(w);
    return true;
  } catch (e) {
    if (e instanceof UnknownOpcodeError) return false;
    throw e;
  }
}

describe('decode: opcode table', () => {
  it('classifies the system ops', () => {
    expect(decode(0x00e0)).toEqual({ kind: 'CLS' });
    expect(decode(0x00ee)).toEqual({ kind: 'RET' });
  });

  it('extracts NNN for address forms', () => {
    expect(decode(0x1abc)).toEqual({ kind: 'JP', nnn: 0xabc });
    expect(decode(0x2345)).toEqual({ kind: 'CALL', nnn: 0x345 });
    expect(decode(0xa123)).toEqual({ kind: 'LD_I', nnn: 0x123 });
    expect(decode(0xbfff)).toEqual({ kind: 'JP_V0', nnn: 0xfff });
  });

  it('extracts X and NN for immediate forms', () => {
    expect(decode(0x3a42)).toEqual({ kind: 'SE_VX_NN', x: 0xa, nn: 0x42 });
    expect(decode(0x4b00)).toEqual({ kind: 'SNE_VX_NN', x: 0xb, nn: 0x00 });
    expect(decode(0x6cff)).toEqual({ kind: 'LD_VX_NN', x: 0xc, nn: 0xff });
    expect(decode(0x7d01)).toEqual({ kind: 'ADD_VX_NN', x: 0xd, nn: 0x01 });
    expect(decode(0xce0f)).toEqual({ kind: 'RND', x: 0xe, nn: 0x0f });
  });

  it('disambiguates the 8XY? family on the low nibble', () => {
    const kinds = [0x0, 0x1, 0x2, 0x3, 0x4, 0x5, 0x6, 0x7, 0xe].map((n) => decode(0x8120 | n).kind);
    expect(kinds).toEqual(['LD_VX_VY', 'OR', 'AND', 'XOR', 'ADD_VX_VY', 'SUB', 'SHR', 'SUBN', 'SHL']);
    expect(decode(0x8125)).toEqual({ kind: 'SUB', x: 1, y: 2 });
  });

  it('decodes register comparisons and DRW', () => {
    expect(decode(0x5120)).toEqual({ kind: 'SE_VX_VY', x: 1, y: 2 });
    expect(decode(0x9340)).toEqual({ kind: 'SNE_VX_VY', x: 3, y: 4 });
    expect(decode(0xd5a7)).toEqual({ kind: 'DRW', x: 5, y: 0xa, n: 7 });
    expect(decode(0xd000)).toEqual({ kind: 'DRW', x: 0, y: 0, n: 0 });
  });

  it('disambiguates E and F families on the low byte', () => {
    expect(decode(0xe39e)).toEqual({ kind: 'SKP', x: 3 });
    expect(decode(0xe4a1)).toEqual({ kind: 'SKNP', x: 4 });
    const fKinds = [0x07, 0x0a, 0x15, 0x18, 0x1e, 0x29, 0x33, 0x55, 0x65].map((nn) => decode(0xf200 | nn).kind);
    expect(fKinds).toEqual(['LD_VX_DT', 'LD_VX_K', 'LD_DT_VX', 'LD_ST_VX', 'ADD_I_VX', 'LD_F_VX', 'LD_B_VX', 'LD_I_VX', 'LD_VX_I']);
    expect(decode(0xf233)).toEqual({ kind: 'LD_B_VX', x: 2 });
  });
});

describe('decode: unknown words', () => {
  it.each([0x0000, 0x0123, 0x00e1, 0x00ff, 0x5121, 0x812f, 0x8128, 0x9341, 0xe000, 0xe19f, 0xf000, 0xf1ff, 0xf266])(
    'rejects %s',
    (w) => {
      expect(() => decode(w)).toThrow(UnknownOpcodeError);
    }
  );

  it('carries the offending word', () => {
    try {
      decode(0x812f);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(UnknownOpcodeError);
      if (e instanceof UnknownOpcodeError) {
        expect(e.word).toBe(0x812f);
        expect(e.code).toBe('UNKNOWN_OPCODE');
        expect(e.message).toBe('Unknown opcode 812F');
      }
    }
  });

  it('accepts exactly 34 forms across the 16-bit space', () => {
    const seen = new Set<string>();
    let count = 0;
    for (let w = 0; w <= 0xffff; w++) {
      if (!isSupported(w)) continue;
      count++;
      seen.add(decode(w).kind);
    }
    expect(seen.size).toBe(34);
    expect([...seen].sort()).toEqual([...OPERATION_KINDS].sort());
    // 4 address forms * 4096 + 5 immediate * 4096 + 11 pair * 256 + DRW 4096 + 11 single * 16 + CLS + RET
    expect(count).toBe(4 * 4096 + 5 * 4096 + 11 * 256 + 4096 + 11 * 16 + 2);
  });
});

describe('Property-based: encode(decode(w)) === w', () => {
  it('round-trips every supported word', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 0xffff }), (w) => {
        fc.pre(isSupported(w));
        expect(encode(decode(w))).toBe(w);
      }),
      { numRuns: 2000 }
    );
  });

  it('round-trips exhaustively', () => {
    for (let w = 0; w <= 0xffff; w++) {
      if (isSupported(w)) expect(encode(decode(w))).toBe(w);
    }
  });
});
