import type { Word } from '../emulator/types';
import { UnknownOpcodeError } from './errors';

// Operand field layouts: _NNN, _XNN, _XY_, _XYN, _X__.
const ADDR_KINDS = ['JP', 'CALL', 'LD_I', 'JP_V0'] as const;
const IMM_KINDS = ['SE_VX_NN', 'SNE_VX_NN', 'LD_VX_NN', 'ADD_VX_NN', 'RND'] as const;
const REG_PAIR_KINDS = ['SE_VX_VY', 'LD_VX_VY', 'OR', 'AND', 'XOR', 'ADD_VX_VY', 'SUB', 'SHR', 'SUBN', 'SHL', 'SNE_VX_VY'] as const;
const REG_KINDS = ['SKP', 'SKNP', 'LD_VX_DT', 'LD_VX_K', 'LD_DT_VX', 'LD_ST_VX', 'ADD_I_VX', 'LD_F_VX', 'LD_B_VX', 'LD_I_VX', 'LD_VX_I'] as const;

export type AddrKind = (typeof ADDR_KINDS)[number];
export type ImmKind = (typeof IMM_KINDS)[number];
export type RegPairKind = (typeof REG_PAIR_KINDS)[number];
export type RegKind = (typeof REG_KINDS)[number];

const ADDR_OPS: Readonly<Record<AddrKind, number>> = { JP: 0x1000, CALL: 0x2000, LD_I: 0xa000, JP_V0: 0xb000 };
const IMM_OPS: Readonly<Record<ImmKind, number>> = { SE_VX_NN: 0x3000, SNE_VX_NN: 0x4000, LD_VX_NN: 0x6000, ADD_VX_NN: 0x7000, RND: 0xc000 };
const REG_PAIR_OPS: Readonly<Record<RegPairKind, number>> = {
  SE_VX_VY: 0x5000,
  LD_VX_VY: 0x8000,
  OR: 0x8001,
  AND: 0x8002,
  XOR: 0x8003,
  ADD_VX_VY: 0x8004,
  SUB: 0x8005,
  SHR: 0x8006,
  SUBN: 0x8007,
  SHL: 0x800e,
  SNE_VX_VY: 0x9000,
};
const REG_OPS: Readonly<Record<RegKind, number>> = {
  SKP: 0xe09e,
  SKNP: 0xe0a1,
  LD_VX_DT: 0xf007,
  LD_VX_K: 0xf00a,
  LD_DT_VX: 0xf015,
  LD_ST_VX: 0xf018,
  ADD_I_VX: 0xf01e,
  LD_F_VX: 0xf029,
  LD_B_VX: 0xf033,
  LD_I_VX: 0xf055,
  LD_VX_I: 0xf065,
};
const CLS_WORD = 0x00e0;
const RET_WORD = 0x00ee;
const DRW_BASE = 0xd000;

export type Operation =
  | { readonly kind: 'CLS' }
  | { readonly kind: 'RET' }
  | { readonly kind: AddrKind; readonly nnn: number }
  | { readonly kind: ImmKind; readonly x: number; readonly nn: number }
  | { readonly kind: RegPairKind; readonly x: number; readonly y: number }
  | { readonly kind: 'DRW'; readonly x: number; readonly y: number; readonly n: number }
  | { readonly kind: RegKind; readonly x: number };

export type OperationKind = Operation['kind'];

function invert<K extends string>(kinds: readonly K[], table: Readonly<Record<K, number>>): Map<number, K> {
  const out = new Map<number, K>();
  for (const kind of kinds) out.set(table[kind], kind);
  return out;
}

const ADDR_BY_NIBBLE = invert(ADDR_KINDS, ADDR_OPS);
const IMM_BY_NIBBLE = invert(IMM_KINDS, IMM_OPS);
const REG_PAIR_BY_PATTERN = invert(REG_PAIR_KINDS, REG_PAIR_OPS);
const REG_BY_PATTERN = invert(REG_KINDS, REG_OPS);

export function decode(word: Word): Operation {
  const w = word & 0xffff;
  const hi = w & 0xf000;
  const x = (w >>> 8) & 0xf;
  const y = (w >>> 4) & 0xf;

  switch (hi) {
    case 0x0000:
      if (w === CLS_WORD) return { kind: 'CLS' };
      if (w === RET_WORD) return { kind: 'RET' };
      break; // 0NNN machine-code calls are not supported
    case 0x1000:
    case 0x2000:
    case 0xa000:
    case 0xb000: {
      const kind = ADDR_BY_NIBBLE.get(hi);
      if (kind) return { kind, nnn: w & 0x0fff };
      break;
    }
    case 0x3000:
    case 0x4000:
    case 0x6000:
    case 0x7000:
    case 0xc000: {
      const kind = IMM_BY_NIBBLE.get(hi);
      if (kind) return { kind, x, nn: w & 0x00ff };
      break;
    }
    case 0x5000:
    case 0x8000:
    case 0x9000: {
      // pattern: high nibble + low nibble
      const kind = REG_PAIR_BY_PATTERN.get(hi | (w & 0x000f));
      if (kind) return { kind, x, y };
      break;
    }
    case 0xd000:
      return { kind: 'DRW', x, y, n: w & 0x000f };
    case 0xe000:
    case 0xf000: {
      // pattern: high nibble + low byte
      const kind = REG_BY_PATTERN.get(hi | (w & 0x00ff));
      if (kind) return { kind, x };
      break;
    }
  }
  throw new UnknownOpcodeError(w);
}

// Inverse of decode: encode(decode(w)) === w for every supported word.
export function encode(op: Operation): Word {
  switch (op.kind) {
    case 'CLS':
      return CLS_WORD;
    case 'RET':
      return RET_WORD;
    case 'JP':
    case 'CALL':
    case 'LD_I':
    case 'JP_V0':
      return ADDR_OPS[op.kind] | (op.nnn & 0x0fff);
    case 'SE_VX_NN':
    case 'SNE_VX_NN':
    case 'LD_VX_NN':
    case 'ADD_VX_NN':
    case 'RND':
      return IMM_OPS[op.kind] | ((op.x & 0xf) << 8) | (op.nn & 0xff);
    case 'SE_VX_VY':
    case 'LD_VX_VY':
    case 'OR':
    case 'AND':
    case 'XOR':
    case 'ADD_VX_VY':
    case 'SUB':
    case 'SHR':
    case 'SUBN':
    case 'SHL':
    case 'SNE_VX_VY':
      return REG_PAIR_OPS[op.kind] | ((op.x & 0xf) << 8) | ((op.y & 0xf) << 4);
    case 'DRW':
      return DRW_BASE | ((op.x & 0xf) << 8) | ((op.y & 0xf) << 4) | (op.n & 0xf);
    case 'SKP':
    case 'SKNP':
    case 'LD_VX_DT':
    case 'LD_VX_K':
    case 'LD_DT_VX':
    case 'LD_ST_VX':
    case 'ADD_I_VX':
    case 'LD_F_VX':
    case 'LD_B_VX':
    case 'LD_I_VX':
    case 'LD_VX_I':
      return REG_OPS[op.kind] | ((op.x & 0xf) << 8);
    default: {
      const unreachable: never = op;
      return unreachable;
    }
  }
}

export const OPERATION_KINDS: readonly OperationKind[] = [
  'CLS',
  'RET',
  ...ADDR_KINDS,
  ...IMM_KINDS,
  ...REG_PAIR_KINDS,
  'DRW',
  ...REG_KINDS,
];
