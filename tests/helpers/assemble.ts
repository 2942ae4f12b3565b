import { encode, type Operation } from '../../src/cpu/decoder';

export class AssembleUnsupportedError extends Error {}

// Minimal line assembler for tests. One instruction per line, ';' starts a comment.
// Syntax follows the common mnemonic table:
//  - CLS; RET; JP nnn; JP V0, nnn; CALL nnn
//  - SE/SNE Vx, nn|Vy; LD Vx, nn|Vy|DT|K|[I]; LD I, nnn; LD DT|ST|F|B|[I], Vx
//  - ADD Vx, nn|Vy; ADD I, Vx; OR/AND/XOR/SUB/SUBN Vx, Vy; SHR/SHL Vx[, Vy]
//  - RND Vx, nn; DRW Vx, Vy, n; SKP/SKNP Vx
//  - DW word; DB byte[, byte...]
// Numbers: 0x1F, $1F, #1F (hex) or decimal.

function num(tok: string, max: number): number {
  const t = tok.trim();
  let v: number;
  if (/^0x[0-9a-f]+$/i.test(t)) v = parseInt(t.slice(2), 16);
  else if (/^[$#][0-9a-f]+$/i.test(t)) v = parseInt(t.slice(1), 16);
  else if (/^\d+$/.test(t)) v = parseInt(t, 10);
  else throw new AssembleUnsupportedError(`bad number: ${tok}`);
  if (v > max) throw new AssembleUnsupportedError(`value out of range: ${tok}`);
  return v;
}

function reg(tok: string | undefined): number | undefined {
  const m = (tok ?? '').trim().match(/^v([0-9a-f])$/i);
  return m ? parseInt(m[1], 16) : undefined;
}

function needReg(tok: string | undefined, line: string): number {
  const r = reg(tok);
  if (r === undefined) throw new AssembleUnsupportedError(`expected register in: ${line}`);
  return r;
}

function parseLine(line: string): Operation | number[] | null {
  const code = line.replace(/;.*$/, '').trim();
  if (code === '') return null;
  const sp = code.search(/\s/);
  const mnem = (sp < 0 ? code : code.slice(0, sp)).toUpperCase();
  const args = sp < 0 ? [] : code.slice(sp).split(',').map((a) => a.trim());
  const [a, b, c] = args;
  const up = (s: string | undefined) => (s ?? '').toUpperCase();

  switch (mnem) {
    case 'DW': {
      const w = num(a, 0xffff);
      return [w >>> 8, w & 0xff];
    }
    case 'DB':
      return args.map((t) => num(t, 0xff));
    case 'CLS':
      return { kind: 'CLS' };
    case 'RET':
      return { kind: 'RET' };
    case 'JP':
      if (up(a) === 'V0') return { kind: 'JP_V0', nnn: num(b, 0xfff) };
      return { kind: 'JP', nnn: num(a, 0xfff) };
    case 'CALL':
      return { kind: 'CALL', nnn: num(a, 0xfff) };
    case 'SE':
    case 'SNE': {
      const x = needReg(a, line);
      const y = reg(b);
      if (y !== undefined) return { kind: mnem === 'SE' ? 'SE_VX_VY' : 'SNE_VX_VY', x, y };
      return { kind: mnem === 'SE' ? 'SE_VX_NN' : 'SNE_VX_NN', x, nn: num(b, 0xff) };
    }
    case 'LD': {
      const A = up(a);
      const B = up(b);
      if (A === 'I') return { kind: 'LD_I', nnn: num(b, 0xfff) };
      if (A === 'DT') return { kind: 'LD_DT_VX', x: needReg(b, line) };
      if (A === 'ST') return { kind: 'LD_ST_VX', x: needReg(b, line) };
      if (A === 'F') return { kind: 'LD_F_VX', x: needReg(b, line) };
      if (A === 'B') return { kind: 'LD_B_VX', x: needReg(b, line) };
      if (A === '[I]') return { kind: 'LD_I_VX', x: needReg(b, line) };
      const x = needReg(a, line);
      if (B === 'DT') return { kind: 'LD_VX_DT', x };
      if (B === 'K') return { kind: 'LD_VX_K', x };
      if (B === '[I]') return { kind: 'LD_VX_I', x };
      const y = reg(b);
      if (y !== undefined) return { kind: 'LD_VX_VY', x, y };
      return { kind: 'LD_VX_NN', x, nn: num(b, 0xff) };
    }
    case 'ADD': {
      if (up(a) === 'I') return { kind: 'ADD_I_VX', x: needReg(b, line) };
      const x = needReg(a, line);
      const y = reg(b);
      if (y !== undefined) return { kind: 'ADD_VX_VY', x, y };
      return { kind: 'ADD_VX_NN', x, nn: num(b, 0xff) };
    }
    case 'OR':
    case 'AND':
    case 'XOR':
    case 'SUB':
    case 'SUBN':
      return { kind: mnem, x: needReg(a, line), y: needReg(b, line) };
    case 'SHR':
    case 'SHL':
      return { kind: mnem, x: needReg(a, line), y: reg(b) ?? 0 };
    case 'RND':
      return { kind: 'RND', x: needReg(a, line), nn: num(b, 0xff) };
    case 'DRW':
      return { kind: 'DRW', x: needReg(a, line), y: needReg(b, line), n: num(c ?? '', 0xf) };
    case 'SKP':
      return { kind: 'SKP', x: needReg(a, line) };
    case 'SKNP':
      return { kind: 'SKNP', x: needReg(a, line) };
    default:
      throw new AssembleUnsupportedError(`unsupported: ${line}`);
  }
}

export function assemble(src: string): Uint8Array {
  const bytes: number[] = [];
  for (const line of src.split('\n')) {
    const res = parseLine(line);
    if (res === null) continue;
    if (Array.isArray(res)) {
      bytes.push(...res);
      continue;
    }
    const w = encode(res);
    bytes.push(w >>> 8, w & 0xff);
  }
  return new Uint8Array(bytes);
}
