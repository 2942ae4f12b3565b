import type { StepEffects } from '../emulator/types';
import type { Operation } from './decoder';
import { StackOverflowError, StackUnderflowError } from './errors';
import { glyphAddress } from './font';
import { MachineState, STACK_DEPTH } from './machine';
import { type RandomSource, drawRandomByte, mathRandomSource } from './random';

const VF = 0xf;
const SPRITE_WIDTH = 8;

// Result first, flag second: with X = F the flag wins.
function setWithFlag(s: MachineState, x: number, value: number, flag: boolean): void {
  s.V[x] = value & 0xff;
  s.V[VF] = flag ? 1 : 0;
}

function skipIf(s: MachineState, cond: boolean): void {
  s.PC = (s.PC + (cond ? 4 : 2)) & 0xffff;
}

function draw(s: MachineState, x: number, y: number, rows: number): void {
  s.assertRange(s.I, rows);
  const ox = s.V[x];
  const oy = s.V[y];
  let collision = false;
  for (let row = 0; row < rows; row++) {
    const bits = s.memory[s.I + row];
    for (let col = 0; col < SPRITE_WIDTH; col++) {
      if ((bits & (0x80 >> col)) === 0) continue;
      if (s.flipPixel(ox + col, oy + row)) collision = true;
    }
  }
  s.V[VF] = collision ? 1 : 0;
}

/**
 * Applies one decoded instruction. Faults are thrown before any field of the state
 * is written, so a failed step leaves the machine as it was.
 */
export function execute(s: MachineState, op: Operation, random: RandomSource = mathRandomSource): StepEffects {
  let redraw = false;
  const next = () => { s.PC = (s.PC + 2) & 0xffff; };

  switch (op.kind) {
    case 'CLS':
      s.clearDisplay();
      redraw = true;
      next();
      break;
    case 'RET': {
      const ret = s.stack.pop();
      if (ret === undefined) throw new StackUnderflowError(s.PC);
      s.PC = ret;
      break;
    }
    case 'JP':
      s.PC = op.nnn;
      break;
    case 'CALL':
      if (s.stack.length >= STACK_DEPTH) throw new StackOverflowError(s.PC);
      s.stack.push((s.PC + 2) & 0xffff);
      s.PC = op.nnn;
      break;
    case 'SE_VX_NN':
      skipIf(s, s.V[op.x] === op.nn);
      break;
    case 'SNE_VX_NN':
      skipIf(s, s.V[op.x] !== op.nn);
      break;
    case 'SE_VX_VY':
      skipIf(s, s.V[op.x] === s.V[op.y]);
      break;
    case 'SNE_VX_VY':
      skipIf(s, s.V[op.x] !== s.V[op.y]);
      break;
    case 'LD_VX_NN':
      s.V[op.x] = op.nn;
      next();
      break;
    case 'ADD_VX_NN':
      s.V[op.x] = (s.V[op.x] + op.nn) & 0xff;
      next();
      break;
    case 'LD_VX_VY':
      s.V[op.x] = s.V[op.y];
      next();
      break;
    case 'OR':
      s.V[op.x] |= s.V[op.y];
      next();
      break;
    case 'AND':
      s.V[op.x] &= s.V[op.y];
      next();
      break;
    case 'XOR':
      s.V[op.x] ^= s.V[op.y];
      next();
      break;
    case 'ADD_VX_VY': {
      const sum = s.V[op.x] + s.V[op.y];
      setWithFlag(s, op.x, sum, sum > 0xff);
      next();
      break;
    }
    case 'SUB': {
      const vx = s.V[op.x];
      const vy = s.V[op.y];
      setWithFlag(s, op.x, vx - vy, vx >= vy);
      next();
      break;
    }
    case 'SUBN': {
      const vx = s.V[op.x];
      const vy = s.V[op.y];
      setWithFlag(s, op.x, vy - vx, vy >= vx);
      next();
      break;
    }
    case 'SHR': {
      const vx = s.V[op.x];
      setWithFlag(s, op.x, vx >>> 1, (vx & 0x01) !== 0);
      next();
      break;
    }
    case 'SHL': {
      const vx = s.V[op.x];
      setWithFlag(s, op.x, vx << 1, (vx & 0x80) !== 0);
      next();
      break;
    }
    case 'LD_I':
      s.I = op.nnn;
      next();
      break;
    case 'JP_V0':
      s.PC = (op.nnn + s.V[0]) & 0xffff;
      break;
    case 'RND':
      s.V[op.x] = drawRandomByte(random) & op.nn;
      next();
      break;
    case 'DRW':
      draw(s, op.x, op.y, op.n);
      redraw = true;
      next();
      break;
    case 'SKP':
      skipIf(s, s.getKey(s.V[op.x] & 0xf));
      break;
    case 'SKNP':
      skipIf(s, !s.getKey(s.V[op.x] & 0xf));
      break;
    case 'LD_VX_DT':
      s.V[op.x] = s.delayTimer;
      next();
      break;
    case 'LD_VX_K': {
      // PC stays on this instruction until a key goes down after the wait began.
      if (s.awaitingKey === null) {
        s.awaitingKey = op.x;
        break;
      }
      const key = s.takePressedKey();
      if (key === null) break;
      s.V[op.x] = key;
      s.awaitingKey = null;
      next();
      break;
    }
    case 'LD_DT_VX':
      s.delayTimer = s.V[op.x];
      next();
      break;
    case 'LD_ST_VX':
      s.soundTimer = s.V[op.x];
      next();
      break;
    case 'ADD_I_VX':
      s.I = (s.I + s.V[op.x]) & 0xffff;
      next();
      break;
    case 'LD_F_VX':
      s.I = glyphAddress(s.V[op.x]);
      next();
      break;
    case 'LD_B_VX': {
      s.assertRange(s.I, 3);
      const vx = s.V[op.x];
      s.memory[s.I] = Math.floor(vx / 100);
      s.memory[s.I + 1] = Math.floor(vx / 10) % 10;
      s.memory[s.I + 2] = vx % 10;
      next();
      break;
    }
    case 'LD_I_VX':
      s.assertRange(s.I, op.x + 1);
      for (let r = 0; r <= op.x; r++) s.memory[s.I + r] = s.V[r];
      next();
      break;
    case 'LD_VX_I':
      s.assertRange(s.I, op.x + 1);
      for (let r = 0; r <= op.x; r++) s.V[r] = s.memory[s.I + r];
      next();
      break;
    default: {
      const unreachable: never = op;
      throw new Error(`Unhandled operation ${JSON.stringify(unreachable)}`);
    }
  }

  return { redraw, beeping: s.isBeeping() };
}
