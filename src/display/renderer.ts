import { DISPLAY_HEIGHT, DISPLAY_WIDTH } from '../cpu/machine';

export type RGB = readonly [number, number, number];

export interface RenderOptions {
  scale?: number; // integer pixel scale
  on?: RGB;
  off?: RGB;
}

// Expand the 64x32 display buffer into an RGBA8888 image of (64*scale) x (32*scale).
export function renderDisplayRGBA(display: ArrayLike<number>, opts: RenderOptions = {}): Uint8Array {
  const scale = opts.scale ?? 1;
  if (!Number.isInteger(scale) || scale < 1) throw new RangeError(`scale must be a positive integer, got ${scale}`);
  const on = opts.on ?? [0xff, 0xff, 0xff];
  const off = opts.off ?? [0x00, 0x00, 0x00];
  const width = DISPLAY_WIDTH * scale;
  const height = DISPLAY_HEIGHT * scale;
  const out = new Uint8Array(width * height * 4);

  for (let y = 0; y < height; y++) {
    const srcRow = Math.floor(y / scale) * DISPLAY_WIDTH;
    for (let x = 0; x < width; x++) {
      const c = display[srcRow + Math.floor(x / scale)] ? on : off;
      const o = (y * width + x) * 4;
      out[o] = c[0];
      out[o + 1] = c[1];
      out[o + 2] = c[2];
      out[o + 3] = 0xff;
    }
  }
  return out;
}

export function renderedSize(scale = 1): { width: number; height: number } {
  return { width: DISPLAY_WIDTH * scale, height: DISPLAY_HEIGHT * scale };
}
