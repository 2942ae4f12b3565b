import { PNG } from 'pngjs';
import { type RenderOptions, renderDisplayRGBA, renderedSize } from './renderer';

// Encode the current display buffer as a PNG image.
export function encodeDisplayPng(display: ArrayLike<number>, opts: RenderOptions = {}): Buffer {
  const { width, height } = renderedSize(opts.scale ?? 1);
  const rgba = renderDisplayRGBA(display, opts);
  const png = new PNG({ width, height });
  // pngjs expects a Buffer; copy the RGBA view into its data
  Buffer.from(rgba.buffer, rgba.byteOffset, rgba.byteLength).copy(png.data);
  return PNG.sync.write(png);
}
