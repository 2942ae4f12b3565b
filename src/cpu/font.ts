// Hex digit glyphs 0-F, one nibble per row (5 rows, 4 pixels wide).
const GLYPHS: readonly number[] = [
  0xf999f, 0x26227, 0xf1f8f, 0xf1f1f,
  0x99f11, 0xf8f1f, 0xf8f9f, 0xf1244,
  0xf9f9f, 0xf9f1f, 0xf9f99, 0xe9e9e,
  0xf888f, 0xe999e, 0xf8f8f, 0xf8f88,
];

export const FONT_BASE = 0x000;
export const GLYPH_BYTES = 5;

function expandGlyphs(glyphs: readonly number[]): Uint8Array {
  const out = new Uint8Array(glyphs.length * GLYPH_BYTES);
  glyphs.forEach((g, digit) => {
    for (let row = 0; row < GLYPH_BYTES; row++) {
      const nibble = (g >>> (16 - row * 4)) & 0xf;
      out[digit * GLYPH_BYTES + row] = nibble << 4;
    }
  });
  return out;
}

// 80 bytes: the canonical sprite font.
export const DEFAULT_FONT: Uint8Array = expandGlyphs(GLYPHS);

export function glyphAddress(digit: number): number {
  return FONT_BASE + (digit & 0xf) * GLYPH_BYTES;
}
