import { assertRgbGrid, clampByte, type LumaGrid, type RgbGrid } from './grid';

/** Rec. 601 luminosity weighting, rounded to the nearest integer. */
export function lumaOf(r: number, g: number, b: number) {
  return clampByte(Math.round(0.299 * r + 0.587 * g + 0.114 * b));
}

/**
 * The single RGB to luma projection. The validator and the transform chain
 * both go through here so an accept decision and the pixels it admits are
 * computed with the same arithmetic.
 */
export function rgbToLuma(rgb: RgbGrid): LumaGrid {
  assertRgbGrid(rgb);
  const total = rgb.width * rgb.height;
  const out = new Uint8Array(total);

  for (let i = 0; i < total; i += 1) {
    out[i] = lumaOf(rgb.data[i * 3], rgb.data[i * 3 + 1], rgb.data[i * 3 + 2]);
  }

  return { width: rgb.width, height: rgb.height, data: out };
}
