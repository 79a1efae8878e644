import { clampByte, type LumaGrid } from './grid';

const MIDPOINT = 128;

function mapPixels(src: LumaGrid, fn: (v: number) => number): LumaGrid {
  const out = new Uint8Array(src.data.length);
  for (let i = 0; i < src.data.length; i += 1) {
    out[i] = fn(src.data[i]);
  }
  return { width: src.width, height: src.height, data: out };
}

/** Linear stretch around 128: `(v - 128) * factor + 128`, rounded and clamped. */
export function enhanceContrast(src: LumaGrid, factor: number): LumaGrid {
  return mapPixels(src, (v) => clampByte(Math.round((v - MIDPOINT) * factor + MIDPOINT)));
}

/** Values strictly above `threshold` become 255, the rest 0. */
export function applyThreshold(src: LumaGrid, threshold: number): LumaGrid {
  return mapPixels(src, (v) => (v > threshold ? 255 : 0));
}

export function invert(src: LumaGrid): LumaGrid {
  return mapPixels(src, (v) => 255 - v);
}
