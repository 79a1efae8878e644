import { assertDimensions, assertLumaGrid, createLumaGrid, type LumaGrid } from './grid';

/** Where the scaled source lands on the target canvas. */
export type Placement = {
  scale: number;
  width: number;
  height: number;
  left: number;
  top: number;
};

/**
 * Fit-inside geometry: the largest uniform scale that keeps the source within
 * the target, centred with the remainder split floor-first.
 */
export function fitInside(srcWidth: number, srcHeight: number, targetWidth: number, targetHeight: number): Placement {
  assertDimensions(srcWidth, srcHeight);
  assertDimensions(targetWidth, targetHeight);

  const scale = Math.min(targetWidth / srcWidth, targetHeight / srcHeight);
  const width = Math.min(targetWidth, Math.max(1, Math.round(srcWidth * scale)));
  const height = Math.min(targetHeight, Math.max(1, Math.round(srcHeight * scale)));

  return {
    scale,
    width,
    height,
    left: Math.floor((targetWidth - width) / 2),
    top: Math.floor((targetHeight - height) / 2)
  };
}

/** Nearest-neighbour resample; output values are always a subset of the input's. */
export function resizeNearest(src: LumaGrid, width: number, height: number): LumaGrid {
  assertLumaGrid(src);
  const out = createLumaGrid(width, height);

  const colMap = new Uint32Array(width);
  for (let x = 0; x < width; x += 1) {
    colMap[x] = Math.min(src.width - 1, Math.floor((x * src.width) / width));
  }

  for (let y = 0; y < height; y += 1) {
    const sy = Math.min(src.height - 1, Math.floor((y * src.height) / height));
    const srcRow = sy * src.width;
    const dstRow = y * width;
    for (let x = 0; x < width; x += 1) {
      out.data[dstRow + x] = src.data[srcRow + colMap[x]];
    }
  }

  return out;
}

/** Copy `src` onto a fresh black canvas at (left, top); no blending. */
export function padToCanvas(src: LumaGrid, width: number, height: number, left: number, top: number): LumaGrid {
  const canvas = createLumaGrid(width, height, 0);

  for (let y = 0; y < src.height; y += 1) {
    const ty = y + top;
    if (ty < 0 || ty >= height) continue;
    for (let x = 0; x < src.width; x += 1) {
      const tx = x + left;
      if (tx < 0 || tx >= width) continue;
      canvas.data[ty * width + tx] = src.data[y * src.width + x];
    }
  }

  return canvas;
}

export function canonicalize(src: LumaGrid, targetWidth: number, targetHeight: number): LumaGrid {
  const placement = fitInside(src.width, src.height, targetWidth, targetHeight);
  const resized = resizeNearest(src, placement.width, placement.height);
  return padToCanvas(resized, targetWidth, targetHeight, placement.left, placement.top);
}
