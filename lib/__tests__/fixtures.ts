import sharp from 'sharp';
import type { LumaGrid, RgbGrid } from '../grid';

/** Deterministic PRNG so property-style tests are reproducible. */
export function mulberry32(seed: number) {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function greyRgb(width: number, height: number, valueAt: (x: number, y: number) => number): RgbGrid {
  const data = new Uint8Array(width * height * 3);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const v = valueAt(x, y);
      const i = (y * width + x) * 3;
      data[i] = v;
      data[i + 1] = v;
      data[i + 2] = v;
    }
  }
  return { width, height, data };
}

export function lumaGrid(width: number, height: number, valueAt: (x: number, y: number) => number): LumaGrid {
  const data = new Uint8Array(width * height);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      data[y * width + x] = valueAt(x, y);
    }
  }
  return { width, height, data };
}

/** Replicates luma into three equal channels, the view an RGB reader gets of a grey image. */
export function lumaToRgb(luma: LumaGrid): RgbGrid {
  const total = luma.width * luma.height;
  const out = new Uint8Array(total * 3);
  for (let i = 0; i < total; i += 1) {
    out.fill(luma.data[i], i * 3, i * 3 + 3);
  }
  return { width: luma.width, height: luma.height, data: out };
}

/** Light page (230) with a dark band (100) over x in [100, 900), y in [150, 250). */
export function handwritingPage(): RgbGrid {
  return greyRgb(1000, 400, (x, y) => (x >= 100 && x < 900 && y >= 150 && y < 250 ? 100 : 230));
}

export function checkerboard(size: number): RgbGrid {
  return greyRgb(size, size, (x, y) => ((x + y) % 2 === 0 ? 0 : 255));
}

export async function toPng(grid: RgbGrid): Promise<Buffer> {
  return sharp(Buffer.from(grid.data), {
    raw: { width: grid.width, height: grid.height, channels: 3 }
  })
    .png()
    .toBuffer();
}

export async function readPng(png: Buffer) {
  const { data, info } = await sharp(png).raw().toBuffer({ resolveWithObject: true });
  return { data: new Uint8Array(data), width: info.width, height: info.height, channels: info.channels };
}
