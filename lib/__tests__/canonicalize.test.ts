import { describe, expect, test } from 'vitest';
import { canonicalize, fitInside, padToCanvas, resizeNearest } from '../canonicalize';
import { InvariantViolationError } from '../errors';
import { isBinary } from '../grid';
import { lumaGrid, mulberry32 } from './fixtures';

describe('fitInside', () => {
  test('wide source fills the height and is centred horizontally', () => {
    const p = fitInside(1000, 400, 256, 64);
    expect(p.scale).toBeCloseTo(0.16, 10);
    expect(p).toMatchObject({ width: 160, height: 64, left: 48, top: 0 });
  });

  test('tall source fills the height and is centred horizontally', () => {
    expect(fitInside(10, 100, 256, 64)).toMatchObject({ width: 6, height: 64, left: 125, top: 0 });
  });

  test('very wide source fills the width and is centred vertically', () => {
    expect(fitInside(300, 20, 256, 64)).toMatchObject({ width: 256, height: 17, left: 0, top: 23 });
  });

  test('exact target size is kept as is', () => {
    expect(fitInside(256, 64, 256, 64)).toEqual({ scale: 1, width: 256, height: 64, left: 0, top: 0 });
  });

  test('small sources are scaled up to fit', () => {
    expect(fitInside(1, 1, 256, 64)).toMatchObject({ width: 64, height: 64, left: 96, top: 0 });
    expect(fitInside(2, 1, 256, 64)).toMatchObject({ width: 128, height: 64, left: 64, top: 0 });
  });

  test('rejects empty sources', () => {
    expect(() => fitInside(0, 10, 256, 64)).toThrow(InvariantViolationError);
  });

  test('keeps the source aspect ratio within rounding tolerance', () => {
    const dims: [number, number][] = [
      [1000, 400],
      [640, 480],
      [1920, 1080],
      [4000, 3000],
      [300, 20],
      [50, 50],
      [800, 100],
      [123, 457],
      [2000, 90],
      [1000, 30]
    ];

    for (const [w, h] of dims) {
      const p = fitInside(w, h, 256, 64);
      const source = w / h;
      const scaled = p.width / p.height;
      const tolerance = Math.min(p.width, p.height) >= 10 ? 0.05 : 0.2;
      expect(Math.abs(scaled - source) / source).toBeLessThanOrEqual(tolerance);
    }
  });
});

describe('resizeNearest', () => {
  test('downscale picks the top-left sample of each cell', () => {
    const src = { width: 4, height: 2, data: new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]) };
    expect(Array.from(resizeNearest(src, 2, 1).data)).toEqual([1, 3]);
  });

  test('upscale repeats samples', () => {
    const src = { width: 2, height: 1, data: new Uint8Array([10, 20]) };
    const out = resizeNearest(src, 4, 2);
    expect(Array.from(out.data)).toEqual([10, 10, 20, 20, 10, 10, 20, 20]);
  });
});

describe('padToCanvas', () => {
  test('places content at the offset over black', () => {
    const src = { width: 2, height: 1, data: new Uint8Array([255, 255]) };
    const out = padToCanvas(src, 4, 3, 1, 1);
    expect(Array.from(out.data)).toEqual([0, 0, 0, 0, 0, 255, 255, 0, 0, 0, 0, 0]);
  });
});

describe('canonicalize', () => {
  test('1000x400 band lands as a 160-wide content block with 48px side padding', () => {
    const src = lumaGrid(1000, 400, (x, y) => (x >= 100 && x < 900 && y >= 150 && y < 250 ? 255 : 0));
    const out = canonicalize(src, 256, 64);

    expect(out.width).toBe(256);
    expect(out.height).toBe(64);

    let white = 0;
    for (let y = 0; y < 64; y += 1) {
      for (let x = 0; x < 256; x += 1) {
        const v = out.data[y * 256 + x];
        const inside = x >= 64 && x <= 191 && y >= 24 && y <= 39;
        expect(v).toBe(inside ? 255 : 0);
        white += v === 255 ? 1 : 0;
      }
    }
    expect(white).toBe(16 * 128);
  });

  test('white padding columns never appear outside the content band', () => {
    const src = lumaGrid(1000, 400, () => 255);
    const out = canonicalize(src, 256, 64);
    for (let y = 0; y < 64; y += 1) {
      for (let x = 0; x < 256; x += 1) {
        expect(out.data[y * 256 + x]).toBe(x >= 48 && x < 208 ? 255 : 0);
      }
    }
  });

  test('any binary source becomes an exact 256x64 binary canvas', () => {
    const rand = mulberry32(99);
    const dims: [number, number][] = [
      [1, 1],
      [3, 500],
      [500, 3],
      [256, 64],
      [257, 65],
      [31, 17],
      [640, 480]
    ];

    for (const [w, h] of dims) {
      const out = canonicalize(lumaGrid(w, h, () => (rand() < 0.3 ? 255 : 0)), 256, 64);
      expect(out.width).toBe(256);
      expect(out.height).toBe(64);
      expect(out.data.length).toBe(256 * 64);
      expect(isBinary(out)).toBe(true);
    }
  });

  test('honours custom target sizes', () => {
    const out = canonicalize(lumaGrid(10, 10, () => 255), 32, 8);
    expect(out.width).toBe(32);
    expect(out.height).toBe(8);
    // 8x8 content centred at left 12
    expect(out.data[12]).toBe(255);
    expect(out.data[11]).toBe(0);
    expect(out.data[19]).toBe(255);
    expect(out.data[20]).toBe(0);
  });
});
