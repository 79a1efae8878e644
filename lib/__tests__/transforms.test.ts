import { describe, expect, test } from 'vitest';
import { isBinary, type LumaGrid } from '../grid';
import { lumaVariance } from '../metrics';
import { applyThreshold, enhanceContrast, invert } from '../transforms';
import { lumaGrid, mulberry32 } from './fixtures';

function row(values: number[]): LumaGrid {
  return { width: values.length, height: 1, data: new Uint8Array(values) };
}

function randomGrid(seed: number, width: number, height: number, min: number, max: number): LumaGrid {
  const rand = mulberry32(seed);
  return lumaGrid(width, height, () => min + Math.floor(rand() * (max - min + 1)));
}

describe('enhanceContrast', () => {
  test('stretches around 128 with rounding and clamping', () => {
    const out = enhanceContrast(row([0, 100, 127, 128, 129, 200, 255]), 1.5);
    expect(Array.from(out.data)).toEqual([0, 86, 127, 128, 130, 236, 255]);
  });

  test('factor 1 is the identity', () => {
    const src = randomGrid(3, 16, 16, 0, 255);
    expect(Array.from(enhanceContrast(src, 1).data)).toEqual(Array.from(src.data));
  });

  test('zero-variance grids stay zero-variance', () => {
    const out = enhanceContrast(lumaGrid(8, 8, () => 90), 1.5);
    expect(lumaVariance(out)).toBe(0);
    expect(out.data[0]).toBe(71);
  });

  test('never lowers the spread of unsaturated grids', () => {
    for (let seed = 1; seed <= 20; seed += 1) {
      const src = randomGrid(seed, 24, 24, 64, 192);
      const before = Math.sqrt(lumaVariance(src));
      const after = Math.sqrt(lumaVariance(enhanceContrast(src, 1.5)));
      expect(after).toBeGreaterThanOrEqual(before);
    }
  });

  test('strictly raises the spread when samples leave the midpoint', () => {
    const src = row([100, 128, 156]);
    expect(lumaVariance(enhanceContrast(src, 1.5))).toBeGreaterThan(lumaVariance(src));
  });

  test('returns a new grid', () => {
    const src = row([100, 200]);
    const out = enhanceContrast(src, 1.5);
    expect(out.data).not.toBe(src.data);
    expect(Array.from(src.data)).toEqual([100, 200]);
  });
});

describe('applyThreshold', () => {
  test('only values strictly above the threshold become white', () => {
    const out = applyThreshold(row([0, 127, 128, 129, 255]), 128);
    expect(Array.from(out.data)).toEqual([0, 0, 0, 255, 255]);
  });

  test('output is two-level for every input value', () => {
    const out = applyThreshold(lumaGrid(16, 16, (x, y) => y * 16 + x), 128);
    expect(isBinary(out)).toBe(true);
  });
});

describe('invert', () => {
  test('maps v to 255 - v', () => {
    expect(Array.from(invert(row([0, 1, 128, 254, 255])).data)).toEqual([255, 254, 127, 1, 0]);
  });

  test('twice on a 50x50 binary grid reproduces it bit-for-bit', () => {
    const rand = mulberry32(50);
    const src = lumaGrid(50, 50, () => (rand() < 0.5 ? 0 : 255));
    const twice = invert(invert(src));
    expect(twice.width).toBe(50);
    expect(twice.height).toBe(50);
    expect(Array.from(twice.data)).toEqual(Array.from(src.data));
  });

  test('is an involution on arbitrary values too', () => {
    const src = randomGrid(11, 20, 20, 0, 255);
    expect(Array.from(invert(invert(src)).data)).toEqual(Array.from(src.data));
  });
});
