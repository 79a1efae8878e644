import type { LumaGrid } from './grid';

export type LumaStats = {
  mean: number;
  /** Population variance. */
  variance: number;
  min: number;
  max: number;
  /** Share of pixels at or below the ink threshold. */
  inkRatio: number;
};

export function lumaMean(grid: LumaGrid) {
  const total = grid.data.length;
  let sum = 0;
  for (let i = 0; i < total; i += 1) {
    sum += grid.data[i];
  }
  return total > 0 ? sum / total : 0;
}

export function lumaVariance(grid: LumaGrid) {
  const total = grid.data.length;
  if (total === 0) {
    return 0;
  }

  const mean = lumaMean(grid);
  let acc = 0;
  for (let i = 0; i < total; i += 1) {
    const diff = grid.data[i] - mean;
    acc += diff * diff;
  }
  return acc / total;
}

export function lumaRange(grid: LumaGrid) {
  let min = 255;
  let max = 0;
  for (let i = 0; i < grid.data.length; i += 1) {
    const v = grid.data[i];
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return { min, max };
}

export function inkRatio(grid: LumaGrid, threshold: number) {
  const total = grid.data.length;
  let ink = 0;
  for (let i = 0; i < total; i += 1) {
    ink += grid.data[i] <= threshold ? 1 : 0;
  }
  return total > 0 ? ink / total : 0;
}

export function whiteRatio(grid: LumaGrid) {
  const total = grid.data.length;
  let white = 0;
  for (let i = 0; i < total; i += 1) {
    white += grid.data[i] === 255 ? 1 : 0;
  }
  return total > 0 ? white / total : 0;
}

export function computeLumaStats(grid: LumaGrid, inkThreshold: number): LumaStats {
  const { min, max } = lumaRange(grid);
  return {
    mean: lumaMean(grid),
    variance: lumaVariance(grid),
    min,
    max,
    inkRatio: inkRatio(grid, inkThreshold)
  };
}
