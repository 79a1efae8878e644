import { InvariantViolationError } from './errors';

/** Row-major, 3 interleaved channels per pixel. */
export type RgbGrid = {
  width: number;
  height: number;
  data: Uint8Array;
};

/** Row-major, 1 channel per pixel. */
export type LumaGrid = {
  width: number;
  height: number;
  data: Uint8Array;
};

export function clampByte(v: number) {
  if (v < 0) return 0;
  if (v > 255) return 255;
  return v;
}

export function createLumaGrid(width: number, height: number, fill = 0): LumaGrid {
  assertDimensions(width, height);
  return { width, height, data: new Uint8Array(width * height).fill(fill) };
}

export function assertDimensions(width: number, height: number) {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new InvariantViolationError(`Grid dimensions must be positive integers, got ${width}x${height}`);
  }
}

export function assertRgbGrid(grid: RgbGrid) {
  assertDimensions(grid.width, grid.height);
  if (grid.data.length !== grid.width * grid.height * 3) {
    throw new InvariantViolationError(
      `RGB grid ${grid.width}x${grid.height} needs ${grid.width * grid.height * 3} bytes, got ${grid.data.length}`
    );
  }
}

export function assertLumaGrid(grid: LumaGrid) {
  assertDimensions(grid.width, grid.height);
  if (grid.data.length !== grid.width * grid.height) {
    throw new InvariantViolationError(
      `Luma grid ${grid.width}x${grid.height} needs ${grid.width * grid.height} bytes, got ${grid.data.length}`
    );
  }
}

export function isBinary(grid: LumaGrid) {
  for (let i = 0; i < grid.data.length; i += 1) {
    const v = grid.data[i];
    if (v !== 0 && v !== 255) {
      return false;
    }
  }
  return true;
}

/** Throws unless `grid` is exactly `width`x`height` and two-level. */
export function assertCanonical(grid: LumaGrid, width: number, height: number) {
  assertLumaGrid(grid);
  if (grid.width !== width || grid.height !== height) {
    throw new InvariantViolationError(
      `Canonical image must be ${width}x${height}, got ${grid.width}x${grid.height}`
    );
  }
  if (!isBinary(grid)) {
    throw new InvariantViolationError('Canonical image contains values other than 0 and 255');
  }
}

/** Decoded pixels as they come out of the codec: any channel count, row-major. */
export type Raster = {
  width: number;
  height: number;
  channels: number;
  data: Uint8Array;
};

/**
 * Pack a raster into three channels. Alpha is dropped without compositing;
 * one- and two-channel (grey, grey+alpha) sources are replicated.
 */
export function rasterToRgb(raster: Raster): RgbGrid {
  const { width, height, channels, data } = raster;
  assertDimensions(width, height);
  const total = width * height;
  if (!Number.isInteger(channels) || channels < 1 || data.length < total * channels) {
    throw new InvariantViolationError(
      `Raster ${width}x${height}x${channels} needs ${total * channels} bytes, got ${data.length}`
    );
  }

  const rgb = new Uint8Array(total * 3);
  const grey = channels < 3;

  for (let i = 0; i < total; i += 1) {
    const src = i * channels;
    const dst = i * 3;
    if (grey) {
      rgb[dst] = data[src];
      rgb[dst + 1] = data[src];
      rgb[dst + 2] = data[src];
    } else {
      rgb[dst] = data[src];
      rgb[dst + 1] = data[src + 1];
      rgb[dst + 2] = data[src + 2];
    }
  }

  return { width, height, data: rgb };
}
