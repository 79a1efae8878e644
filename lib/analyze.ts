/**
 * The CPU-bound middle of the pipeline: luma projection, validation and the
 * canonical transform. Pure and free of native modules so it can run inside
 * a worker thread; `preprocess.worker.ts` is its only production caller.
 */

import { canonicalize } from './canonicalize';
import { CONFIG_KEYS, resolveConfig, type PipelineConfig } from './config';
import { InvariantViolationError, rejection, toFailureReason, type Rejection } from './errors';
import { assertCanonical, assertLumaGrid, rasterToRgb, type LumaGrid, type Raster } from './grid';
import { dLog } from './logger';
import { rgbToLuma } from './luma';
import { computeLumaStats, whiteRatio } from './metrics';
import { applyThreshold, enhanceContrast, invert } from './transforms';
import { validateLuma } from './validator';

export type AnalysisMode = 'validate' | 'preprocess';

export type AnalysisTask = {
  mode: AnalysisMode;
  raster: Raster;
  config: PipelineConfig;
};

export type AnalysisReply =
  | { status: 'rejected'; outcome: Rejection }
  | { status: 'validated' }
  | { status: 'transformed'; canonical: LumaGrid; whiteRatio: number }
  | { status: 'internal'; message: string };

/**
 * Contrast stretch, binarize, flip polarity, then fit onto the target canvas.
 * Dark strokes on light paper come out as white strokes on black.
 */
export function transformLuma(luma: LumaGrid, config: PipelineConfig): LumaGrid {
  const enhanced = enhanceContrast(luma, config.contrastFactor);
  const binary = applyThreshold(enhanced, config.thresholdValue);
  const inverted = invert(binary);
  return canonicalize(inverted, config.targetWidth, config.targetHeight);
}

export function analyzeRaster(task: AnalysisTask): AnalysisReply {
  const { mode, raster, config } = task;

  try {
    const luma = rgbToLuma(rasterToRgb(raster));
    dLog('analyze', `source ${luma.width}x${luma.height}`, computeLumaStats(luma, config.thresholdValue));

    const outcome = validateLuma(luma, config);
    if (!outcome.accepted) {
      return { status: 'rejected', outcome };
    }
    if (mode === 'validate') {
      return { status: 'validated' };
    }

    const canonical = transformLuma(luma, config);
    assertCanonical(canonical, config.targetWidth, config.targetHeight);
    return { status: 'transformed', canonical, whiteRatio: whiteRatio(canonical) };
  } catch (error) {
    if (!(error instanceof InvariantViolationError)) {
      throw error;
    }
    return { status: 'internal', message: error.message };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readNumber(record: Record<string, unknown>, key: string) {
  const value = record[key];
  if (typeof value !== 'number') {
    throw new TypeError(`Expected a number at "${key}"`);
  }
  return value;
}

function readBytes(record: Record<string, unknown>, key: string) {
  const value = record[key];
  if (!(value instanceof Uint8Array)) {
    throw new TypeError(`Expected bytes at "${key}"`);
  }
  return value;
}

function parseConfig(value: unknown): PipelineConfig {
  if (!isRecord(value)) {
    throw new TypeError('Expected a pipeline config');
  }
  const fields: Partial<Record<keyof PipelineConfig, number>> = {};
  for (const key of CONFIG_KEYS) {
    fields[key] = readNumber(value, key);
  }
  return resolveConfig(fields);
}

/** Rebuilds a task from a structured-clone message. */
export function parseAnalysisTask(value: unknown): AnalysisTask {
  if (!isRecord(value) || !isRecord(value.raster)) {
    throw new TypeError('Expected an analysis task');
  }
  const mode = value.mode;
  if (mode !== 'validate' && mode !== 'preprocess') {
    throw new TypeError(`Unknown analysis mode ${String(mode)}`);
  }

  const raster: Raster = {
    width: readNumber(value.raster, 'width'),
    height: readNumber(value.raster, 'height'),
    channels: readNumber(value.raster, 'channels'),
    data: readBytes(value.raster, 'data')
  };

  return { mode, raster, config: parseConfig(value.config) };
}

export function parseAnalysisReply(value: unknown): AnalysisReply {
  if (!isRecord(value)) {
    throw new TypeError('Expected an analysis reply');
  }

  switch (value.status) {
    case 'rejected': {
      const reason = isRecord(value.outcome) ? toFailureReason(value.outcome.reason) : undefined;
      if (!reason) {
        throw new TypeError('Rejected reply carries no known reason');
      }
      return { status: 'rejected', outcome: rejection(reason) };
    }
    case 'validated':
      return { status: 'validated' };
    case 'transformed': {
      if (!isRecord(value.canonical)) {
        throw new TypeError('Transformed reply carries no grid');
      }
      const canonical: LumaGrid = {
        width: readNumber(value.canonical, 'width'),
        height: readNumber(value.canonical, 'height'),
        data: readBytes(value.canonical, 'data')
      };
      assertLumaGrid(canonical);
      return { status: 'transformed', canonical, whiteRatio: readNumber(value, 'whiteRatio') };
    }
    case 'internal':
      return { status: 'internal', message: String(value.message) };
    default:
      throw new TypeError(`Unknown analysis reply status ${String(value.status)}`);
  }
}
