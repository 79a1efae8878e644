import os from 'node:os';
import { Worker } from 'node:worker_threads';
import { parseAnalysisReply, type AnalysisReply, type AnalysisTask } from './analyze';
import { decodeRaster, encodePng } from './codec';
import { fitInside, type Placement } from './canonicalize';
import { DEFAULT_CONFIG, type PipelineConfig } from './config';
import { getEnvNumber } from './env';
import {
  DecodeError,
  FAILURE_MESSAGES,
  InvariantViolationError,
  type PipelineError,
  type ValidationOutcome
} from './errors';
import type { Raster } from './grid';
import { dLog, eLog, pLog } from './logger';
import { WorkerPool } from './workerPool';

export type PreprocessMetrics = {
  sourceWidth: number;
  sourceHeight: number;
  placement: Placement;
  whiteRatio: number;
};

export type PreprocessResult = {
  png: Buffer;
  width: number;
  height: number;
  metrics: PreprocessMetrics;
};

export type PipelineResult = { ok: true; value: PreprocessResult } | { ok: false; error: PipelineError };

type DecodeAttempt = { ok: true; raster: Raster } | { ok: false; error: Extract<PipelineError, { kind: 'decode' }> };

let pool: WorkerPool<AnalysisTask, AnalysisReply> | undefined;

function defaultPoolSize() {
  return Math.max(1, Math.min(4, os.availableParallelism() - 1));
}

/**
 * Validation and the per-pixel transform run on worker threads so a large
 * photo never stalls the event loop. Workers preload tsx so the entry can
 * stay TypeScript.
 */
function analysisPool() {
  if (!pool) {
    pool = new WorkerPool<AnalysisTask, AnalysisReply>({
      size: getEnvNumber('PREPROCESS_WORKERS') ?? defaultPoolSize(),
      spawn: () =>
        new Worker(new URL('./preprocess.worker.ts', import.meta.url), {
          execArgv: ['--import', 'tsx']
        }),
      parseReply: parseAnalysisReply
    });
  }
  return pool;
}

/** Terminates the analysis workers. The next call starts a fresh pool. */
export async function closePipelineWorkers() {
  const current = pool;
  pool = undefined;
  await current?.close();
}

async function tryDecode(input: Uint8Array): Promise<DecodeAttempt> {
  try {
    return { ok: true, raster: await decodeRaster(input) };
  } catch (error) {
    if (!(error instanceof DecodeError)) {
      throw error;
    }
    dLog('preprocess', 'decode failed:', error.cause ?? error.message);
    return {
      ok: false,
      error: { kind: 'decode', reason: 'DecodeFailure', message: FAILURE_MESSAGES.DecodeFailure }
    };
  }
}

/** Decode and run the pre-flight checks only. */
export async function validateImage(
  input: Uint8Array,
  config: PipelineConfig = DEFAULT_CONFIG
): Promise<ValidationOutcome> {
  const decoded = await tryDecode(input);
  if (!decoded.ok) {
    return { accepted: false, reason: decoded.error.reason, message: decoded.error.message };
  }

  const reply = await analysisPool().run({ mode: 'validate', raster: decoded.raster, config });
  if (reply.status === 'rejected') {
    return reply.outcome;
  }
  if (reply.status === 'internal') {
    throw new InvariantViolationError(reply.message);
  }
  return { accepted: true };
}

/**
 * Full preprocessing: decode, validate, transform to the canonical grid and
 * encode as PNG. Rejections come back as values; nothing is retried.
 */
export async function preprocessImage(
  input: Uint8Array,
  config: PipelineConfig = DEFAULT_CONFIG
): Promise<PipelineResult> {
  const decoded = await tryDecode(input);
  if (!decoded.ok) {
    pLog('preprocess', 'rejected: DecodeFailure');
    return { ok: false, error: decoded.error };
  }

  const { raster } = decoded;
  const reply = await analysisPool().run({ mode: 'preprocess', raster, config });

  if (reply.status === 'rejected') {
    pLog('preprocess', `rejected: ${reply.outcome.reason}`);
    return { ok: false, error: { kind: 'validation', outcome: reply.outcome } };
  }
  if (reply.status !== 'transformed') {
    const message = reply.status === 'internal' ? reply.message : 'Analysis skipped the transform';
    eLog('preprocess', 'invariant violation:', message);
    return { ok: false, error: { kind: 'internal', message } };
  }

  const { canonical } = reply;
  const placement = fitInside(raster.width, raster.height, config.targetWidth, config.targetHeight);
  const png = await encodePng(canonical);
  const metrics: PreprocessMetrics = {
    sourceWidth: raster.width,
    sourceHeight: raster.height,
    placement,
    whiteRatio: reply.whiteRatio
  };

  pLog(
    'preprocess',
    `accepted ${raster.width}x${raster.height} -> ${canonical.width}x${canonical.height}`,
    `content ${placement.width}x${placement.height} @ ${placement.left},${placement.top}`
  );

  return {
    ok: true,
    value: {
      png,
      width: canonical.width,
      height: canonical.height,
      metrics
    }
  };
}
