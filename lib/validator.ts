/**
 * Pre-flight checks deciding whether a photo looks like dark handwriting on
 * light paper. Checks run in a fixed order and the first failure wins.
 */

import type { PipelineConfig } from './config';
import { rejection, type FailureReason, type ValidationOutcome } from './errors';
import type { LumaGrid, RgbGrid } from './grid';
import { dLog } from './logger';
import { rgbToLuma } from './luma';
import { inkRatio, lumaMean, lumaRange, lumaVariance } from './metrics';

type Check = {
  reason: Exclude<FailureReason, 'DecodeFailure'>;
  passes: (luma: LumaGrid, config: PipelineConfig) => boolean;
};

const CHECKS: Check[] = [
  {
    reason: 'TooManyColors',
    passes: (luma, config) => lumaVariance(luma) <= config.maxColorVariance
  },
  {
    reason: 'LowContrast',
    passes: (luma, config) => {
      const { min, max } = lumaRange(luma);
      return max - min >= config.minContrast;
    }
  },
  {
    reason: 'InsufficientBrightness',
    passes: (luma, config) => {
      const mean = lumaMean(luma);
      return mean >= config.minBrightness && mean <= config.maxBrightness;
    }
  },
  {
    reason: 'InvalidBlackPixelRatio',
    passes: (luma, config) => {
      const ratio = inkRatio(luma, config.thresholdValue);
      return ratio >= config.minBlackRatio && ratio <= config.maxBlackRatio;
    }
  }
];

export function validateLuma(luma: LumaGrid, config: PipelineConfig): ValidationOutcome {
  for (const check of CHECKS) {
    if (!check.passes(luma, config)) {
      dLog('validate', `rejected: ${check.reason} (${luma.width}x${luma.height})`);
      return rejection(check.reason);
    }
  }
  return { accepted: true };
}

export function validate(rgb: RgbGrid, config: PipelineConfig): ValidationOutcome {
  return validateLuma(rgbToLuma(rgb), config);
}
