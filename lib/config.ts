import { ConfigError } from './errors';
import { getEnvNumber, type Env } from './env';

export type PipelineConfig = Readonly<{
  /** Upper bound on population variance of luma. */
  maxColorVariance: number;
  /** Minimum spread between the darkest and brightest luma. */
  minContrast: number;
  minBrightness: number;
  maxBrightness: number;
  /** Accepted share of pixels at or below `thresholdValue`. */
  minBlackRatio: number;
  maxBlackRatio: number;
  thresholdValue: number;
  contrastFactor: number;
  targetWidth: number;
  targetHeight: number;
}>;

export const DEFAULT_CONFIG: PipelineConfig = Object.freeze({
  maxColorVariance: 5000,
  minContrast: 30,
  minBrightness: 50,
  maxBrightness: 240,
  minBlackRatio: 0.05,
  maxBlackRatio: 0.8,
  thresholdValue: 128,
  contrastFactor: 1.5,
  targetWidth: 256,
  targetHeight: 64
});

const ENV_KEYS: Record<keyof PipelineConfig, string> = {
  maxColorVariance: 'PREPROCESS_MAX_COLOR_VARIANCE',
  minContrast: 'PREPROCESS_MIN_CONTRAST',
  minBrightness: 'PREPROCESS_MIN_BRIGHTNESS',
  maxBrightness: 'PREPROCESS_MAX_BRIGHTNESS',
  minBlackRatio: 'PREPROCESS_MIN_BLACK_RATIO',
  maxBlackRatio: 'PREPROCESS_MAX_BLACK_RATIO',
  thresholdValue: 'PREPROCESS_THRESHOLD',
  contrastFactor: 'PREPROCESS_CONTRAST_FACTOR',
  targetWidth: 'PREPROCESS_TARGET_WIDTH',
  targetHeight: 'PREPROCESS_TARGET_HEIGHT'
};

export const CONFIG_KEYS: readonly (keyof PipelineConfig)[] = [
  'maxColorVariance',
  'minContrast',
  'minBrightness',
  'maxBrightness',
  'minBlackRatio',
  'maxBlackRatio',
  'thresholdValue',
  'contrastFactor',
  'targetWidth',
  'targetHeight'
];

function checkRange(name: keyof PipelineConfig, value: number, min: number, max: number) {
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new ConfigError(`${name} must be within [${min}, ${max}], got ${value}`);
  }
}

function checkInteger(name: keyof PipelineConfig, value: number, min: number) {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got ${value}`);
  }
}

function checkConfig(config: PipelineConfig) {
  checkRange('maxColorVariance', config.maxColorVariance, 0, 255 * 255);
  checkRange('minContrast', config.minContrast, 0, 255);
  checkRange('minBrightness', config.minBrightness, 0, 255);
  checkRange('maxBrightness', config.maxBrightness, 0, 255);
  checkRange('minBlackRatio', config.minBlackRatio, 0, 1);
  checkRange('maxBlackRatio', config.maxBlackRatio, 0, 1);
  checkRange('contrastFactor', config.contrastFactor, 0, 255);
  checkInteger('thresholdValue', config.thresholdValue, 0);
  checkRange('thresholdValue', config.thresholdValue, 0, 255);
  checkInteger('targetWidth', config.targetWidth, 1);
  checkInteger('targetHeight', config.targetHeight, 1);

  if (config.minBrightness > config.maxBrightness) {
    throw new ConfigError('minBrightness must not exceed maxBrightness');
  }
  if (config.minBlackRatio > config.maxBlackRatio) {
    throw new ConfigError('minBlackRatio must not exceed maxBlackRatio');
  }
}

/**
 * Merge overrides onto `base` and freeze the result.
 * Keys explicitly set to `undefined` keep the base value.
 */
export function resolveConfig(
  overrides: Partial<PipelineConfig> = {},
  base: PipelineConfig = DEFAULT_CONFIG
): PipelineConfig {
  const merged: Record<keyof PipelineConfig, number> = { ...base };
  for (const key of CONFIG_KEYS) {
    const value = overrides[key];
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  checkConfig(merged);
  return Object.freeze(merged);
}

/**
 * Load overrides from PREPROCESS_* environment variables.
 * Unset or non-numeric values fall back to the defaults.
 */
export function loadConfigFromEnv(env: Env = process.env): PipelineConfig {
  const overrides: Partial<Record<keyof PipelineConfig, number>> = {};
  for (const key of CONFIG_KEYS) {
    const value = getEnvNumber(ENV_KEYS[key], env);
    if (value !== undefined) {
      overrides[key] = value;
    }
  }
  return resolveConfig(overrides);
}
