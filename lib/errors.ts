export type FailureReason =
  | 'TooManyColors'
  | 'LowContrast'
  | 'InsufficientBrightness'
  | 'InvalidBlackPixelRatio'
  | 'DecodeFailure';

export const FAILURE_MESSAGES: Record<FailureReason, string> = {
  TooManyColors: 'Image has too many colors. Please use white paper with dark handwriting only.',
  LowContrast: 'Image has low contrast. Ensure good lighting and dark handwriting.',
  InsufficientBrightness: 'Image brightness is unsuitable. Ensure proper lighting without overexposure.',
  InvalidBlackPixelRatio: 'Image content ratio is unsuitable. Ensure handwriting fills frame appropriately.',
  DecodeFailure: 'Unable to decode image. Please select a valid image file.'
};

export const FAILURE_REASONS: readonly FailureReason[] = [
  'TooManyColors',
  'LowContrast',
  'InsufficientBrightness',
  'InvalidBlackPixelRatio',
  'DecodeFailure'
];

export function toFailureReason(value: unknown): FailureReason | undefined {
  return FAILURE_REASONS.find((reason) => reason === value);
}

export type ValidationOutcome =
  | { accepted: true }
  | { accepted: false; reason: FailureReason; message: string };

export type Rejection = Extract<ValidationOutcome, { accepted: false }>;

export type PipelineError =
  | { kind: 'decode'; reason: 'DecodeFailure'; message: string }
  | { kind: 'validation'; outcome: Rejection }
  | { kind: 'internal'; message: string };

export function rejection(reason: FailureReason): Rejection {
  return { accepted: false, reason, message: FAILURE_MESSAGES[reason] };
}

/** A grid broke a shape or value guarantee that the pipeline relies on. */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

export class DecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecodeError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
