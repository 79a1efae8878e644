/**
 * Tagged console logging for the preprocessing pipeline.
 *
 * PREPROCESS_QUIET=1 mutes pLog summaries.
 * PREPROCESS_DEBUG=1 enables dLog per-step diagnostics.
 * eLog always writes.
 */

import { getEnvBoolean } from './env';

function isQuiet() {
  return getEnvBoolean('PREPROCESS_QUIET');
}

function isDebug() {
  return getEnvBoolean('PREPROCESS_DEBUG');
}

export function pLog(tag: string, ...args: unknown[]) {
  if (!isQuiet()) {
    console.log(`[${tag}]`, ...args);
  }
}

export function dLog(tag: string, ...args: unknown[]) {
  if (isDebug()) {
    console.log(`[${tag}]`, ...args);
  }
}

export function eLog(tag: string, ...args: unknown[]) {
  console.error(`[${tag}]`, ...args);
}
