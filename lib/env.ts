export type Env = Record<string, string | undefined>;

export function getEnvBoolean(key: string, defaultValue = false, env: Env = process.env): boolean {
  const raw = env[key];
  if (raw === undefined || raw === '') {
    return defaultValue;
  }

  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;

  return defaultValue;
}

/** Returns `undefined` for unset, blank or non-numeric values. */
export function getEnvNumber(key: string, env: Env = process.env): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }

  const value = Number(raw.trim());
  return Number.isFinite(value) ? value : undefined;
}
