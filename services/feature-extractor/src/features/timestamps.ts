// Largest magnitude accepted by the Date constructor.
const MAX_EPOCH_MS = 8.64e15;

function toEpochSeconds(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!trimmed) {
      return null;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Converts an epoch-seconds value into an ISO-8601 UTC timestamp. Values that
 * are missing, non-numeric or outside the representable range resolve to
 * `fallback` instead of failing the record.
 */
export function normalizeEpoch(value: unknown, fallback: string): string {
  const seconds = toEpochSeconds(value);
  if (seconds === null) {
    return fallback;
  }
  const millis = seconds * 1000;
  if (Math.abs(millis) > MAX_EPOCH_MS) {
    return fallback;
  }
  return new Date(millis).toISOString();
}

/**
 * Kismet reports `0` for times it never recorded, so zero counts as absent.
 */
export function hasEpoch(value: unknown): boolean {
  if (value === undefined || value === null || value === '' || value === false) {
    return false;
  }
  return value !== 0 && value !== '0';
}
