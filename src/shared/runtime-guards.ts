export function parseNonNegativeSafeInteger(value: unknown): number | null {
  if (typeof value !== 'number') {
    return null;
  }

  if (!Number.isSafeInteger(value) || value < 0) {
    return null;
  }

  return Math.trunc(value);
}

export function parsePositiveSafeInteger(value: unknown): number | null {
  const parsed = parseNonNegativeSafeInteger(value);

  if (parsed === null || parsed === 0) {
    return null;
  }

  return parsed;
}
