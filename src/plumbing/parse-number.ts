/**
 * Parse a whole number from an environment value.
 * Returns fallback for empty, non-numeric, fractional, or non-finite values.
 */
export const parseInteger = (
  value: string | undefined,
  fallback: number,
): number => {
  const trimmed = value?.trim()
  if (!trimmed) {
    return fallback
  }

  const parsed = Number(trimmed)
  if (!Number.isInteger(parsed)) {
    return fallback
  }

  return parsed
}
