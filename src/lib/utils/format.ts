/**
 * Format a signed number with a fixed number of decimals (e.g. z-score gaps)
 */
export function formatFixed(value: number, decimals: number = 1): string {
  return value.toFixed(decimals)
}

