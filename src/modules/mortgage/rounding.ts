/**
 * Rounding used for every monetary output.
 *
 * Half away from zero, applied to the binary value: roundCurrency(2.675)
 * is 2.67 because 2.675 is stored as 2.67499999...
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const rounded = Math.round(Math.abs(value) * factor) / factor;
  if (rounded === 0) return 0;
  return value < 0 ? -rounded : rounded;
}

export function roundCurrency(value: number): number {
  return roundTo(value, 2);
}
