/**
 * Round to two decimals, halves away from zero so that signed values
 * round symmetrically (-1.125 → -1.13, 1.125 → 1.13).
 */
export function round2(value: number): number {
  return (Math.sign(value) * Math.round(Math.abs(value) * 100)) / 100;
}
