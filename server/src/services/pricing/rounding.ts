/** Display rounding; half-up for the positive amounts the engine produces */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/** Dollars -> integer cents */
export function toCents(dollars: number): number {
  return Math.round(dollars * 100);
}
