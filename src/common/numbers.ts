/** Half-away-from-zero rounding for presentation and currency amounts */
export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value)) return value;
  const factor = 10 ** decimals;
  return (Math.sign(value) * Math.round(Math.abs(value) * factor + 1e-9)) / factor;
}

export function sum(values: number[]): number {
  return values.reduce((s, v) => s + v, 0);
}
