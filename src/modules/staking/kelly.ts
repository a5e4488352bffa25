/**
 * Fractional Kelly for a binary outcome at decimal odds.
 *   f* = (p·b − (1 − p)) / b,  b = odds − 1
 * Returns 0 for invalid inputs or a non-positive edge.
 */
export function kellyFraction(p: number, odds: number): number {
  if (!Number.isFinite(p) || !Number.isFinite(odds) || p <= 0 || p >= 1 || odds <= 1) {
    return 0;
  }
  const b = odds - 1;
  const f = (p * b - (1 - p)) / b;
  return f > 0 ? f : 0;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function decimalsOf(increment: number): number {
  const text = String(increment);
  const exp = text.match(/e-(\d+)$/);
  if (exp) return Number(exp[1]);
  const dot = text.indexOf('.');
  return dot < 0 ? 0 : text.length - dot - 1;
}

/** Round down to a whole number of increments; never up */
export function floorToIncrement(value: number, increment: number): number {
  if (!(value > 0)) return 0;
  const units = Math.floor(value / increment + 1e-9);
  const floored = Number((units * increment).toFixed(decimalsOf(increment)));
  // Epsilon above must not push the result past the input
  return floored > value + 1e-9 ? Number(((units - 1) * increment).toFixed(decimalsOf(increment))) : floored;
}
