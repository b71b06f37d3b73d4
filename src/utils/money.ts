/**
 * Converts a major-unit price (19.99) to integer minor units (1999), rounding
 * half away from zero. The scaled value is first fixed to 6 decimals so that
 * binary artifacts round the way the decimal price would:
 * 1.005 * 100 === 100.49999999999999 still becomes 101.
 */
export function toMinorUnits(amount: number): number {
  if (!Number.isFinite(amount)) {
    throw new RangeError(`Cannot convert non-finite amount: ${amount}`);
  }

  const scaled = Number((Math.abs(amount) * 100).toFixed(6));
  const rounded = Math.round(scaled);

  return amount < 0 && rounded !== 0 ? -rounded : rounded;
}
