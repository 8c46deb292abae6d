/**
 * Decimal rounding with ties away from zero.
 *
 * Shifts through the exponent notation instead of multiplying, so values
 * such as 1.005 or 2.675 round on their decimal representation rather than
 * on the nearest binary double.
 */
export function roundHalfAwayFromZero(value: number, decimals: number): number {
  if (!Number.isFinite(value)) {
    return value;
  }

  const shifted = Math.round(shiftExponent(Math.abs(value), decimals));
  const magnitude = shiftExponent(shifted, -decimals);

  if (magnitude === 0) return 0;
  return value < 0 ? -magnitude : magnitude;
}

function shiftExponent(value: number, places: number): number {
  const [mantissa, exponent = '0'] = value.toString().split('e');
  return Number(`${mantissa}e${Number(exponent) + places}`);
}

/**
 * Share of `part` in `whole` as a percentage, or null for an empty whole
 */
export function percentage(
  part: number,
  whole: number,
  decimals: number,
): number | null {
  if (whole === 0) {
    return null;
  }
  return roundHalfAwayFromZero((part * 100) / whole, decimals);
}
