/**
 * Clamp `value` into [inMin, inMax] and rescale it linearly onto
 * [outMin, outMax]. A degenerate input range always yields `outMin`.
 * The operation order is fixed so results are reproducible to the last bit.
 */
export function mapToScore(value: number, inMin: number, inMax: number, outMin: number, outMax: number): number {
  if (inMax === inMin) {
    return outMin;
  }
  const clamped = Math.min(Math.max(value, inMin), inMax);
  return outMin + ((clamped - inMin) * (outMax - outMin)) / (inMax - inMin);
}

/** Round to the nearest integer, ties to even. */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff < 0.5) {
    return floor;
  }
  if (diff > 0.5) {
    return floor + 1;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Format with one decimal place, breaking exact ties to even.
 * `toFixed` alone rounds exact ties away from zero (2.25 -> "2.3").
 */
export function formatOneDecimal(value: number): string {
  const rounded = value.toFixed(1);
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return rounded;
  }

  const exact = value.toFixed(100);
  const point = exact.indexOf(".");
  const tenths = exact.charAt(point + 1);
  const rest = exact.slice(point + 2);
  const isTie = rest.charAt(0) === "5" && /^0*$/.test(rest.slice(1));
  if (isTie && Number(tenths) % 2 === 0) {
    return exact.slice(0, point + 2);
  }
  return rounded;
}
