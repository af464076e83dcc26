/**
 * math — Angle and polynomial utilities shared by the position engines.
 *
 * All computation in this module is pure (no I/O, no state).
 */

// ─── Angle utilities ─────────────────────────────────────────────────────────

/** Convert degrees to radians */
export const DEG2RAD = Math.PI / 180

/**
 * Normalize an angle in degrees to [0, 360).
 *
 * Values already in range come back bit-for-bit unchanged, so normalizing
 * twice is the same as normalizing once. A tiny negative input whose
 * sum with 360 rounds up to 360 maps to 0, and -0 maps to +0.
 */
export function mod360(deg: number): number {
  let r = deg % 360
  if (r < 0) r += 360
  return r >= 360 ? 0 : r + 0
}

/** Sine of an angle given in degrees */
export function sinDeg(deg: number): number {
  return Math.sin(deg * DEG2RAD)
}

// ─── Polynomials ─────────────────────────────────────────────────────────────

/**
 * Evaluate c[0] + c[1]·x + c[2]·x² + … in Horner form.
 *
 * Every secular polynomial in the engine goes through here so that the
 * operation order, and with it the rounding, is the same on every run.
 */
export function horner(coeffs: readonly number[], x: number): number {
  let acc = 0
  for (let k = coeffs.length - 1; k >= 0; k--) {
    acc = acc * x + coeffs[k]
  }
  return acc
}
