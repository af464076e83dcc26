/**
 * bodies — Truncated solar and lunar theories for geocentric ecliptic longitude.
 *
 * Both engines take T (Julian centuries from J2000.0) and return the apparent
 * tropical longitude, normalized to [0, 360). They share no state and can be
 * evaluated in any order.
 *
 * Sun: mean longitude and mean anomaly plus a three-term equation of centre
 * (Meeus ch. 25). Error < 0.01°.
 *
 * Moon: the 30 largest ELP-2000/82 longitude terms of Meeus table 47.A plus
 * the three additive terms. Error ~ 0.01° over the supported span, a few
 * minutes of time at a Tithi or Nakshatra boundary.
 *
 * Every periodic series is summed from the smallest amplitude to the largest,
 * and every polynomial is evaluated in Horner form, so results are
 * reproducible bit-for-bit on any IEEE-754 platform with the same libm.
 *
 * References:
 *   Meeus, J. (1998). Astronomical Algorithms, 2nd ed. Willmann-Bell.
 *   Chapront-Touzé, M., Chapront, J. (1983). The lunar ephemeris ELP 2000.
 *     Astronomy & Astrophysics, 124, 50-62.
 */

import type { TropicalLongitude } from '../types.js'
import { horner, mod360, sinDeg } from '../math/index.js'

// ─── Shared arguments ─────────────────────────────────────────────────────────

/** Longitude of the Moon's mean ascending node Ω (Meeus eq. 22.1), degrees */
export function meanLunarNode(T: number): number {
  return horner([125.04452, -1934.136261, 0.0020708, 1 / 450000], T)
}

/**
 * Nutation in longitude Δψ, leading term only, degrees.
 * The full value differs by at most ~1.3″ (the 2L term), absorbed by the
 * matching term in the ayanamsa.
 */
export function nutationInLongitude(T: number): number {
  return -0.00478 * sinDeg(meanLunarNode(T))
}

// ─── Sun ──────────────────────────────────────────────────────────────────────

/** Sun's geometric mean longitude L0, degrees (not normalized) */
export function sunMeanLongitude(T: number): number {
  return horner([280.46646, 36000.76983, 0.0003032], T)
}

/** Sun's mean anomaly M, degrees (not normalized) */
export function sunMeanAnomaly(T: number): number {
  return horner([357.52911, 35999.05029, -0.0001537], T)
}

/** One harmonic of the equation of centre: amplitude(T) · sin(multiplier · M) */
interface SolarTerm {
  multiplier: number
  /** Amplitude polynomial in T, degrees */
  amplitude: readonly number[]
}

/** Equation of centre, largest harmonic first */
export const SOLAR_TERMS: readonly SolarTerm[] = [
  { multiplier: 1, amplitude: [1.914602, -0.004817, -0.000014] },
  { multiplier: 2, amplitude: [0.019993, -0.000101] },
  { multiplier: 3, amplitude: [0.000289] },
]

/** Annual aberration for a circular orbit, degrees */
const SOLAR_ABERRATION = -0.00569

/** Equation of centre C, degrees */
export function sunEquationOfCenter(T: number): number {
  const M = sunMeanAnomaly(T)
  let C = 0
  for (let i = SOLAR_TERMS.length - 1; i >= 0; i--) {
    const term = SOLAR_TERMS[i]
    C += horner(term.amplitude, T) * sinDeg(term.multiplier * M)
  }
  return C
}

/**
 * Apparent geocentric tropical longitude of the Sun.
 *
 * @param T - Julian centuries from J2000.0
 */
export function sunTropicalLongitude(T: number): TropicalLongitude {
  const trueLongitude = sunMeanLongitude(T) + sunEquationOfCenter(T)
  const apparent = trueLongitude + SOLAR_ABERRATION + nutationInLongitude(T)
  return { frame: 'tropical', degrees: mod360(apparent) }
}

// ─── Moon ─────────────────────────────────────────────────────────────────────

/** Fundamental arguments of the lunar theory, degrees (not normalized) */
export interface LunarArguments {
  /** Moon's mean longitude L′ */
  Lp: number
  /** Mean elongation of the Moon from the Sun */
  D: number
  /** Sun's mean anomaly */
  M: number
  /** Moon's mean anomaly M′ */
  Mp: number
  /** Moon's argument of latitude */
  F: number
  /** Eccentricity factor of the Earth's orbit (dimensionless) */
  E: number
}

/** Meeus eq. 47.1-47.6 */
export function lunarArguments(T: number): LunarArguments {
  return {
    Lp: horner([218.3164477, 481267.88123421, -0.0015786, 1 / 538841, -1 / 65194000], T),
    D:  horner([297.8501921, 445267.1114034, -0.0018819, 1 / 545868, -1 / 113065000], T),
    M:  horner([357.5291092, 35999.0502909, -0.0001536, 1 / 24490000], T),
    Mp: horner([134.9633964, 477198.8675055, 0.0087414, 1 / 69699, -1 / 14712000], T),
    F:  horner([93.272095, 483202.0175233, -0.0036539, -1 / 3526000, 1 / 863310000], T),
    E:  horner([1, -0.002516, -0.0000074], T),
  }
}

/**
 * Periodic longitude terms, Meeus table 47.A, largest first.
 * [d, m, mp, f, Σl coefficient in 0.000001°]
 *
 * The leading rows are the classical inequalities: equation of centre
 * (0,0,1,0), evection (2,0,-1,0), variation (2,0,0,0), second equation of
 * centre (0,0,2,0), annual equation (0,1,0,0), reduction to the ecliptic
 * (0,0,0,2) and parallactic inequality (1,0,0,0).
 */
export const LUNAR_LONGITUDE_TERMS: ReadonlyArray<readonly [number, number, number, number, number]> = [
  [ 0, 0, 1, 0,  6288774],
  [ 2, 0,-1, 0,  1274027],
  [ 2, 0, 0, 0,   658314],
  [ 0, 0, 2, 0,   213618],
  [ 0, 1, 0, 0,  -185116],
  [ 0, 0, 0, 2,  -114332],
  [ 2, 0,-2, 0,    58793],
  [ 2,-1,-1, 0,    57066],
  [ 2, 0, 1, 0,    53322],
  [ 2,-1, 0, 0,    45758],
  [ 0, 1,-1, 0,   -40923],
  [ 1, 0, 0, 0,   -34720],
  [ 0, 1, 1, 0,   -30383],
  [ 2, 0, 0,-2,    15327],
  [ 0, 0, 1, 2,   -12528],
  [ 0, 0, 1,-2,    10980],
  [ 4, 0,-1, 0,    10675],
  [ 0, 0, 3, 0,    10034],
  [ 4, 0,-2, 0,     8548],
  [ 2, 1,-1, 0,    -7888],
  [ 2, 1, 0, 0,    -6766],
  [ 1, 0,-1, 0,    -5163],
  [ 1, 1, 0, 0,     4987],
  [ 2,-1, 1, 0,     4036],
  [ 2, 0, 2, 0,     3994],
  [ 4, 0, 0, 0,     3861],
  [ 2, 0,-3, 0,     3665],
  [ 0, 1,-2, 0,    -2689],
  [ 2, 0,-1, 2,    -2602],
  [ 2,-1,-2, 0,     2390],
]

/** Σl of the periodic terms plus the additive Venus, Jupiter and flattening terms, in 0.000001° */
export function lunarLongitudePerturbation(args: LunarArguments, T: number): number {
  const { Lp, D, M, Mp, F, E } = args

  let Sl = 0
  for (let i = LUNAR_LONGITUDE_TERMS.length - 1; i >= 0; i--) {
    const [d, m, mp, f, sl] = LUNAR_LONGITUDE_TERMS[i]
    // Terms in M carry the shrinking eccentricity of the Earth's orbit
    const eCorr = Math.abs(m) === 2 ? E * E : Math.abs(m) === 1 ? E : 1
    Sl += sl * eCorr * sinDeg(d * D + m * M + mp * Mp + f * F)
  }

  const A1 = horner([119.75, 131.849], T)
  const A2 = horner([53.09, 479264.29], T)
  Sl += 318 * sinDeg(A2)
  Sl += 1962 * sinDeg(Lp - F)
  Sl += 3958 * sinDeg(A1)

  return Sl
}

/**
 * Apparent geocentric tropical longitude of the Moon.
 *
 * @param T - Julian centuries from J2000.0
 */
export function moonTropicalLongitude(T: number): TropicalLongitude {
  const args = lunarArguments(T)
  const longitude = args.Lp + lunarLongitudePerturbation(args, T) * 1e-6
  return { frame: 'tropical', degrees: mod360(longitude + nutationInLongitude(T)) }
}
