/**
 * panchanga — The five limbs of the Hindu almanac from sidereal longitudes.
 *
 * Every element is a segment index of an angle in [0, 360):
 *
 *   Tithi      Moon − Sun        12°      1-30
 *   Karana     Moon − Sun         6°      1-60 steps → 11 names
 *   Nakshatra  Moon              13°20′   1-27
 *   Yoga       Sun + Moon        13°20′   1-27
 *   Rashi      Moon              30°      1-12
 *
 * Yoga uses the sum of the sidereal longitudes. Some sources add tropical
 * longitudes instead; the two sums differ by twice the ayanamsa (~48°, more
 * than three Yogas), so the choice is fixed here and tested.
 */

import type { PanchangaResult, SiderealLongitude } from '../types.js'
import { mod360 } from '../math/index.js'
import {
  KARANA,
  MOVABLE_KARANA_COUNT,
  karanaName,
  nakshatraName,
  pakshaOf,
  rashiName,
  tithiName,
  yogaName,
} from './names.js'

export * from './names.js'

// ─── Segment widths ───────────────────────────────────────────────────────────

export const TITHI_SPAN_DEG = 12
export const KARANA_SPAN_DEG = 6
export const NAKSHATRA_SPAN_DEG = 360 / 27
export const YOGA_SPAN_DEG = 360 / 27
export const RASHI_SPAN_DEG = 30

/**
 * 1-based index of the segment containing an angle.
 * The angle is normalized first; a quotient that rounds up to the segment
 * count is kept in the last segment.
 */
export function segmentIndex(angleDeg: number, spanDeg: number, count: number): number {
  const index = Math.floor(mod360(angleDeg) / spanDeg) + 1
  return Math.min(index, count)
}

// ─── Karana ───────────────────────────────────────────────────────────────────

/**
 * Map a half-tithi step k (1-60) to a karana index (1-11).
 *
 *   k = 1        Kimstughna   (first half of Shukla Pratipada)
 *   k = 2..57    Bava..Vishti, eight full cycles of seven
 *   k = 58       Shakuni
 *   k = 59       Chatushpada
 *   k = 60       Naga         (second half of Amavasya)
 */
export function karanaForHalfTithi(k: number): number {
  if (!Number.isInteger(k) || k < 1 || k > 60) {
    throw new RangeError(`Half-tithi index must be 1-60, got ${k}`)
  }
  if (k === 1) return KARANA.KIMSTUGHNA
  if (k === 58) return KARANA.SHAKUNI
  if (k === 59) return KARANA.CHATUSHPADA
  if (k === 60) return KARANA.NAGA
  return ((k - 2) % MOVABLE_KARANA_COUNT) + 1
}

// ─── Derivation ───────────────────────────────────────────────────────────────

/**
 * Derive Tithi, Paksha, Nakshatra, Yoga, Karana and Rashi.
 *
 * Both inputs must be sidereal; passing a tropical longitude is a type error.
 */
export function derivePanchanga(positions: {
  sun: SiderealLongitude
  moon: SiderealLongitude
}): PanchangaResult {
  const Ls = positions.sun.degrees
  const Lm = positions.moon.degrees

  const elongation = mod360(Lm - Ls)
  const tithiIndex = segmentIndex(elongation, TITHI_SPAN_DEG, 30)
  const halfTithiIndex = segmentIndex(elongation, KARANA_SPAN_DEG, 60)
  const karanaIndex = karanaForHalfTithi(halfTithiIndex)
  const nakshatraIndex = segmentIndex(Lm, NAKSHATRA_SPAN_DEG, 27)
  const yogaIndex = segmentIndex(Ls + Lm, YOGA_SPAN_DEG, 27)
  const rashiIndex = segmentIndex(Lm, RASHI_SPAN_DEG, 12)

  return Object.freeze({
    tithiIndex,
    tithiName: tithiName(tithiIndex),
    paksha: pakshaOf(tithiIndex),
    nakshatraIndex,
    nakshatraName: nakshatraName(nakshatraIndex),
    yogaIndex,
    yogaName: yogaName(yogaIndex),
    karanaIndex,
    karanaName: karanaName(karanaIndex),
    halfTithiIndex,
    rashiIndex,
    rashiName: rashiName(rashiIndex),
  })
}
