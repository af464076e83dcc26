/**
 * api — User-facing entry points.
 *
 * This is the only module users need to import directly. Everything else
 * in src/ is the pipeline behind it:
 *
 *   time → bodies (Sun, Moon) → ayanamsa → panchanga
 *
 * All functions are synchronous and pure; concurrent callers share nothing
 * but the frozen name tables.
 */

import type {
  CelestialPositions,
  CivilMoment,
  PanchangaResult,
  Result,
} from '../types.js'
import { DomainError } from '../errors/index.js'
import { civilMomentFromDate, civilToJulianMoment } from '../time/index.js'
import { moonTropicalLongitude, sunTropicalLongitude } from '../bodies/index.js'
import { lahiriAyanamsa, toSidereal } from '../ayanamsa/index.js'
import { derivePanchanga } from '../panchanga/index.js'

// ─── Positions ────────────────────────────────────────────────────────────────

/**
 * Compute the Julian moment, ayanamsa and the tropical and sidereal Sun and
 * Moon longitudes for a civil moment.
 *
 * @throws DomainError for invalid fields, offsets beyond ±14:00, or dates
 *   outside J2000 ± 400 years
 */
export function computePositions(moment: CivilMoment): CelestialPositions {
  const julian = civilToJulianMoment(moment)
  const T = julian.centuriesSinceJ2000

  const sunTropical = sunTropicalLongitude(T)
  const moonTropical = moonTropicalLongitude(T)
  const ayanamsa = lahiriAyanamsa(T)

  return {
    julian,
    ayanamsa,
    sunTropical,
    moonTropical,
    sunSidereal: toSidereal(sunTropical, ayanamsa),
    moonSidereal: toSidereal(moonTropical, ayanamsa),
  }
}

// ─── Panchanga ────────────────────────────────────────────────────────────────

/**
 * Compute the Panchanga for a civil moment.
 *
 * Domain errors come back as `{ ok: false, error }`; anything else is a bug
 * and is rethrown.
 *
 * @example
 * ```ts
 * const result = computePanchanga({
 *   year: 2023, month: 8, day: 15, hour: 12, minute: 30, utcOffsetMinutes: 330,
 * })
 * if (result.ok) console.log(formatTithi(result.value))  // "Chaturdashi, Krishna Paksha"
 * ```
 */
export function computePanchanga(moment: CivilMoment): Result<PanchangaResult, DomainError> {
  try {
    return { ok: true, value: getPanchanga(moment) }
  } catch (err) {
    if (err instanceof DomainError) return { ok: false, error: err }
    throw err
  }
}

/**
 * Throwing variant of computePanchanga().
 *
 * @throws DomainError
 */
export function getPanchanga(moment: CivilMoment): PanchangaResult {
  const positions = computePositions(moment)
  return derivePanchanga({ sun: positions.sunSidereal, moon: positions.moonSidereal })
}

/**
 * Panchanga for a JS Date instant, read on a wall clock at the given offset.
 *
 * @param date - Any instant; seconds are truncated
 * @param utcOffsetMinutes - Local time minus UTC (IST = 330)
 */
export function getPanchangaForDate(date: Date, utcOffsetMinutes: number): PanchangaResult {
  return getPanchanga(civilMomentFromDate(date, utcOffsetMinutes))
}

/** "<Name>, <Paksha> Paksha", e.g. "Purnima, Shukla Paksha" */
export function formatTithi(result: Pick<PanchangaResult, 'tithiName' | 'paksha'>): string {
  return `${result.tithiName}, ${result.paksha} Paksha`
}
