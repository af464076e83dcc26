/**
 * panchanga-engine — Hindu almanac elements from a civil date, time and UTC offset.
 *
 * Computes the apparent Sun and Moon longitudes from truncated VSOP87/ELP-2000
 * series (Meeus), shifts them by the Lahiri ayanamsa, and derives Tithi,
 * Paksha, Nakshatra, Yoga, Karana and Rashi. Pure, synchronous, no I/O.
 *
 * Quick start:
 *   import { computePanchanga, formatTithi } from 'panchanga-engine'
 *
 *   const result = computePanchanga({
 *     year: 2023, month: 8, day: 15, hour: 12, minute: 30, utcOffsetMinutes: 330,
 *   })
 *   if (result.ok) console.log(formatTithi(result.value), result.value.nakshatraName)
 *
 * An Express adapter (createApp, startServer) serves the same computation
 * as POST /panchang.
 */

// ─── Primary API ──────────────────────────────────────────────────────────────

export {
  computePanchanga,
  getPanchanga,
  getPanchangaForDate,
  computePositions,
  formatTithi,
} from './api/index.js'

export { DomainError, isDomainError } from './errors/index.js'
export type { DomainErrorKind } from './errors/index.js'

// ─── Types ────────────────────────────────────────────────────────────────────

export type {
  CivilMoment,
  JulianMoment,
  TropicalLongitude,
  SiderealLongitude,
  EclipticLongitude,
  CelestialPositions,
  Paksha,
  PanchangaResult,
  Result,
} from './types.js'

// ─── Building blocks ──────────────────────────────────────────────────────────

export {
  J2000,
  DAYS_PER_JULIAN_CENTURY,
  MAX_CENTURIES_FROM_J2000,
  MAX_UTC_OFFSET_MINUTES,
  julianDayNumber,
  civilToJulianMoment,
  civilMomentFromDate,
  julianDayToDate,
  validateCivilMoment,
} from './time/index.js'

export { sunTropicalLongitude, moonTropicalLongitude } from './bodies/index.js'
export { lahiriAyanamsa, toSidereal } from './ayanamsa/index.js'

export {
  derivePanchanga,
  karanaForHalfTithi,
  tithiName,
  nakshatraName,
  yogaName,
  karanaName,
  rashiName,
  TITHI_NAMES,
  NAKSHATRA_NAMES,
  YOGA_NAMES,
  KARANA_NAMES,
  RASHI_NAMES,
} from './panchanga/index.js'

export { mod360 } from './math/index.js'

// ─── Service ──────────────────────────────────────────────────────────────────

export { createApp, startServer, parsePanchangRequest } from './server/index.js'
export type { AppOptions, ApiResponse, PanchangData } from './server/index.js'
export { loadConfig, ConfigError } from './config/index.js'
export type { ServerConfig } from './config/index.js'
export { createLogger } from './logging/index.js'
export type { Logger, LogLevel } from './logging/index.js'
