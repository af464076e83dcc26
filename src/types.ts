// ─── Time ────────────────────────────────────────────────────────────────────

/**
 * A wall-clock reading at a fixed offset from UTC.
 * Produced by an adapter (HTTP body, CLI arguments, a JS Date) and never
 * mutated by the engine.
 */
export interface CivilMoment {
  readonly year: number
  /** 1-12 */
  readonly month: number
  /** 1-31, bounded by the month length */
  readonly day: number
  /** 0-23 */
  readonly hour: number
  /** 0-59 */
  readonly minute: number
  /** Local time minus UTC, in minutes (IST = +330). Bounded to ±840. */
  readonly utcOffsetMinutes: number
}

/** The same instant as a Julian Date (UT) and the polynomial argument T */
export interface JulianMoment {
  readonly julianDay: number
  /** (JD - 2451545.0) / 36525 */
  readonly centuriesSinceJ2000: number
}

// ─── Longitudes ──────────────────────────────────────────────────────────────

/** Geocentric ecliptic longitude measured from the equinox of date, degrees [0, 360) */
export interface TropicalLongitude {
  readonly frame: 'tropical'
  readonly degrees: number
}

/** Ecliptic longitude measured from the Lahiri fiducial point, degrees [0, 360) */
export interface SiderealLongitude {
  readonly frame: 'sidereal'
  readonly degrees: number
}

export type EclipticLongitude = TropicalLongitude | SiderealLongitude

/** Everything computed on the way from a civil moment to the Panchanga */
export interface CelestialPositions {
  julian: JulianMoment
  /** Lahiri ayanamsa in degrees */
  ayanamsa: number
  sunTropical: TropicalLongitude
  moonTropical: TropicalLongitude
  sunSidereal: SiderealLongitude
  moonSidereal: SiderealLongitude
}

// ─── Panchanga ───────────────────────────────────────────────────────────────

/** Lunar fortnight: waxing (Shukla, Tithi 1-15) or waning (Krishna, Tithi 16-30) */
export type Paksha = 'Shukla' | 'Krishna'

export interface PanchangaResult {
  /** 1-30, each spanning 12° of Moon-Sun elongation */
  readonly tithiIndex: number
  readonly tithiName: string
  readonly paksha: Paksha
  /** 1-27, the Moon's 13°20′ lunar mansion */
  readonly nakshatraIndex: number
  readonly nakshatraName: string
  /** 1-27, from the sum of the sidereal longitudes */
  readonly yogaIndex: number
  readonly yogaName: string
  /** 1-11: 1-7 movable (Bava..Vishti), 8-11 fixed (Shakuni, Chatushpada, Naga, Kimstughna) */
  readonly karanaIndex: number
  readonly karanaName: string
  /** 1-60, the half-tithi step the Karana was taken from */
  readonly halfTithiIndex: number
  /** 1-12, the Moon's sign (Chandra Rashi) */
  readonly rashiIndex: number
  readonly rashiName: string
}

// ─── Results ─────────────────────────────────────────────────────────────────

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E }
