/**
 * ayanamsa — Lahiri (Chitrapaksha) ayanamsa and the tropical-to-sidereal shift.
 *
 * The polynomial is the Indian Astronomical Ephemeris fit in centuries from
 * 1900.0, 22°27′41.27″ + 5025.64″·t + 1.11″·t², with the nutation in
 * longitude subtracted so that the result pairs with the apparent
 * longitudes from bodies/. It gives 23°51′14″ at J2000.0 and grows by
 * about 50.3″ per year.
 */

import type { SiderealLongitude, TropicalLongitude } from '../types.js'
import { horner, mod360, sinDeg } from '../math/index.js'

/** 1900.0 is exactly one Julian century before J2000.0 */
const CENTURIES_1900_TO_J2000 = 1

/** Mean Lahiri ayanamsa in arcseconds, as a polynomial in centuries from 1900.0 */
const LAHIRI_MEAN_ARCSEC = [80861.27, 5025.64, 1.11] as const

/**
 * Lahiri ayanamsa in degrees.
 *
 * @param T - Julian centuries from J2000.0
 */
export function lahiriAyanamsa(T: number): number {
  const t = T + CENTURIES_1900_TO_J2000
  // Moon's node and Sun's mean longitude, referred to 1900.0
  const node = horner([259.183275, -1934.142008333206, 0.0020777778], t)
  const sunLongitude = horner([279.696678, 36000.76892, 0.0003025], t)

  const arcsec =
    horner(LAHIRI_MEAN_ARCSEC, t) - 17.23 * sinDeg(node) - 1.27 * sinDeg(2 * sunLongitude)
  return arcsec / 3600
}

/** Subtract the ayanamsa from a tropical longitude */
export function toSidereal(longitude: TropicalLongitude, ayanamsa: number): SiderealLongitude {
  return { frame: 'sidereal', degrees: mod360(longitude.degrees - ayanamsa) }
}
