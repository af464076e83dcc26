/**
 * names — Fixed name tables for the Panchanga elements and their lookups.
 */

import type { Paksha } from '../types.js'

// ─── Name tables ──────────────────────────────────────────────────────────────
//
// Each table is indexed by (index - 1). The tables are frozen and shared by
// every computation.

/** The 15 Tithi names of each fortnight; only the 15th differs */
export const TITHI_NAMES: Readonly<Record<Paksha, readonly string[]>> = Object.freeze({
  Shukla: Object.freeze([
    'Pratipada', 'Dwitiya', 'Tritiya', 'Chaturthi', 'Panchami',
    'Shashthi', 'Saptami', 'Ashtami', 'Navami', 'Dashami',
    'Ekadashi', 'Dwadashi', 'Trayodashi', 'Chaturdashi', 'Purnima',
  ]),
  Krishna: Object.freeze([
    'Pratipada', 'Dwitiya', 'Tritiya', 'Chaturthi', 'Panchami',
    'Shashthi', 'Saptami', 'Ashtami', 'Navami', 'Dashami',
    'Ekadashi', 'Dwadashi', 'Trayodashi', 'Chaturdashi', 'Amavasya',
  ]),
})

/** 27 lunar mansions of 13°20′, starting at 0° sidereal */
export const NAKSHATRA_NAMES: readonly string[] = Object.freeze([
  'Ashwini', 'Bharani', 'Krittika', 'Rohini', 'Mrigashira', 'Ardra',
  'Punarvasu', 'Pushya', 'Ashlesha', 'Magha', 'Purva Phalguni', 'Uttara Phalguni',
  'Hasta', 'Chitra', 'Swati', 'Vishakha', 'Anuradha', 'Jyeshtha',
  'Mula', 'Purva Ashadha', 'Uttara Ashadha', 'Shravana', 'Dhanishta', 'Shatabhisha',
  'Purva Bhadrapada', 'Uttara Bhadrapada', 'Revati',
])

export const YOGA_NAMES: readonly string[] = Object.freeze([
  'Vishkambha', 'Priti', 'Ayushman', 'Saubhagya', 'Shobhana', 'Atiganda',
  'Sukarma', 'Dhriti', 'Shula', 'Ganda', 'Vriddhi', 'Dhruva',
  'Vyaghata', 'Harshana', 'Vajra', 'Siddhi', 'Vyatipata', 'Variyan',
  'Parigha', 'Shiva', 'Siddha', 'Sadhya', 'Shubha', 'Shukla',
  'Brahma', 'Indra', 'Vaidhriti',
])

/**
 * Karana names. Indices 1-7 are the movable karanas, which repeat eight
 * times a lunar month; 8-11 are the fixed karanas, which occur once.
 */
export const KARANA_NAMES: readonly string[] = Object.freeze([
  'Bava', 'Balava', 'Kaulava', 'Taitila', 'Garaja', 'Vanija', 'Vishti',
  'Shakuni', 'Chatushpada', 'Naga', 'Kimstughna',
])

/** Number of movable karanas (Bava..Vishti) */
export const MOVABLE_KARANA_COUNT = 7

export const KARANA = {
  SHAKUNI: 8,
  CHATUSHPADA: 9,
  NAGA: 10,
  KIMSTUGHNA: 11,
} as const

export const RASHI_NAMES: readonly string[] = Object.freeze([
  'Mesha', 'Vrishabha', 'Mithuna', 'Karka', 'Simha', 'Kanya',
  'Tula', 'Vrishchika', 'Dhanu', 'Makara', 'Kumbha', 'Meena',
])

// ─── Lookups ──────────────────────────────────────────────────────────────────

function lookup(table: readonly string[], index: number, what: string): string {
  if (!Number.isInteger(index) || index < 1 || index > table.length) {
    throw new RangeError(`${what} index must be 1-${table.length}, got ${index}`)
  }
  return table[index - 1]
}

/** Display name of a Tithi 1-30; the fortnight follows from the index */
export function tithiName(tithiIndex: number): string {
  if (!Number.isInteger(tithiIndex) || tithiIndex < 1 || tithiIndex > 30) {
    throw new RangeError(`Tithi index must be 1-30, got ${tithiIndex}`)
  }
  return TITHI_NAMES[pakshaOf(tithiIndex)][(tithiIndex - 1) % 15]
}

export function pakshaOf(tithiIndex: number): Paksha {
  return tithiIndex <= 15 ? 'Shukla' : 'Krishna'
}

export function nakshatraName(index: number): string {
  return lookup(NAKSHATRA_NAMES, index, 'Nakshatra')
}

export function yogaName(index: number): string {
  return lookup(YOGA_NAMES, index, 'Yoga')
}

export function karanaName(index: number): string {
  return lookup(KARANA_NAMES, index, 'Karana')
}

export function rashiName(index: number): string {
  return lookup(RASHI_NAMES, index, 'Rashi')
}
