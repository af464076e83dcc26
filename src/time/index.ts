/**
 * time — Civil timestamps to Julian Dates and Julian centuries.
 *
 * The series in bodies/ and ayanamsa/ take T, Julian centuries of 36525 days
 * from J2000.0 (2000 Jan 1, 12:00 = JD 2451545.0). Universal Time is used
 * directly as the time argument; ΔT (about 69 s today) moves the Moon by
 * roughly 0.01°, well inside the error of the truncated series.
 *
 * References:
 *   Meeus, J. (1998). Astronomical Algorithms, 2nd ed., ch. 7.
 */

import type { CivilMoment, JulianMoment } from '../types.js'
import { DomainError } from '../errors/index.js'

// ─── Constants ────────────────────────────────────────────────────────────────

/** Julian Date of J2000.0 epoch (2000 Jan 1, 12:00) */
export const J2000 = 2451545.0

/** Days per Julian century */
export const DAYS_PER_JULIAN_CENTURY = 36525.0

/** Minutes per day */
export const MINUTES_PER_DAY = 1440

/** Julian Date of the Unix epoch (1970 Jan 1, 00:00 UTC) */
export const UNIX_EPOCH_JD = 2440587.5

/**
 * Largest |T| accepted, in Julian centuries.
 * The truncated solar and lunar series drift away from the full theories
 * outside J2000 ± 400 years.
 */
export const MAX_CENTURIES_FROM_J2000 = 4

/** Largest |UTC offset| accepted, in minutes (±14:00) */
export const MAX_UTC_OFFSET_MINUTES = 14 * 60

// ─── Calendar ────────────────────────────────────────────────────────────────

export function isGregorianLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

/**
 * Leap year on the calendar julianDayNumber reads the year in: Julian
 * (every fourth year) through 1582, Gregorian after.
 */
export function isLeapYear(year: number): boolean {
  return year <= 1582 ? year % 4 === 0 : isGregorianLeapYear(year)
}

/** Number of days in a month (1-12) of the given year */
export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  const length = MONTH_LENGTHS[month - 1]
  if (length === undefined) throw new RangeError(`Month out of range: ${month}`)
  return length
}

// ─── Julian Date ─────────────────────────────────────────────────────────────

/**
 * Julian Date at 0h UT of a calendar date (Meeus eq. 7.1).
 *
 * Dates from 1582 Oct 15 onward are read as Gregorian; earlier dates as
 * Julian-calendar dates, so 1582 Oct 4 and Oct 15 are consecutive days.
 */
export function julianDayNumber(year: number, month: number, day: number): number {
  const gregorian =
    year > 1582 || (year === 1582 && (month > 10 || (month === 10 && day >= 15)))

  let y = year
  let m = month
  if (m <= 2) {
    y -= 1
    m += 12
  }

  let b = 0
  if (gregorian) {
    const a = Math.floor(y / 100)
    b = 2 - a + Math.floor(a / 4)
  }

  return Math.floor(365.25 * (y + 4716)) + Math.floor(30.6001 * (m + 1)) + day + b - 1524.5
}

/** Julian centuries from J2000.0 */
export function jdToT(julianDay: number): number {
  return (julianDay - J2000) / DAYS_PER_JULIAN_CENTURY
}

/** Convert a Julian Date in UT to a JavaScript Date */
export function julianDayToDate(julianDay: number): Date {
  return new Date((julianDay - UNIX_EPOCH_JD) * 86400000)
}

// ─── Civil moments ────────────────────────────────────────────────────────────

/**
 * Check every field of a civil moment.
 * Throws DomainError with kind InvalidCalendarField or OffsetOutOfRange.
 */
export function validateCivilMoment(moment: CivilMoment): void {
  const { year, month, day, hour, minute, utcOffsetMinutes } = moment

  requireInteger('year', year)
  requireInteger('month', month)
  if (month < 1 || month > 12) {
    throw new DomainError('InvalidCalendarField', `Month must be 1-12, got ${month}`, 'month')
  }
  requireInteger('day', day)
  const maxDay = daysInMonth(year, month)
  if (day < 1 || day > maxDay) {
    throw new DomainError(
      'InvalidCalendarField',
      `Day must be 1-${maxDay} for ${year}-${String(month).padStart(2, '0')}, got ${day}`,
      'day',
    )
  }
  requireInteger('hour', hour)
  if (hour < 0 || hour > 23) {
    throw new DomainError('InvalidCalendarField', `Hour must be 0-23, got ${hour}`, 'hour')
  }
  requireInteger('minute', minute)
  if (minute < 0 || minute > 59) {
    throw new DomainError('InvalidCalendarField', `Minute must be 0-59, got ${minute}`, 'minute')
  }

  if (!Number.isInteger(utcOffsetMinutes) || Math.abs(utcOffsetMinutes) > MAX_UTC_OFFSET_MINUTES) {
    throw new DomainError(
      'OffsetOutOfRange',
      `UTC offset must be a whole number of minutes within ±14:00, got ${utcOffsetMinutes}`,
      'utcOffsetMinutes',
    )
  }
}

function requireInteger(field: keyof CivilMoment, value: number): void {
  if (!Number.isInteger(value)) {
    throw new DomainError('InvalidCalendarField', `${field} must be an integer, got ${value}`, field)
  }
}

/**
 * Convert a civil moment to its Julian Date (UT) and century offset.
 *
 * @throws DomainError when a field is invalid, the offset exceeds ±14:00,
 *   or the instant lies outside J2000 ± 400 years
 */
export function civilToJulianMoment(moment: CivilMoment): JulianMoment {
  validateCivilMoment(moment)

  const { year, month, day, hour, minute, utcOffsetMinutes } = moment
  const julianDay =
    julianDayNumber(year, month, day) + (hour * 60 + minute - utcOffsetMinutes) / MINUTES_PER_DAY
  const centuriesSinceJ2000 = jdToT(julianDay)

  if (Math.abs(centuriesSinceJ2000) > MAX_CENTURIES_FROM_J2000) {
    throw new DomainError(
      'UnsupportedTimeSpan',
      `Date ${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')} ` +
        `is outside the supported span of J2000 ± ${MAX_CENTURIES_FROM_J2000 * 100} years`,
    )
  }

  return { julianDay, centuriesSinceJ2000 }
}

/**
 * Wall-clock fields of a Date instant as seen at a fixed UTC offset.
 * Seconds are truncated.
 */
export function civilMomentFromDate(date: Date, utcOffsetMinutes: number): CivilMoment {
  const local = new Date(date.getTime() + utcOffsetMinutes * 60000)
  return {
    year: local.getUTCFullYear(),
    month: local.getUTCMonth() + 1,
    day: local.getUTCDate(),
    hour: local.getUTCHours(),
    minute: local.getUTCMinutes(),
    utcOffsetMinutes,
  }
}
