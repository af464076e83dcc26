import { describe, expect, it } from 'vitest'
import type { SiderealLongitude } from '../types.js'
import {
  KARANA_NAMES,
  NAKSHATRA_NAMES,
  RASHI_NAMES,
  TITHI_NAMES,
  YOGA_NAMES,
  derivePanchanga,
  karanaForHalfTithi,
  karanaName,
  nakshatraName,
  rashiName,
  segmentIndex,
  tithiName,
  yogaName,
} from './index.js'

const sidereal = (degrees: number): SiderealLongitude => ({ frame: 'sidereal', degrees })

describe('name tables', () => {
  it('have the traditional sizes', () => {
    expect(TITHI_NAMES.Shukla).toHaveLength(15)
    expect(TITHI_NAMES.Krishna).toHaveLength(15)
    expect(NAKSHATRA_NAMES).toHaveLength(27)
    expect(YOGA_NAMES).toHaveLength(27)
    expect(KARANA_NAMES).toHaveLength(11)
    expect(RASHI_NAMES).toHaveLength(12)
  })

  it('are frozen', () => {
    expect(Object.isFrozen(NAKSHATRA_NAMES)).toBe(true)
    expect(Object.isFrozen(TITHI_NAMES.Krishna)).toBe(true)
  })

  it('end each fortnight on Purnima or Amavasya', () => {
    expect(tithiName(15)).toBe('Purnima')
    expect(tithiName(30)).toBe('Amavasya')
    expect(tithiName(1)).toBe('Pratipada')
    expect(tithiName(16)).toBe('Pratipada')
    expect(tithiName(29)).toBe('Chaturdashi')
  })

  it('rejects indices out of range', () => {
    expect(() => tithiName(0)).toThrow(RangeError)
    expect(() => tithiName(31)).toThrow(RangeError)
    expect(() => nakshatraName(28)).toThrow('Nakshatra index must be 1-27, got 28')
    expect(() => yogaName(0)).toThrow(RangeError)
    expect(() => karanaName(12)).toThrow(RangeError)
    expect(() => rashiName(2.5)).toThrow(RangeError)
  })

  it('resolves the ends of each table', () => {
    expect(nakshatraName(1)).toBe('Ashwini')
    expect(nakshatraName(27)).toBe('Revati')
    expect(yogaName(1)).toBe('Vishkambha')
    expect(yogaName(27)).toBe('Vaidhriti')
    expect(rashiName(5)).toBe('Simha')
    expect(rashiName(12)).toBe('Meena')
  })
})

describe('karanaForHalfTithi', () => {
  const fixed = new Set(['Shakuni', 'Chatushpada', 'Naga', 'Kimstughna'])

  it('places the fixed karanas at the ends of the month', () => {
    expect(karanaName(karanaForHalfTithi(1))).toBe('Kimstughna')
    expect(karanaName(karanaForHalfTithi(58))).toBe('Shakuni')
    expect(karanaName(karanaForHalfTithi(59))).toBe('Chatushpada')
    expect(karanaName(karanaForHalfTithi(60))).toBe('Naga')
  })

  it('cycles Bava..Vishti from k = 2 to 57', () => {
    expect(karanaName(karanaForHalfTithi(2))).toBe('Bava')
    expect(karanaName(karanaForHalfTithi(8))).toBe('Vishti')
    expect(karanaName(karanaForHalfTithi(9))).toBe('Bava')
    expect(karanaName(karanaForHalfTithi(57))).toBe('Vishti')
  })

  it('gives each movable karana eight occurrences and never a fixed name', () => {
    const counts = new Map<string, number>()
    for (let k = 2; k <= 57; k++) {
      const name = karanaName(karanaForHalfTithi(k))
      expect(fixed.has(name)).toBe(false)
      counts.set(name, (counts.get(name) ?? 0) + 1)
    }
    expect([...counts.values()]).toEqual([8, 8, 8, 8, 8, 8, 8])
  })

  it('rejects steps outside 1-60', () => {
    expect(() => karanaForHalfTithi(0)).toThrow(RangeError)
    expect(() => karanaForHalfTithi(61)).toThrow(RangeError)
  })
})

describe('segmentIndex', () => {
  it('normalizes before dividing', () => {
    expect(segmentIndex(-6, 12, 30)).toBe(30)
    expect(segmentIndex(365, 30, 12)).toBe(1)
  })

  it('starts a new segment exactly on the boundary', () => {
    expect(segmentIndex(12, 12, 30)).toBe(2)
    expect(segmentIndex(11.999999999, 12, 30)).toBe(1)
  })
})

describe('derivePanchanga', () => {
  it('starts every cycle when Sun and Moon coincide at 0°', () => {
    const p = derivePanchanga({ sun: sidereal(0), moon: sidereal(0) })
    expect(p).toMatchObject({
      tithiIndex: 1,
      tithiName: 'Pratipada',
      paksha: 'Shukla',
      halfTithiIndex: 1,
      karanaIndex: 11,
      karanaName: 'Kimstughna',
      nakshatraIndex: 1,
      nakshatraName: 'Ashwini',
      yogaIndex: 1,
      yogaName: 'Vishkambha',
      rashiIndex: 1,
      rashiName: 'Mesha',
    })
  })

  it('derives each element from its own angle', () => {
    // elongation 185°, Moon 285°, sum 385° ≡ 25°
    const p = derivePanchanga({ sun: sidereal(100), moon: sidereal(285) })
    expect(p).toMatchObject({
      tithiIndex: 16,
      tithiName: 'Pratipada',
      paksha: 'Krishna',
      halfTithiIndex: 31,
      karanaName: 'Balava',
      nakshatraIndex: 22,
      nakshatraName: 'Shravana',
      yogaIndex: 2,
      yogaName: 'Priti',
      rashiIndex: 10,
      rashiName: 'Makara',
    })
  })

  it('names Purnima and Vishti in the last half of Shukla Purnima', () => {
    const p = derivePanchanga({ sun: sidereal(10), moon: sidereal(180) })
    expect(p).toMatchObject({ tithiIndex: 15, tithiName: 'Purnima', paksha: 'Shukla', halfTithiIndex: 29, karanaName: 'Vishti' })
  })

  it('wraps the elongation when the Moon trails the Sun', () => {
    const p = derivePanchanga({ sun: sidereal(50), moon: sidereal(49) })
    expect(p).toMatchObject({ tithiIndex: 30, tithiName: 'Amavasya', paksha: 'Krishna', halfTithiIndex: 60, karanaName: 'Naga' })
  })

  it('keeps every index in range and paksha consistent with the tithi', () => {
    for (let s = 0; s < 360; s += 7.3) {
      for (let m = 0; m < 360; m += 5.9) {
        const p = derivePanchanga({ sun: sidereal(s), moon: sidereal(m) })
        expect(p.tithiIndex).toBeGreaterThanOrEqual(1)
        expect(p.tithiIndex).toBeLessThanOrEqual(30)
        expect(p.nakshatraIndex).toBeGreaterThanOrEqual(1)
        expect(p.nakshatraIndex).toBeLessThanOrEqual(27)
        expect(p.yogaIndex).toBeGreaterThanOrEqual(1)
        expect(p.yogaIndex).toBeLessThanOrEqual(27)
        expect(p.karanaIndex).toBeGreaterThanOrEqual(1)
        expect(p.karanaIndex).toBeLessThanOrEqual(11)
        expect(p.rashiIndex).toBeGreaterThanOrEqual(1)
        expect(p.rashiIndex).toBeLessThanOrEqual(12)
        expect(p.paksha === 'Shukla').toBe(p.tithiIndex <= 15)
      }
    }
  })

  it('returns a frozen result', () => {
    expect(Object.isFrozen(derivePanchanga({ sun: sidereal(0), moon: sidereal(90) }))).toBe(true)
  })
})
