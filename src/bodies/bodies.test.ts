import { describe, expect, it } from 'vitest'
import {
  LUNAR_LONGITUDE_TERMS,
  SOLAR_TERMS,
  moonTropicalLongitude,
  nutationInLongitude,
  sunEquationOfCenter,
  sunTropicalLongitude,
} from './index.js'

// T from -4 to +4 centuries in uneven steps
const SAMPLE_T = Array.from({ length: 401 }, (_, i) => -4 + i * 0.02 + (i % 7) * 1e-4)

describe('sunTropicalLongitude', () => {
  it('reproduces Meeus example 25.a (1992 Oct 13.0 TD)', () => {
    const sun = sunTropicalLongitude(-0.072183436)
    expect(sun.frame).toBe('tropical')
    expect(sun.degrees).toBeCloseTo(199.90895, 3)
  })

  it('stays in [0, 360) across the supported span', () => {
    for (const T of SAMPLE_T) {
      const { degrees } = sunTropicalLongitude(T)
      expect(degrees).toBeGreaterThanOrEqual(0)
      expect(degrees).toBeLessThan(360)
    }
  })

  it('keeps the equation of centre under 2°', () => {
    for (const T of SAMPLE_T) {
      expect(Math.abs(sunEquationOfCenter(T))).toBeLessThan(2)
    }
  })

  it('uses a three-harmonic equation of centre', () => {
    expect(SOLAR_TERMS.map(t => t.multiplier)).toEqual([1, 2, 3])
  })

  it('is deterministic', () => {
    expect(sunTropicalLongitude(0.2361886835500756)).toEqual(sunTropicalLongitude(0.2361886835500756))
  })
})

describe('moonTropicalLongitude', () => {
  it('reproduces Meeus example 47.a (1992 Apr 12.0 TD) within the truncation error', () => {
    const T = -0.077221081451
    const geometric = moonTropicalLongitude(T).degrees - nutationInLongitude(T)
    expect(geometric).toBeCloseTo(133.1627, 2)
  })

  it('stays in [0, 360) across the supported span', () => {
    for (const T of SAMPLE_T) {
      const { degrees } = moonTropicalLongitude(T)
      expect(degrees).toBeGreaterThanOrEqual(0)
      expect(degrees).toBeLessThan(360)
    }
  })

  it('advances about 13.2° per day', () => {
    const T0 = 0.1
    const oneDay = 1 / 36525
    let step = moonTropicalLongitude(T0 + oneDay).degrees - moonTropicalLongitude(T0).degrees
    if (step < 0) step += 360
    expect(step).toBeGreaterThan(11.5)
    expect(step).toBeLessThan(15.5)
  })

  it('carries the 30 largest periodic terms, largest first', () => {
    expect(LUNAR_LONGITUDE_TERMS).toHaveLength(30)
    const amplitudes = LUNAR_LONGITUDE_TERMS.map(row => Math.abs(row[4]))
    expect([...amplitudes].sort((a, b) => b - a)).toEqual(amplitudes)
  })
})

describe('nutationInLongitude', () => {
  it('never exceeds 17.3″', () => {
    for (const T of SAMPLE_T) {
      expect(Math.abs(nutationInLongitude(T))).toBeLessThanOrEqual(0.00478)
    }
  })
})
