import { describe, expect, it } from 'vitest'
import { parseCivilDate, parseCivilTime, parsePanchangRequest, parseUtcOffset } from './request.js'

describe('field parsers', () => {
  it('parse DD/MM/YYYY', () => {
    expect(parseCivilDate('15/08/2023')).toEqual({ day: 15, month: 8, year: 2023 })
    expect(parseCivilDate(' 1/1/2000 ')).toEqual({ day: 1, month: 1, year: 2000 })
    expect(parseCivilDate('2023-08-15')).toBeNull()
  })

  it('parse HH:MM', () => {
    expect(parseCivilTime('12:30')).toEqual({ hour: 12, minute: 30 })
    expect(parseCivilTime('7:05')).toEqual({ hour: 7, minute: 5 })
    expect(parseCivilTime('12:30:15')).toBeNull()
  })

  it('parse signed and unsigned offsets', () => {
    expect(parseUtcOffset('+05:30')).toBe(330)
    expect(parseUtcOffset('05:30')).toBe(330)
    expect(parseUtcOffset('-03:30')).toBe(-210)
    expect(parseUtcOffset('+00:00')).toBe(0)
    expect(parseUtcOffset('+05:75')).toBeNull()
    expect(parseUtcOffset('IST')).toBeNull()
  })
})

describe('parsePanchangRequest', () => {
  it('builds a civil moment', () => {
    expect(parsePanchangRequest({ date: '15/08/2023', time: '12:30', zone: '+05:30' })).toEqual({
      ok: true,
      value: { year: 2023, month: 8, day: 15, hour: 12, minute: 30, utcOffsetMinutes: 330 },
    })
  })

  it('leaves range checks to the engine', () => {
    const result = parsePanchangRequest({ date: '31/02/2023', time: '25:00', zone: '+15:00' })
    expect(result.ok).toBe(true)
  })

  it('lists every missing field', () => {
    expect(parsePanchangRequest({})).toEqual({
      ok: false,
      error: 'date is required; time is required; zone is required',
    })
  })

  it('describes malformed fields', () => {
    expect(parsePanchangRequest({ date: '2023-08-15', time: 1230, zone: 'IST' })).toEqual({
      ok: false,
      error: 'date must be DD/MM/YYYY; time must be a string; zone must be [+|-]HH:MM',
    })
  })

  it('rejects bodies that are not objects', () => {
    expect(parsePanchangRequest(undefined)).toEqual({ ok: false, error: 'request body must be a JSON object' })
    expect(parsePanchangRequest('15/08/2023')).toEqual({ ok: false, error: 'request body must be a JSON object' })
  })
})
