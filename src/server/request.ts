/**
 * Request parsing for POST /panchang.
 *
 *   { "date": "15/08/2023", "time": "12:30", "zone": "+05:30" }
 *
 * Only the shape is checked here. Whether the 31st of February exists, or
 * whether +15:00 is an acceptable offset, is for the engine to decide.
 */

import { z } from 'zod'
import type { CivilMoment, Result } from '../types.js'

const DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/
const TIME_PATTERN = /^(\d{1,2}):(\d{2})$/
const ZONE_PATTERN = /^([+-])?(\d{1,2}):(\d{2})$/

/** Parse DD/MM/YYYY */
export function parseCivilDate(text: string): { year: number; month: number; day: number } | null {
  const match = DATE_PATTERN.exec(text.trim())
  if (!match) return null
  return { day: Number(match[1]), month: Number(match[2]), year: Number(match[3]) }
}

/** Parse HH:MM (24-hour) */
export function parseCivilTime(text: string): { hour: number; minute: number } | null {
  const match = TIME_PATTERN.exec(text.trim())
  if (!match) return null
  return { hour: Number(match[1]), minute: Number(match[2]) }
}

/**
 * Parse [+|-]HH:MM into minutes east of UTC.
 * A missing sign means east, as in "05:30".
 */
export function parseUtcOffset(text: string): number | null {
  const match = ZONE_PATTERN.exec(text.trim())
  if (!match) return null
  const minutes = Number(match[3])
  if (minutes > 59) return null
  const total = Number(match[2]) * 60 + minutes
  return match[1] === '-' ? -total : total
}

function field<T>(name: string, format: string, parse: (text: string) => T | null) {
  return z
    .string({
      required_error: `${name} is required`,
      invalid_type_error: `${name} must be a string`,
    })
    .transform((value, ctx) => {
      const parsed = parse(value)
      if (parsed === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be ${format}` })
        return z.NEVER
      }
      return parsed
    })
}

export const PanchangRequestSchema = z.object(
  {
    date: field('date', 'DD/MM/YYYY', parseCivilDate),
    time: field('time', 'HH:MM (24-hour)', parseCivilTime),
    zone: field('zone', '[+|-]HH:MM', parseUtcOffset),
  },
  {
    required_error: 'request body must be a JSON object',
    invalid_type_error: 'request body must be a JSON object',
  },
)

export type PanchangRequest = z.input<typeof PanchangRequestSchema>

/**
 * Validate a request body and turn it into a CivilMoment.
 * On failure the error is every validation message joined by "; ".
 */
export function parsePanchangRequest(body: unknown): Result<CivilMoment, string> {
  const parsed = PanchangRequestSchema.safeParse(body)
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map(issue => issue.message).join('; ') }
  }

  const { date, time, zone } = parsed.data
  return {
    ok: true,
    value: { ...date, ...time, utcOffsetMinutes: zone },
  }
}
