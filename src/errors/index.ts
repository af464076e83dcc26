/**
 * errors — The one error type the engine reports to its callers.
 *
 * A DomainError is deterministic: the same input always produces it, so
 * adapters report it to the client and never retry.
 */

export type DomainErrorKind =
  | 'InvalidCalendarField'
  | 'UnsupportedTimeSpan'
  | 'OffsetOutOfRange'

export class DomainError extends Error {
  readonly kind: DomainErrorKind
  /** Name of the offending CivilMoment field, when there is one */
  readonly field?: string

  constructor(kind: DomainErrorKind, message: string, field?: string) {
    super(message)
    this.name = 'DomainError'
    this.kind = kind
    this.field = field
  }
}

export function isDomainError(err: unknown): err is DomainError {
  return err instanceof DomainError
}
