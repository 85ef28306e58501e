type TimesheetErrorCode = 'INVALID_TRANSITION' | 'VALIDATION' | 'PERSISTENCE' | 'CALENDAR_CONVERSION' | 'CONFIG'

class TimesheetError extends Error {
  code: TimesheetErrorCode

  constructor(code: TimesheetErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/**
 * Check-in while a session is open, or check-out while none is.
 */
class InvalidTransitionError extends TimesheetError {
  constructor(message: string) {
    super('INVALID_TRANSITION', message)
  }
}

class ValidationError extends TimesheetError {
  constructor(message: string) {
    super('VALIDATION', message)
  }
}

/**
 * The session log could not be written or read. The caller must leave the
 * session open so the user can retry.
 */
class PersistenceError extends TimesheetError {
  constructor(message: string, cause?: unknown) {
    super('PERSISTENCE', message, { cause })
  }
}

class CalendarConversionError extends TimesheetError {
  constructor(message: string, cause?: unknown) {
    super('CALENDAR_CONVERSION', message, { cause })
  }
}

class ConfigError extends TimesheetError {
  constructor(message: string) {
    super('CONFIG', message)
  }
}

function isTimesheetError(err: unknown): err is TimesheetError {
  return err instanceof TimesheetError
}

export {
  CalendarConversionError,
  ConfigError,
  InvalidTransitionError,
  isTimesheetError,
  PersistenceError,
  TimesheetError,
  ValidationError,
}
export type { TimesheetErrorCode }
