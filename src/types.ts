export interface OpenSession {
  userId: string
  checkInAt: number
  status: 'OPEN'
}

export interface ClosedSession {
  userId: string
  checkInAt: number
  checkOutAt: number
  activity: string
  status: 'CLOSED'
}

/**
 * One row of the session log, in the same column order as the timesheet:
 * date, weekday, check-in, check-out, total hours, activity.
 */
export interface SessionRecord {
  userId: string
  date: string
  weekday: string
  checkIn: string
  checkOut: string
  totalHours: string
  activity: string
}

export interface CivilStamp {
  isoDate: string
  weekday: string
  civilDate: string
  year: number
  month: number
  day: number
  time: string
}

export interface CivilDay {
  day: number
  weekday: string
}

export interface MonthlyStats {
  monthName: string
  totalHours: string
  totalMinutes: number
  workedDays: number
  currentSalary: number
  expectedSalary: number
  projectedSalary: number
}

export interface CheckInResult {
  session: OpenSession
  stamp: CivilStamp
}

export interface CheckOutResult {
  session: ClosedSession
  record: SessionRecord
  monthlyTotal: string | null
}
