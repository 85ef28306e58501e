import type { TimesheetError } from '../errors'
import type { CivilStamp, CheckOutResult, MonthlyStats } from '../types'

function formatMoney(n: number): string {
  return `$${n.toLocaleString('en-US')}`
}

export const GREETING = 'Hello! Use the buttons below to record your work hours.'
export const ASK_ACTIVITY = 'Please enter your activity for this session (or /cancel to keep the session open).'
export const CHECKOUT_CANCELLED = 'Check-out cancelled. Your session is still open.'
export const NOTHING_TO_CANCEL = 'Nothing to cancel.'
export const CHECK_IN_FIRST = '⚠️ You need to check in first!'
export const NO_OPEN_SESSION = 'No open session.'
export const GENERIC_FAILURE = '❌ Something went wrong. Please try again.'

export function checkedIn(stamp: CivilStamp): string {
  return `✅ Check-in recorded at ${stamp.time} (${stamp.weekday} ${stamp.civilDate}).`
}

export function checkedOut(result: CheckOutResult): string {
  const { record, monthlyTotal } = result
  return [
    '✅ Check-out recorded.',
    '',
    `Start: ${record.checkIn}`,
    `End: ${record.checkOut}`,
    `Duration: ${record.totalHours}`,
    `This month: ${monthlyTotal ?? 'unavailable'}`,
  ].join('\n')
}

export function openSince(stamp: CivilStamp): string {
  return `🟢 Checked in since ${stamp.time} (${stamp.weekday} ${stamp.civilDate}).`
}

export function monthlyStats(stats: MonthlyStats): string {
  return [
    `📊 Stats for ${stats.monthName}`,
    '',
    `🕒 Total Work Hours: ${stats.totalHours}`,
    `📅 Days Worked: ${stats.workedDays}`,
    `💵 Current Salary: ${formatMoney(stats.currentSalary)}`,
    '',
    `📈 Expected Salary (8hr/day): ${formatMoney(stats.expectedSalary)}`,
    `🔮 Projected Month Salary: ${formatMoney(stats.projectedSalary)}`,
  ].join('\n')
}

export function failure(err: TimesheetError): string {
  switch (err.code) {
    case 'INVALID_TRANSITION':
    case 'VALIDATION':
      return `⚠️ ${err.message}`
    case 'PERSISTENCE':
      return '❌ Could not reach the timesheet. Nothing was changed, please try again.'
    case 'CALENDAR_CONVERSION':
      return '❌ Could not read the current date. Please try again.'
    case 'CONFIG':
      return GENERIC_FAILURE
  }
}
