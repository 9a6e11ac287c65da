/**
 * Clock time helpers
 */

import type { MinuteOfDay } from './types.js'

export const MINUTES_PER_DAY = 24 * 60

const CLOCK_PATTERN = /^(\d{1,2})(?::(\d{2}))?$/

/**
 * Parse "HH:MM", "H:MM" or a bare hour ("9", "21") into minutes of day.
 * "24:00" is accepted as midnight. Returns null for anything else.
 */
export function parseClockTime(value: string | null | undefined): MinuteOfDay | null {
  if (value === null || value === undefined) return null

  const match = value.trim().match(CLOCK_PATTERN)
  if (!match) return null

  const hour = parseInt(match[1], 10)
  const minute = match[2] === undefined ? 0 : parseInt(match[2], 10)

  if (minute > 59) return null
  if (hour === 24 && minute === 0) return 0
  if (hour > 23) return null

  return hour * 60 + minute
}

export function formatClockTime(minutes: MinuteOfDay): string {
  const wrapped = ((minutes % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY
  const hour = Math.floor(wrapped / 60)
  const minute = wrapped % 60
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`
}

/**
 * Local calendar date as YYYY-MM-DD
 */
export function formatDate(date: Date): string {
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  return `${year}-${month}-${day}`
}

export function isIsoDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false
  const parsed = new Date(`${value}T00:00:00Z`)
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value)
}
