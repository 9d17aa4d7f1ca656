import { ScheduleParseError } from './errors'

const DAY_NAMES = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'] as const

const WEEKDAYS = [1, 2, 3, 4, 5]
const WEEKEND = [0, 6]

/**
 * A parsed schedule entry. Unset fields do not restrict; minutes count from
 * local midnight.
 */
export interface ScheduleWindow {
  days?: number[]
  dayOfMonth?: number
  after?: number
  before?: number
}

const TIME = String.raw`(\d{1,2})(?::(\d{2}))?\s*(am|pm)`
const DAY = String.raw`(?:sun|mon|tues|wednes|thurs|fri|satur)days?`

function toMinutes(entry: string, hour: string, minute: string | undefined, meridiem: string): number {
  const h = Number.parseInt(hour, 10)
  const m = minute === undefined ? 0 : Number.parseInt(minute, 10)
  if (h < 1 || h > 12)
    throw new ScheduleParseError(entry, `hour must be between 1 and 12, got ${h}`)
  if (m > 59)
    throw new ScheduleParseError(entry, `minutes must be below 60, got ${m}`)
  return ((h % 12) + (meridiem === 'pm' ? 12 : 0)) * 60 + m
}

function intersectDays(current: number[] | undefined, days: number[]): number[] {
  return current ? current.filter(day => days.includes(day)) : [...days]
}

function parseDayList(list: string): number[] {
  return list
    .split(/\s*(?:,|\band\b|\bor\b)\s*/)
    .filter(Boolean)
    .map((name) => {
      const singular = name.replace(/s$/, '')
      return DAY_NAMES.findIndex(day => day === singular)
    })
}

/**
 * Parse one natural-language schedule entry such as `before 6am on monday`,
 * `after 10pm every weekday` or `on the first day of the month`
 */
export function parseSchedule(entry: string): ScheduleWindow {
  let rest = entry.toLowerCase().trim().replace(/\s+/g, ' ')
  const window: ScheduleWindow = {}

  if (rest === '')
    throw new ScheduleParseError(entry, 'entry is empty')
  if (rest === 'at any time')
    return window

  const take = (pattern: RegExp, apply: (match: RegExpMatchArray) => void): void => {
    const match = rest.match(pattern)
    if (match) {
      apply(match)
      rest = rest.replace(pattern, ' ')
    }
  }

  take(new RegExp(`\\bbefore ${TIME}`), ([, hour, minute, meridiem]) => {
    window.before = toMinutes(entry, hour, minute, meridiem)
  })
  take(new RegExp(`\\bafter ${TIME}`), ([, hour, minute, meridiem]) => {
    window.after = toMinutes(entry, hour, minute, meridiem)
  })
  take(/\bon the first day of the month\b/, () => {
    window.dayOfMonth = 1
  })
  take(/\b(?:every weekday|on weekdays)\b/, () => {
    window.days = intersectDays(window.days, WEEKDAYS)
  })
  take(/\b(?:every weekend|on weekends)\b/, () => {
    window.days = intersectDays(window.days, WEEKEND)
  })
  take(new RegExp(`\\b(?:on|every) (${DAY}(?:\\s*(?:,|and|or)\\s*${DAY})*)`), ([, list]) => {
    window.days = intersectDays(window.days, parseDayList(list))
  })

  const leftover = rest.replace(/\b(?:and)\b|,/g, ' ').trim()
  if (leftover !== '')
    throw new ScheduleParseError(entry, `unrecognised "${leftover}"`)
  if (window.before === undefined && window.after === undefined && window.days === undefined && window.dayOfMonth === undefined)
    throw new ScheduleParseError(entry, 'no time or day restriction found')
  if (window.days !== undefined && window.days.length === 0)
    throw new ScheduleParseError(entry, 'day restrictions never overlap')

  return window
}

export function isValidSchedule(entry: string): boolean {
  try {
    parseSchedule(entry)
    return true
  }
  catch {
    return false
  }
}

export function isValidTimezone(timezone: string): boolean {
  try {
    const _ = new Intl.DateTimeFormat('en-US', { timeZone: timezone })
    return true
  }
  catch {
    return false
  }
}

interface LocalTime {
  day: number
  dayOfMonth: number
  minutes: number
}

function localTime(date: Date, timezone: string): LocalTime {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    weekday: 'long',
    day: 'numeric',
    hour: 'numeric',
    minute: 'numeric',
    hourCycle: 'h23',
  }).formatToParts(date)

  const part = (type: Intl.DateTimeFormatPartTypes): string => parts.find(p => p.type === type)?.value ?? ''

  return {
    day: DAY_NAMES.findIndex(day => day === part('weekday').toLowerCase()),
    dayOfMonth: Number.parseInt(part('day'), 10),
    minutes: (Number.parseInt(part('hour'), 10) % 24) * 60 + Number.parseInt(part('minute'), 10),
  }
}

function admits(window: ScheduleWindow, time: LocalTime): boolean {
  if (window.days && !window.days.includes(time.day))
    return false
  if (window.dayOfMonth !== undefined && window.dayOfMonth !== time.dayOfMonth)
    return false

  const { after, before } = window
  if (after !== undefined && before !== undefined && after >= before) {
    // Overnight window, e.g. `after 10pm and before 5am`
    return time.minutes >= after || time.minutes < before
  }
  if (after !== undefined && time.minutes < after)
    return false
  if (before !== undefined && time.minutes >= before)
    return false
  return true
}

/**
 * Whether any schedule entry admits the given instant. An empty schedule
 * admits every instant.
 */
export function isScheduled(schedule: string[], date: Date = new Date(), timezone: string = 'UTC'): boolean {
  if (schedule.length === 0)
    return true

  const time = localTime(date, timezone)
  return schedule.some(entry => admits(parseSchedule(entry), time))
}
