/**
 * Event Timing
 *
 * Enforces the event timestamp policy on validated records:
 * - start_time and end_time are both present or both absent
 * - an event with a single timestamp is instantaneous (end = start)
 * - duration_hours is the elapsed time whenever start and end differ
 *
 * Parsing is conservative: anything unrecognised leaves the event untouched.
 */

import type { SofEvent } from './types';

const MS_PER_HOUR = 3_600_000;

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

// Year used when the document omits it; a leap year so 29 Feb always parses
const PLACEHOLDER_YEAR = 2000;

export interface EventClock {
  hours: number;
  minutes: number;
  seconds: number;
}

export interface EventDay {
  year: number | null;
  /** 0-based month */
  month: number;
  day: number;
}

function hasValue(value: string | null | undefined): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

/**
 * Parse a clock time: "08:00", "0800", "8.30", "14:00 hrs", "2:15 pm", "06:45:30".
 */
export function parseEventTime(raw: string): EventClock | null {
  const match = raw
    .trim()
    .match(/^(\d{1,2})[:.h]?(\d{2})(?::(\d{2}))?\s*(am|pm)?\s*(?:hours|hrs?|h|lt)?\.?$/i);
  if (!match) return null;

  let hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  const seconds = match[3] ? parseInt(match[3], 10) : 0;
  const meridiem = match[4]?.toLowerCase();

  if (meridiem) {
    if (hours < 1 || hours > 12) return null;
    if (meridiem === 'pm' && hours !== 12) hours += 12;
    if (meridiem === 'am' && hours === 12) hours = 0;
  }

  if (hours > 24 || minutes > 59 || seconds > 59) return null;
  if (hours === 24 && (minutes > 0 || seconds > 0)) return null;

  return { hours, minutes, seconds };
}

function monthIndex(name: string): number {
  return MONTHS.indexOf(name.slice(0, 3).toLowerCase());
}

function normalizeYear(raw: string | undefined): number | null {
  if (!raw) return null;
  const year = parseInt(raw, 10);
  return raw.length === 2 ? 2000 + year : year;
}

function buildDay(year: number | null, month: number, day: number): EventDay | null {
  if (month < 0 || month > 11 || day < 1) return null;
  const probe = new Date(Date.UTC(year ?? PLACEHOLDER_YEAR, month, day));
  if (probe.getUTCMonth() !== month) return null;
  return { year, month, day };
}

/**
 * Parse a calendar date: "2024-03-14", "14/03/2024", "14.03.24", "14 Mar 2024",
 * "14th March", "Mar 14, 2024", optionally prefixed with a weekday.
 * Numeric dates are read day-first.
 */
export function parseEventDate(raw: string): EventDay | null {
  const value = raw
    .trim()
    .replace(/^(mon|tue|wed|thu|fri|sat|sun)[a-z]*\.?,?\s+/i, '');

  let match = value.match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/);
  if (match) {
    return buildDay(parseInt(match[1], 10), parseInt(match[2], 10) - 1, parseInt(match[3], 10));
  }

  match = value.match(/^(\d{1,2})[/.-](\d{1,2})[/.-](\d{2}|\d{4})$/);
  if (match) {
    return buildDay(normalizeYear(match[3]), parseInt(match[2], 10) - 1, parseInt(match[1], 10));
  }

  match = value.match(/^(\d{1,2})(?:st|nd|rd|th)?[\s-]+([a-z]{3,9})\.?,?(?:[\s-]+(\d{2}|\d{4}))?$/i);
  if (match) {
    return buildDay(normalizeYear(match[3]), monthIndex(match[2]), parseInt(match[1], 10));
  }

  match = value.match(/^([a-z]{3,9})\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?(?:\s+(\d{4}))?$/i);
  if (match) {
    return buildDay(normalizeYear(match[3]), monthIndex(match[1]), parseInt(match[2], 10));
  }

  return null;
}

function toEpochMs(day: EventDay, year: number, clock: EventClock): number {
  return Date.UTC(year, day.month, day.day, clock.hours, clock.minutes, clock.seconds);
}

/**
 * Elapsed hours between an event's start and end, rounded to two decimals.
 * Returns null when either timestamp cannot be read or the end precedes the start.
 */
export function computeDurationHours(event: SofEvent): number | null {
  if (!hasValue(event.start_time) || !hasValue(event.end_time)) return null;

  const startClock = parseEventTime(event.start_time);
  const endClock = parseEventTime(event.end_time);
  if (!startClock || !endClock) return null;

  const startDay = hasValue(event.start_date) ? parseEventDate(event.start_date) : null;
  const endDay = hasValue(event.end_date) ? parseEventDate(event.end_date) : null;
  if (hasValue(event.start_date) && !startDay) return null;
  if (hasValue(event.end_date) && !endDay) return null;

  // Without an explicit end date the event ends on its start day, rolling past midnight if needed
  const implicitEndDay = !endDay;
  const fromDay = startDay ?? endDay;
  const toDay = endDay ?? startDay;

  let startMs: number;
  let endMs: number;

  if (fromDay && toDay) {
    const startYear = fromDay.year ?? toDay.year ?? PLACEHOLDER_YEAR;
    let endYear = toDay.year ?? fromDay.year ?? PLACEHOLDER_YEAR;
    // Year-less dates spanning New Year: "31 Dec" to "1 Jan"
    if (fromDay.year === null && toDay.year === null && fromDay.month === 11 && toDay.month === 0) {
      endYear += 1;
    }
    startMs = toEpochMs(fromDay, startYear, startClock);
    endMs = toEpochMs(toDay, endYear, endClock);
  } else {
    const sameDay: EventDay = { year: PLACEHOLDER_YEAR, month: 0, day: 1 };
    startMs = toEpochMs(sameDay, PLACEHOLDER_YEAR, startClock);
    endMs = toEpochMs(sameDay, PLACEHOLDER_YEAR, endClock);
  }

  if (endMs < startMs && implicitEndDay) {
    endMs += 24 * MS_PER_HOUR;
  }

  if (endMs < startMs) return null;

  return Math.round(((endMs - startMs) / MS_PER_HOUR) * 100) / 100;
}

/**
 * Apply the timestamp policy to a single event. Returns a new object.
 * A single timestamp makes the event instantaneous: the missing side takes
 * both the time and the date of the present side, so no duration appears.
 */
export function normalizeEvent(event: SofEvent): SofEvent {
  const normalized: SofEvent = { ...event };

  if (hasValue(normalized.start_time) && !hasValue(normalized.end_time)) {
    normalized.end_time = normalized.start_time;
    alignDates(normalized, hasValue(normalized.start_date) ? normalized.start_date : normalized.end_date);
  } else if (hasValue(normalized.end_time) && !hasValue(normalized.start_time)) {
    normalized.start_time = normalized.end_time;
    alignDates(normalized, hasValue(normalized.end_date) ? normalized.end_date : normalized.start_date);
  }

  const duration = computeDurationHours(normalized);
  if (duration !== null && duration > 0) {
    normalized.duration_hours = duration;
  }

  return normalized;
}

function alignDates(event: SofEvent, date: string | null | undefined): void {
  if (!hasValue(date)) return;
  event.start_date = date;
  event.end_date = date;
}

/**
 * Apply the timestamp policy to every event, keeping document order.
 */
export function normalizeEvents(events: SofEvent[]): SofEvent[] {
  return events.map(normalizeEvent);
}
