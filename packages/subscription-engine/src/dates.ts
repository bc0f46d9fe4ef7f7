// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { addDays, differenceInDays, format, parseISO } from 'date-fns';
import type { CalendarDate } from './types.js';

const CALENDAR_DATE_FORMAT = 'yyyy-MM-dd';

/** Calendar date (local time) of a timestamp. */
export function toCalendarDate(timestamp: Date): CalendarDate {
  return format(timestamp, CALENDAR_DATE_FORMAT);
}

/** Calendar date `days` after the date of `timestamp`. */
export function calendarDateAfter(timestamp: Date, days: number): CalendarDate {
  return format(addDays(timestamp, days), CALENDAR_DATE_FORMAT);
}

/** Shift a calendar date by a whole number of days. */
export function shiftCalendarDate(date: CalendarDate, days: number): CalendarDate {
  return format(addDays(parseISO(date), days), CALENDAR_DATE_FORMAT);
}

/** Whole days elapsed from `earlier` to `later`, truncated toward zero. */
export function wholeDaysBetween(earlier: Date, later: Date): number {
  return differenceInDays(later, earlier);
}
