import { addDays, format, isValid, parseISO, startOfWeek } from 'date-fns';
import type { DayName, DayNumber } from './types';

export const WEEKDAYS: readonly DayName[] = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
];

export const DAY_NUMBERS: readonly DayNumber[] = [1, 2, 3, 4, 5, 6, 7];

export function isDayNumber(value: number): value is DayNumber {
  return Number.isInteger(value) && value >= 1 && value <= 7;
}

/**
 * Monday-start day name for a day number
 */
export function dayName(day: DayNumber): DayName {
  return WEEKDAYS[day - 1];
}

/**
 * Monday of the week containing the date
 */
export function weekStartFor(date: Date): Date {
  return startOfWeek(date, { weekStartsOn: 1 });
}

/**
 * Parse a yyyy-MM-dd week start, snapping to that week's Monday
 */
export function parseWeekStart(value: string): Date | null {
  const parsed = parseISO(value);
  return isValid(parsed) ? weekStartFor(parsed) : null;
}

/**
 * Calendar date (yyyy-MM-dd) of a day in the planned week
 */
export function scheduledDateFor(weekStart: Date, day: DayNumber): string {
  return format(addDays(weekStartFor(weekStart), day - 1), 'yyyy-MM-dd');
}

export function formatWeekStart(weekStart: Date): string {
  return format(weekStartFor(weekStart), 'yyyy-MM-dd');
}
