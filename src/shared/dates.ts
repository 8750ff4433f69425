// ──────────────────────────────────────────
// Calendar date helpers (UTC days, YYYY-MM-DD strings)
// ──────────────────────────────────────────

import type { IsoDate } from './types';
import { ValidationError } from './errors';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const d = new Date(`${value}T00:00:00.000Z`);
  return !isNaN(d.getTime()) && d.toISOString().slice(0, 10) === value;
}

export function assertIsoDate(value: string, field = 'date'): IsoDate {
  if (!isIsoDate(value)) {
    throw new ValidationError(`${field} must be a calendar date (YYYY-MM-DD), got "${value}"`);
  }
  return value;
}

export function toIsoDate(d: Date): IsoDate {
  return d.toISOString().slice(0, 10);
}

export function startOfDay(date: IsoDate): Date {
  return new Date(`${date}T00:00:00.000Z`);
}

export function addDays(date: IsoDate, days: number): IsoDate {
  const d = startOfDay(date);
  d.setUTCDate(d.getUTCDate() + days);
  return toIsoDate(d);
}

/** `[start, end)` of one UTC day. */
export function dayBounds(date: IsoDate): { start: Date; end: Date } {
  return { start: startOfDay(date), end: startOfDay(addDays(date, 1)) };
}

/** Every date in `[start, end)`. */
export function eachDay(start: IsoDate, end: IsoDate): IsoDate[] {
  const days: IsoDate[] = [];
  for (let current = start; current < end; current = addDays(current, 1)) {
    days.push(current);
  }
  return days;
}

export function today(): IsoDate {
  return toIsoDate(new Date());
}

export function daysInMonth(date: IsoDate): number {
  const d = startOfDay(date);
  return new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth() + 1, 0)).getUTCDate();
}

export function daysInYear(date: IsoDate): number {
  const year = startOfDay(date).getUTCFullYear();
  const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  return leap ? 366 : 365;
}

/** Monday of the ISO week containing `date`. */
export function weekStart(date: IsoDate): IsoDate {
  const day = startOfDay(date).getUTCDay();
  return addDays(date, day === 0 ? -6 : 1 - day);
}

/** Whole days from `start` to `end`; negative when `end` is earlier. */
export function daysBetween(start: IsoDate, end: IsoDate): number {
  return Math.round((startOfDay(end).getTime() - startOfDay(start).getTime()) / 86_400_000);
}
