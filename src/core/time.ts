/**
 * Time utilities for consistent date handling
 *
 * Trading dates are UTC calendar days in YYYY-MM-DD form.
 */

import { addDays, format, isValid, parseISO } from 'date-fns';

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function toUtcDateString(timestampMs: number): string {
  return new Date(timestampMs).toISOString().slice(0, 10);
}

export function isIsoDate(value: string): boolean {
  return ISO_DATE_PATTERN.test(value) && isValid(parseISO(value));
}

export function shiftIsoDate(dateStr: string, days: number): string {
  return format(addDays(parseISO(dateStr), days), 'yyyy-MM-dd');
}

/**
 * Unix seconds at the start (00:00:00) of a UTC date.
 */
export function utcDayStartSeconds(dateStr: string): number {
  return Math.floor(Date.parse(`${dateStr}T00:00:00Z`) / 1000);
}

/**
 * Unix seconds at the end (23:59:59) of a UTC date.
 */
export function utcDayEndSeconds(dateStr: string): number {
  return utcDayStartSeconds(dateStr) + 24 * 60 * 60 - 1;
}

export function isWithinWindow(updatedAtMs: number, windowMs: number, nowMs: number): boolean {
  return nowMs - updatedAtMs <= windowMs;
}

export function hoursToMs(hours: number): number {
  return hours * 60 * 60 * 1000;
}

export function minutesToMs(minutes: number): number {
  return minutes * 60 * 1000;
}

export function minutesToSeconds(minutes: number): number {
  return minutes * 60;
}
