import dayjs from "dayjs";
import utc from "dayjs/plugin/utc.js";
import timezone from "dayjs/plugin/timezone.js";
import { formatTimeOfDay, type TimeOfDay } from "../../config/businessRules.js";
import type { Interval } from "./types.js";

dayjs.extend(utc);
dayjs.extend(timezone);

export const MINUTE_MS = 60 * 1000;

export function toZone(date: Date, timeZone: string) {
  return dayjs(date).tz(timeZone);
}

export function localDateOf(date: Date, timeZone: string): string {
  return toZone(date, timeZone).format("YYYY-MM-DD");
}

export function minutesOfDay(date: Date, timeZone: string): TimeOfDay {
  const local = toZone(date, timeZone);
  return local.hour() * 60 + local.minute();
}

export function atLocalTime(dateISO: string, minutes: TimeOfDay, timeZone: string): Date {
  return dayjs.tz(`${dateISO}T${formatTimeOfDay(minutes)}`, timeZone).toDate();
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * MINUTE_MS);
}

export function durationMinutes(interval: Interval): number {
  return Math.round((interval.end.getTime() - interval.start.getTime()) / MINUTE_MS);
}

export function intervalAt(dateISO: string, minutes: TimeOfDay, duration: number, timeZone: string): Interval {
  const start = atLocalTime(dateISO, minutes, timeZone);
  return { start, end: addMinutes(start, duration) };
}

export function overlaps(a: Interval, b: Interval): boolean {
  return a.start.getTime() < b.end.getTime() && b.start.getTime() < a.end.getTime();
}
