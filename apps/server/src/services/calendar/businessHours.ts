import type { BusinessRules } from "../../config/businessRules.js";
import { durationMinutes, localDateOf, minutesOfDay, toZone } from "./clock.js";
import type { BusinessHoursCheck, Interval } from "./types.js";

export function isWorkingDay(dateISO: string, rules: BusinessRules): boolean {
  const weekday = new Date(`${dateISO}T12:00:00Z`).getUTCDay();
  return rules.workingDays.includes(weekday);
}

export function isHoliday(dateISO: string, rules: BusinessRules): boolean {
  return rules.holidays.some((holiday) =>
    holiday.length === 5 ? dateISO.slice(5) === holiday : dateISO === holiday
  );
}

export function checkBusinessHours(interval: Interval, rules: BusinessRules): BusinessHoursCheck {
  const dateISO = localDateOf(interval.start, rules.timeZone);
  if (!rules.workingDays.includes(toZone(interval.start, rules.timeZone).day())) {
    return { valid: false, reason: "weekend" };
  }
  if (isHoliday(dateISO, rules)) {
    return { valid: false, reason: "holiday" };
  }

  const start = minutesOfDay(interval.start, rules.timeZone);
  // measured from the start so an interval running past midnight still counts as late
  const end = start + durationMinutes(interval);

  if (start < rules.open || end > rules.close) {
    return { valid: false, reason: "outside-hours" };
  }
  if (start > rules.lastStart) {
    return { valid: false, reason: "starts-after-last-slot" };
  }
  if (start < rules.lunch.end && end > rules.lunch.start) {
    return { valid: false, reason: "crosses-lunch" };
  }
  return { valid: true };
}
