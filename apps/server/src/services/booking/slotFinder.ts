import type { BusinessRules, TimeOfDay } from "../../config/businessRules.js";
import { checkBusinessHours, isHoliday, isWorkingDay } from "../calendar/businessHours.js";
import { intervalAt, overlaps } from "../calendar/clock.js";
import type { Interval } from "../calendar/types.js";

export interface SlotFinderInput {
  /** YYYY-MM-DD in the business time zone */
  dateISO: string;
  durationMinutes: number;
  rules: BusinessRules;
  busyIntervals: readonly Interval[];
}

export function candidateStarts(rules: BusinessRules): TimeOfDay[] {
  const starts: TimeOfDay[] = [];
  for (let cursor = rules.open; cursor <= rules.lastStart; cursor += rules.granularityMinutes) {
    starts.push(cursor);
  }
  return starts;
}

export function isSlotBusy(slot: Interval, busyIntervals: readonly Interval[]) {
  return busyIntervals.some((interval) => overlaps(slot, interval));
}

export function findAvailableSlots(input: SlotFinderInput): Interval[] {
  const { dateISO, durationMinutes, rules } = input;
  if (!isWorkingDay(dateISO, rules) || isHoliday(dateISO, rules)) {
    return [];
  }

  const slots: Interval[] = [];
  for (const start of candidateStarts(rules)) {
    const slot = intervalAt(dateISO, start, durationMinutes, rules.timeZone);
    if (!checkBusinessHours(slot, rules).valid) continue;
    if (isSlotBusy(slot, input.busyIntervals)) continue;
    slots.push(slot);
  }
  return slots;
}
