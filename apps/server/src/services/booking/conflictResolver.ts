import type { CalendarStore } from "../calendar/CalendarStore.js";
import { addMinutes, durationMinutes, minutesOfDay } from "../calendar/clock.js";
import type { Interval } from "../calendar/types.js";

/**
 * Walks forward from the requested start in granularity steps on the same
 * day and returns the first window of the same length that is bookable.
 * Never looks past the last permissible start of that day.
 */
export function suggestNextFreeSlot(
  calendar: CalendarStore,
  candidate: Interval,
  excludeId?: string
): Interval | null {
  const { rules } = calendar;
  const duration = durationMinutes(candidate);
  const firstStart = minutesOfDay(candidate.start, rules.timeZone);

  for (
    let offset = 0;
    firstStart + offset <= rules.lastStart;
    offset += rules.granularityMinutes
  ) {
    const start = addMinutes(candidate.start, offset);
    const trial = { start, end: addMinutes(start, duration) };
    if (calendar.isFree(trial, excludeId)) {
      return trial;
    }
  }
  return null;
}
