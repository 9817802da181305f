import { describe, it, expect, beforeEach } from "vitest";
import { createBusinessRules } from "../../config/businessRules.js";
import { CalendarStore } from "../calendar/CalendarStore.js";
import { intervalAt, toZone } from "../calendar/clock.js";
import type { Interval } from "../calendar/types.js";
import { suggestNextFreeSlot } from "./conflictResolver.js";

const rules = createBusinessRules();
const at = (minutes: number, duration = 30) => intervalAt("2026-10-20", minutes, duration, rules.timeZone);
const span = (interval: Interval | null) =>
  interval
    ? `${toZone(interval.start, rules.timeZone).format("HH:mm")}-${toZone(interval.end, rules.timeZone).format("HH:mm")}`
    : null;

describe("suggestNextFreeSlot", () => {
  let calendar: CalendarStore;

  beforeEach(() => {
    calendar = new CalendarStore(rules);
  });

  it("offers the first free window after the conflict", () => {
    calendar.add({ title: "standup", ...at(600, 60) });

    expect(span(suggestNextFreeSlot(calendar, at(630)))).toBe("11:00-11:30");
    expect(span(suggestNextFreeSlot(calendar, at(600)))).toBe("11:00-11:30");
  });

  it("keeps the requested duration", () => {
    calendar.add({ title: "standup", ...at(600, 60) });

    expect(span(suggestNextFreeSlot(calendar, at(570, 60)))).toBe("11:00-12:00");
  });

  it("steps over the lunch break", () => {
    calendar.add({ title: "planning", ...at(720, 60) });

    expect(span(suggestNextFreeSlot(calendar, at(750)))).toBe("14:00-14:30");
  });

  it("gives up at the end of the day", () => {
    calendar.add({ title: "wrap-up", ...at(960, 60) });

    expect(suggestNextFreeSlot(calendar, at(990))).toBeNull();
  });

  it("ignores the excluded appointment", () => {
    const moving = calendar.add({ title: "standup", ...at(600, 60) });

    expect(span(suggestNextFreeSlot(calendar, at(630), moving.id))).toBe("10:30-11:00");
  });
});
