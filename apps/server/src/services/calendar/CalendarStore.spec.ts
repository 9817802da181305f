import { describe, it, expect, beforeEach } from "vitest";
import { createBusinessRules } from "../../config/businessRules.js";
import { CalendarStore } from "./CalendarStore.js";
import { intervalAt, toZone } from "./clock.js";

const rules = createBusinessRules();
const at = (dateISO: string, minutes: number, duration = 30) =>
  intervalAt(dateISO, minutes, duration, rules.timeZone);
const local = (date: Date) => toZone(date, rules.timeZone).format("YYYY-MM-DD HH:mm");

describe("CalendarStore", () => {
  let calendar: CalendarStore;

  beforeEach(() => {
    calendar = new CalendarStore(rules);
  });

  it("assigns ids and keeps appointments ordered by start", () => {
    const late = calendar.add({ title: "review", ...at("2026-10-20", 900) });
    const early = calendar.add({ title: "standup", ...at("2026-10-20", 540) });

    expect(late.id).not.toBe(early.id);
    expect(calendar.listAll().map((appointment) => appointment.title)).toEqual(["standup", "review"]);
  });

  it("treats intervals as half-open", () => {
    const existing = calendar.add({ title: "standup", ...at("2026-10-20", 600, 60) });

    expect(calendar.findConflicts(at("2026-10-20", 660))).toEqual([]);
    expect(calendar.findConflicts(at("2026-10-20", 570))).toEqual([]);
    expect(calendar.findConflicts(at("2026-10-20", 630)).map((appointment) => appointment.id)).toEqual([
      existing.id,
    ]);
    expect(calendar.findConflicts(at("2026-10-20", 630), existing.id)).toEqual([]);
  });

  it("reports free intervals only when hours and calendar allow", () => {
    calendar.add({ title: "standup", ...at("2026-10-20", 600, 60) });

    expect(calendar.isFree(at("2026-10-20", 660))).toBe(true);
    expect(calendar.isFree(at("2026-10-20", 630))).toBe(false);
    expect(calendar.isFree(at("2026-10-20", 780))).toBe(false);
  });

  it("removes by id", () => {
    const appointment = calendar.add({ title: "standup", ...at("2026-10-20", 600) });

    expect(calendar.remove("missing")).toBeNull();
    expect(calendar.remove(appointment.id)?.title).toBe("standup");
    expect(calendar.get(appointment.id)).toBeNull();
    expect(calendar.listAll()).toEqual([]);
  });

  it("hands out copies from listAll", () => {
    calendar.add({ title: "standup", ...at("2026-10-20", 600) });
    const [copy] = calendar.listAll();
    copy.title = "changed";
    copy.start.setTime(at("2026-10-20", 900).start.getTime());

    const [stored] = calendar.listAll();
    expect(stored.title).toBe("standup");
    expect(local(stored.start)).toBe("2026-10-20 10:00");
  });

  it("drops exactly the booked slot and restores it on cancel", () => {
    const before = calendar.getAvailableSlots("2026-10-20", 30).map((slot) => local(slot.start));
    const appointment = calendar.add({ title: "checkup", ...at("2026-10-20", 600) });
    const during = calendar.getAvailableSlots("2026-10-20", 30).map((slot) => local(slot.start));

    expect(before.filter((start) => !during.includes(start))).toEqual(["2026-10-20 10:00"]);
    expect(during).toHaveLength(before.length - 1);

    calendar.remove(appointment.id);
    expect(calendar.getAvailableSlots("2026-10-20", 30).map((slot) => local(slot.start))).toEqual(before);
  });

  describe("findByReference", () => {
    beforeEach(() => {
      calendar.add({ title: "team meeting", ...at("2026-10-20", 600) });
      calendar.add({ title: "dentist", ...at("2026-10-21", 540) });
    });

    it("matches titles by substring in either direction", () => {
      expect(calendar.findByReference({ phrase: "meeting" }).map((a) => a.title)).toEqual(["team meeting"]);
      expect(calendar.findByReference({ phrase: "Dentist appointment" }).map((a) => a.title)).toEqual([
        "dentist",
      ]);
    });

    it("narrows by date", () => {
      expect(calendar.findByReference({ phrase: "meeting", date: "2026-10-20" }).map((a) => a.title)).toEqual([
        "team meeting",
      ]);
      expect(calendar.findByReference({ phrase: "meeting", date: "2026-10-21" })).toEqual([]);
      expect(calendar.findByReference({ date: "2026-10-21" }).map((a) => a.title)).toEqual(["dentist"]);
      expect(calendar.findByReference({ phrase: "appointment", date: "2026-10-21" }).map((a) => a.title)).toEqual([
        "dentist",
      ]);
    });

    it("never falls back to another title on the named date", () => {
      expect(calendar.findByReference({ phrase: "dentist", date: "2026-10-20" })).toEqual([]);
    });

    it("returns nothing for an unknown title without a date", () => {
      expect(calendar.findByReference({ phrase: "yoga class" })).toEqual([]);
    });

    it("treats generic words as every appointment", () => {
      expect(calendar.findByReference({ phrase: "appointment" })).toHaveLength(2);
      expect(calendar.findByReference({})).toHaveLength(2);
    });
  });
});
