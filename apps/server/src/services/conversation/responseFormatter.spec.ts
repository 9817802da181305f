import { describe, it, expect } from "vitest";
import { createBusinessRules } from "../../config/businessRules.js";
import { intervalAt } from "../calendar/clock.js";
import { describeViolation, describeWorkingDays, formatOutcome } from "./responseFormatter.js";

const rules = createBusinessRules();

describe("describeWorkingDays", () => {
  it("collapses a run of days into a range", () => {
    expect(describeWorkingDays(rules)).toBe("Monday to Friday");
    expect(describeWorkingDays(createBusinessRules({ workingDays: [5, 1, 3] }))).toBe("Monday, Wednesday, Friday");
    expect(describeWorkingDays(createBusinessRules({ workingDays: [5, 6] }))).toBe("Friday, Saturday");
  });
});

describe("describeViolation", () => {
  it("names the rule that was broken", () => {
    expect(describeViolation("weekend", rules)).toBe("We only schedule on Monday to Friday, not on weekends.");
    expect(describeViolation("starts-after-last-slot", rules)).toBe(
      "The latest appointment start is 4:30 PM. Please choose an earlier time."
    );
    expect(describeViolation("crosses-lunch", rules)).toBe(
      "We're closed for lunch between 1:00 PM and 2:00 PM. Please pick a time outside that window."
    );
  });
});

describe("formatOutcome", () => {
  it("describes an empty calendar", () => {
    expect(formatOutcome({ type: "list", appointments: [] }, rules)).toBe(
      'You don\'t have any appointments yet. Say something like "Book a meeting tomorrow at 2pm" to add one.'
    );
  });

  it("renders times in the business time zone", () => {
    const slot = intervalAt("2026-10-20", 570, 30, rules.timeZone);

    expect(formatOutcome({ type: "slot-reprompt", date: "2026-10-20", slots: [slot] }, rules)).toBe(
      "Please pick one of the available times on Tuesday, October 20: 09:30."
    );
    expect(formatOutcome({ type: "no-alternative", requested: slot }, rules)).toBe(
      "Tuesday, October 20 at 9:30 AM conflicts with an existing appointment and I couldn't find a free slot later that day. " +
        "No booking was made. Please choose a different day."
    );
  });

  it("distinguishes a full day from a closed one", () => {
    expect(formatOutcome({ type: "no-slots", date: "2026-10-20", closed: false }, rules)).toBe(
      "Sorry, Tuesday, October 20 is fully booked. Try another day."
    );
  });

  it("explains a confirmation that can no longer be honoured", () => {
    expect(formatOutcome({ type: "confirm-failed", reason: "holiday" }, rules)).toBe(
      "Sorry, that time can no longer be booked. We're closed on holidays. Please choose a different day. No booking was made."
    );
  });

  it("answers small talk warmly", () => {
    expect(formatOutcome({ type: "greeting", smalltalk: true }, rules)).toBe(
      "I'm doing well, thank you for asking! How can I help with your calendar today? I can book, reschedule, or cancel appointments."
    );
    expect(formatOutcome({ type: "nothing-pending" }, rules)).toBe(
      "There's nothing waiting for your confirmation right now. What would you like to schedule?"
    );
  });
});
