import dayjs from "dayjs";
import utc from "dayjs/plugin/utc.js";
import { formatTimeOfDay12h, type BusinessRules } from "../../config/businessRules.js";
import { toZone } from "../calendar/clock.js";
import type { Appointment, BusinessHoursViolation, Interval } from "../calendar/types.js";
import type { TurnOutcome } from "./outcomes.js";

dayjs.extend(utc);

const DAY_NAMES = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];

function formatDay(date: Date, rules: BusinessRules) {
  return toZone(date, rules.timeZone).format("dddd, MMMM D");
}

function formatClock(date: Date, rules: BusinessRules) {
  return toZone(date, rules.timeZone).format("h:mm A");
}

function formatWhen(date: Date, rules: BusinessRules) {
  return toZone(date, rules.timeZone).format("dddd, MMMM D [at] h:mm A");
}

function formatDateISO(dateISO: string) {
  return dayjs.utc(dateISO).format("dddd, MMMM D");
}

function formatRange(interval: Interval, rules: BusinessRules) {
  return `${formatWhen(interval.start, rules)} to ${formatClock(interval.end, rules)}`;
}

function formatAppointmentLine(appointment: Appointment, rules: BusinessRules) {
  return `• ${appointment.title}: ${formatRange(appointment, rules)}`;
}

function formatSlotTimes(slots: Interval[], rules: BusinessRules) {
  return slots.map((slot) => toZone(slot.start, rules.timeZone).format("HH:mm")).join(", ");
}

export function describeWorkingDays(rules: BusinessRules) {
  const days = [...rules.workingDays].sort((a, b) => a - b);
  const contiguous = days.every((day, index) => index === 0 || day === days[index - 1] + 1);
  if (contiguous && days.length > 2) {
    return `${DAY_NAMES[days[0]]} to ${DAY_NAMES[days[days.length - 1]]}`;
  }
  return days.map((day) => DAY_NAMES[day]).join(", ");
}

export function describeHours(rules: BusinessRules) {
  return (
    `We're open ${describeWorkingDays(rules)}, ${formatTimeOfDay12h(rules.open)} to ${formatTimeOfDay12h(rules.close)} ` +
    `(last start ${formatTimeOfDay12h(rules.lastStart)}), and closed for lunch ` +
    `${formatTimeOfDay12h(rules.lunch.start)} to ${formatTimeOfDay12h(rules.lunch.end)}.`
  );
}

export function describeViolation(reason: BusinessHoursViolation, rules: BusinessRules) {
  switch (reason) {
    case "weekend":
      return `We only schedule on ${describeWorkingDays(rules)}, not on weekends.`;
    case "holiday":
      return "We're closed on holidays. Please choose a different day.";
    case "outside-hours":
      return `Appointments must start at or after ${formatTimeOfDay12h(rules.open)} and end by ${formatTimeOfDay12h(rules.close)}.`;
    case "starts-after-last-slot":
      return `The latest appointment start is ${formatTimeOfDay12h(rules.lastStart)}. Please choose an earlier time.`;
    case "crosses-lunch":
      return `We're closed for lunch between ${formatTimeOfDay12h(rules.lunch.start)} and ${formatTimeOfDay12h(rules.lunch.end)}. Please pick a time outside that window.`;
  }
}

export function formatOutcome(outcome: TurnOutcome, rules: BusinessRules): string {
  switch (outcome.type) {
    case "greeting":
      return outcome.smalltalk
        ? "I'm doing well, thank you for asking! How can I help with your calendar today? I can book, reschedule, or cancel appointments."
        : "Hello! I'm your appointment assistant. You can ask me to book, reschedule, or cancel appointments, or to show what's on your calendar.";

    case "out-of-scope":
      return (
        "I'm here only to help with appointments: booking, rescheduling, or cancelling. " +
        'Try something like "Book a meeting tomorrow at 2pm" or "What do I have scheduled?"'
      );

    case "clarification":
      return outcome.missing === "new-time"
        ? 'I couldn\'t understand the new time. Please say something like "to 4pm" or "to Friday at 2:30pm".'
        : 'I couldn\'t confidently understand that. Please include a date, a time, and a short description, for example "Book a dentist appointment tomorrow at 3pm".';

    case "list":
      if (!outcome.appointments.length) {
        return 'You don\'t have any appointments yet. Say something like "Book a meeting tomorrow at 2pm" to add one.';
      }
      return [
        `You have ${outcome.appointments.length} appointment(s):`,
        ...outcome.appointments.map((appointment) => formatAppointmentLine(appointment, rules)),
      ].join("\n");

    case "booked":
      return (
        `Your appointment "${outcome.appointment.title}" is booked on ${formatDay(outcome.appointment.start, rules)} ` +
        `from ${formatClock(outcome.appointment.start, rules)} to ${formatClock(outcome.appointment.end, rules)}.`
      );

    case "rescheduled":
      return (
        `Done. "${outcome.appointment.title}" moved from ${formatWhen(outcome.previous.start, rules)} ` +
        `to ${formatRange(outcome.appointment, rules)}.`
      );

    case "conflict-offer": {
      const titles = outcome.conflicts.map((appointment) => `"${appointment.title}"`).join(", ");
      return (
        `That time conflicts with ${titles}. The next free time that day is ${formatRange(outcome.proposal, rules)}. ` +
        "Would you like me to book it? Reply yes to confirm or no to decline."
      );
    }

    case "no-alternative":
      return (
        `${formatWhen(outcome.requested.start, rules)} conflicts with an existing appointment and I couldn't find a free slot later that day. ` +
        "No booking was made. Please choose a different day."
      );

    case "confirmed":
      if (outcome.previous) {
        return (
          `Confirmed. "${outcome.appointment.title}" moved from ${formatWhen(outcome.previous.start, rules)} ` +
          `to ${formatRange(outcome.appointment, rules)}.`
        );
      }
      return (
        `Confirmed. "${outcome.appointment.title}" is booked on ${formatDay(outcome.appointment.start, rules)} ` +
        `from ${formatClock(outcome.appointment.start, rules)} to ${formatClock(outcome.appointment.end, rules)}.`
      );

    case "confirm-failed":
      return outcome.reason === "conflict"
        ? "Sorry, that time has been taken in the meantime. No booking was made."
        : `Sorry, that time can no longer be booked. ${describeViolation(outcome.reason, rules)} No booking was made.`;

    case "declined":
      return "No problem, nothing was booked. Suggest another date or time when you're ready.";

    case "slot-list":
      return (
        `On ${formatDateISO(outcome.date)} the available times for "${outcome.title}" are: ${formatSlotTimes(outcome.slots, rules)}. ` +
        "Which time would you like? (e.g. 2pm or 14:00)"
      );

    case "no-slots":
      return outcome.closed
        ? `Sorry, there are no available slots on ${formatDateISO(outcome.date)}. We're closed on weekends and holidays. Try another day.`
        : `Sorry, ${formatDateISO(outcome.date)} is fully booked. Try another day.`;

    case "slot-reprompt":
      return `Please pick one of the available times on ${formatDateISO(outcome.date)}: ${formatSlotTimes(outcome.slots, rules)}.`;

    case "invalid-hours":
      return `${describeViolation(outcome.reason, rules)} ${describeHours(rules)}`;

    case "ambiguous-match":
      return [
        `I found more than one appointment that could match. Which one do you want to ${outcome.action}?`,
        ...outcome.candidates.map((appointment) => formatAppointmentLine(appointment, rules)),
        "Please mention the exact title or date.",
      ].join("\n");

    case "not-found":
      if (!outcome.appointments.length) {
        return `You don't have any appointments to ${outcome.action}. Would you like to book one?`;
      }
      return [
        "I couldn't find that appointment. Your current appointments are:",
        ...outcome.appointments.map((appointment) => formatAppointmentLine(appointment, rules)),
        `Please mention the exact title or date of the one you want to ${outcome.action}.`,
      ].join("\n");

    case "cancelled":
      return `I've cancelled "${outcome.appointment.title}" that was on ${formatWhen(outcome.appointment.start, rules)}.`;

    case "nothing-pending":
      return "There's nothing waiting for your confirmation right now. What would you like to schedule?";
  }
}
