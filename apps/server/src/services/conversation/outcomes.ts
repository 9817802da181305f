import type { Appointment, BusinessHoursViolation, Interval } from "../calendar/types.js";

export type ChangeAction = "cancel" | "reschedule";

export type TurnOutcome =
  | { type: "greeting"; smalltalk: boolean }
  | { type: "out-of-scope" }
  | { type: "clarification"; missing: "details" | "new-time" }
  | { type: "list"; appointments: Appointment[] }
  | { type: "booked"; appointment: Appointment }
  | { type: "rescheduled"; appointment: Appointment; previous: Appointment }
  | { type: "conflict-offer"; title: string; requested: Interval; conflicts: Appointment[]; proposal: Interval }
  | { type: "no-alternative"; requested: Interval }
  | { type: "confirmed"; appointment: Appointment; previous?: Appointment }
  | { type: "confirm-failed"; reason: BusinessHoursViolation | "conflict" }
  | { type: "declined" }
  | { type: "slot-list"; date: string; title: string; slots: Interval[] }
  | { type: "no-slots"; date: string; closed: boolean }
  | { type: "slot-reprompt"; date: string; slots: Interval[] }
  | { type: "invalid-hours"; reason: BusinessHoursViolation }
  | { type: "ambiguous-match"; action: ChangeAction; candidates: Appointment[] }
  | { type: "not-found"; action: ChangeAction; appointments: Appointment[] }
  | { type: "cancelled"; appointment: Appointment }
  | { type: "nothing-pending" };

export type OutcomeType = TurnOutcome["type"];
