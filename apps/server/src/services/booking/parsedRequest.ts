import type { AppointmentReference } from "../calendar/types.js";

export type Intent =
  | "create"
  | "reschedule"
  | "cancel"
  | "list"
  | "date_only_create"
  | "slot_choice"
  | "confirm_yes"
  | "confirm_no"
  | "greeting"
  | "smalltalk"
  | "out_of_scope"
  | "unknown";

export interface ClockTime {
  hour: number;
  minute: number;
}

/** Which follow-up, if any, the conversation is waiting on. */
export type PendingKind = "none" | "confirmation" | "slot_choice";

export interface ParsedRequest {
  intent: Intent;
  /** YYYY-MM-DD in the business time zone */
  date?: string;
  time?: ClockTime;
  durationMinutes?: number;
  title?: string;
  reference?: AppointmentReference;
  source: "rules" | "external";
}

export function clockToMinutes(time: ClockTime): number {
  return time.hour * 60 + time.minute;
}
