import type { PendingKind } from "../booking/parsedRequest.js";
import type { Interval } from "../calendar/types.js";

export interface PendingBooking {
  title: string;
  requested: Interval;
  notes?: string;
}

export type ConversationState =
  | { kind: "idle" }
  | {
      kind: "awaiting_confirmation";
      request: PendingBooking;
      proposal: Interval;
      /** set when the offer came out of a reschedule */
      replacesId?: string;
    }
  | {
      kind: "awaiting_slot_choice";
      /** YYYY-MM-DD */
      date: string;
      durationMinutes: number;
      title: string;
      offered: Interval[];
      notes?: string;
    };

export const IDLE: ConversationState = { kind: "idle" };

export function pendingKindOf(state: ConversationState): PendingKind {
  switch (state.kind) {
    case "idle":
      return "none";
    case "awaiting_confirmation":
      return "confirmation";
    case "awaiting_slot_choice":
      return "slot_choice";
  }
}
