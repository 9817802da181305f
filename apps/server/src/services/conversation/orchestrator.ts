import { DEFAULT_TITLE } from "../booking/bookingParser.js";
import { suggestNextFreeSlot } from "../booking/conflictResolver.js";
import { clockToMinutes, type ParsedRequest } from "../booking/parsedRequest.js";
import type { UtteranceParser } from "../booking/utteranceParser.js";
import { isHoliday, isWorkingDay } from "../calendar/businessHours.js";
import type { CalendarStore } from "../calendar/CalendarStore.js";
import { durationMinutes, intervalAt, localDateOf, minutesOfDay } from "../calendar/clock.js";
import type { Appointment, Interval } from "../calendar/types.js";
import type { ChangeAction, OutcomeType, TurnOutcome } from "./outcomes.js";
import { formatOutcome } from "./responseFormatter.js";
import { IDLE, pendingKindOf, type ConversationState } from "./state.js";

export interface TranscriptEntry {
  speaker: "User" | "Assistant";
  text: string;
  outcome?: OutcomeType;
}

export interface TurnResult {
  transcript: TranscriptEntry[];
  state: ConversationState;
  outcome: TurnOutcome;
  request: ParsedRequest;
}

export interface OrchestratorOptions {
  calendar: CalendarStore;
  parser: UtteranceParser;
  clock?: () => Date;
}

interface Step {
  outcome: TurnOutcome;
  state: ConversationState;
}

interface BookingPlan {
  title: string;
  interval: Interval;
  notes?: string;
  /** existing appointment being moved */
  replaces?: Appointment;
}

type AwaitingConfirmation = Extract<ConversationState, { kind: "awaiting_confirmation" }>;
type AwaitingSlotChoice = Extract<ConversationState, { kind: "awaiting_slot_choice" }>;

function assertNever(value: never): never {
  throw new Error(`Unhandled intent: ${JSON.stringify(value)}`);
}

/**
 * Turns one utterance plus the current conversation state into an outcome
 * and the next state. The calendar is the only thing it mutates.
 */
export class Orchestrator {
  private calendar: CalendarStore;
  private parser: UtteranceParser;
  private clock: () => Date;

  constructor(options: OrchestratorOptions) {
    this.calendar = options.calendar;
    this.parser = options.parser;
    this.clock = options.clock ?? (() => new Date());
  }

  async handleTurn(text: string, state: ConversationState = IDLE): Promise<TurnResult> {
    const now = this.clock();
    const request = await this.parser.resolve(text, now, pendingKindOf(state));
    const step = this.dispatch(request, state, text);

    console.log("📅 turn", {
      intent: request.intent,
      source: request.source,
      outcome: step.outcome.type,
      state: step.state.kind,
    });

    return {
      transcript: [
        { speaker: "User", text },
        {
          speaker: "Assistant",
          text: formatOutcome(step.outcome, this.calendar.rules),
          outcome: step.outcome.type,
        },
      ],
      state: step.state,
      outcome: step.outcome,
      request,
    };
  }

  private dispatch(request: ParsedRequest, state: ConversationState, text: string): Step {
    const intent = request.intent;
    switch (intent) {
      case "greeting":
        return { outcome: { type: "greeting", smalltalk: false }, state };
      case "smalltalk":
        return { outcome: { type: "greeting", smalltalk: true }, state };
      case "out_of_scope":
        return { outcome: { type: "out-of-scope" }, state };
      case "unknown":
        return { outcome: { type: "clarification", missing: "details" }, state };
      case "list":
        return { outcome: { type: "list", appointments: this.calendar.listAll() }, state };
      case "create":
        return this.handleCreate(request, text);
      case "date_only_create":
        return this.handleDateOnly(request, text);
      case "slot_choice":
        return state.kind === "awaiting_slot_choice"
          ? this.handleSlotChoice(request, state)
          : { outcome: { type: "nothing-pending" }, state };
      case "confirm_yes":
        if (state.kind === "awaiting_confirmation") return this.handleConfirm(state);
        if (state.kind === "awaiting_slot_choice") {
          return { outcome: { type: "slot-reprompt", date: state.date, slots: state.offered }, state };
        }
        return { outcome: { type: "nothing-pending" }, state };
      case "confirm_no":
        if (state.kind === "idle") return { outcome: { type: "nothing-pending" }, state };
        return { outcome: { type: "declined" }, state: IDLE };
      case "reschedule":
        return this.handleReschedule(request);
      case "cancel":
        return this.handleCancel(request);
      default:
        return assertNever(intent);
    }
  }

  private handleCreate(request: ParsedRequest, text: string): Step {
    if (!request.date || !request.time) {
      return { outcome: { type: "clarification", missing: "details" }, state: IDLE };
    }
    const duration = request.durationMinutes ?? this.calendar.rules.defaultDurationMinutes;
    return this.book({
      title: request.title ?? DEFAULT_TITLE,
      interval: intervalAt(request.date, clockToMinutes(request.time), duration, this.calendar.rules.timeZone),
      notes: text,
    });
  }

  /** Shared by create and reschedule: hours first, then conflicts, then the resolver. */
  private book(plan: BookingPlan): Step {
    const { interval, replaces } = plan;
    const check = this.calendar.checkBusinessHours(interval);
    if (!check.valid) {
      return { outcome: { type: "invalid-hours", reason: check.reason }, state: IDLE };
    }

    const conflicts = this.calendar.findConflicts(interval, replaces?.id);
    if (!conflicts.length) {
      const appointment = this.store(plan.title, interval, plan.notes);
      if (replaces) {
        this.calendar.remove(replaces.id);
        console.log("📅 removed", { id: replaces.id, title: replaces.title });
        return { outcome: { type: "rescheduled", appointment, previous: replaces }, state: IDLE };
      }
      return { outcome: { type: "booked", appointment }, state: IDLE };
    }

    const proposal = suggestNextFreeSlot(this.calendar, interval, replaces?.id);
    if (!proposal) {
      return { outcome: { type: "no-alternative", requested: interval }, state: IDLE };
    }
    return {
      outcome: { type: "conflict-offer", title: plan.title, requested: interval, conflicts, proposal },
      state: {
        kind: "awaiting_confirmation",
        request: { title: plan.title, requested: interval, ...(plan.notes ? { notes: plan.notes } : {}) },
        proposal,
        ...(replaces ? { replacesId: replaces.id } : {}),
      },
    };
  }

  private handleConfirm(state: AwaitingConfirmation): Step {
    const { proposal, replacesId } = state;
    const check = this.calendar.checkBusinessHours(proposal);
    if (!check.valid) {
      return { outcome: { type: "confirm-failed", reason: check.reason }, state: IDLE };
    }
    if (this.calendar.findConflicts(proposal, replacesId).length) {
      return { outcome: { type: "confirm-failed", reason: "conflict" }, state: IDLE };
    }

    const appointment = this.store(state.request.title, proposal, state.request.notes);
    const previous = replacesId ? this.calendar.remove(replacesId) : null;
    if (previous) {
      console.log("📅 removed", { id: previous.id, title: previous.title });
      return { outcome: { type: "confirmed", appointment, previous }, state: IDLE };
    }
    return { outcome: { type: "confirmed", appointment }, state: IDLE };
  }

  private handleDateOnly(request: ParsedRequest, text: string): Step {
    const { rules } = this.calendar;
    if (!request.date) {
      return { outcome: { type: "clarification", missing: "details" }, state: IDLE };
    }
    const duration = request.durationMinutes ?? rules.defaultDurationMinutes;
    const title = request.title ?? DEFAULT_TITLE;
    const slots = this.calendar.getAvailableSlots(request.date, duration);
    if (!slots.length) {
      const closed = !isWorkingDay(request.date, rules) || isHoliday(request.date, rules);
      return { outcome: { type: "no-slots", date: request.date, closed }, state: IDLE };
    }
    return {
      outcome: { type: "slot-list", date: request.date, title, slots },
      state: {
        kind: "awaiting_slot_choice",
        date: request.date,
        durationMinutes: duration,
        title,
        offered: slots,
        notes: text,
      },
    };
  }

  private handleSlotChoice(request: ParsedRequest, state: AwaitingSlotChoice): Step {
    const { timeZone } = this.calendar.rules;
    const wanted = request.time ? clockToMinutes(request.time) : null;
    const chosen = state.offered.find((slot) => minutesOfDay(slot.start, timeZone) === wanted);
    if (chosen && this.calendar.isFree(chosen)) {
      const appointment = this.store(state.title, chosen, state.notes);
      return { outcome: { type: "booked", appointment }, state: IDLE };
    }

    const refreshed = this.calendar.getAvailableSlots(state.date, state.durationMinutes);
    if (!refreshed.length) {
      return { outcome: { type: "no-slots", date: state.date, closed: false }, state: IDLE };
    }
    return {
      outcome: { type: "slot-reprompt", date: state.date, slots: refreshed },
      state: { ...state, offered: refreshed },
    };
  }

  private handleReschedule(request: ParsedRequest): Step {
    const match = this.match(request, "reschedule");
    if (!("appointment" in match)) return match;
    const target = match.appointment;

    if (!request.date && !request.time) {
      return { outcome: { type: "clarification", missing: "new-time" }, state: IDLE };
    }
    const { timeZone } = this.calendar.rules;
    const date = request.date ?? localDateOf(target.start, timeZone);
    const start = request.time ? clockToMinutes(request.time) : minutesOfDay(target.start, timeZone);
    const duration = request.durationMinutes ?? durationMinutes(target);

    return this.book({
      title: target.title,
      interval: intervalAt(date, start, duration, timeZone),
      notes: target.notes,
      replaces: target,
    });
  }

  private handleCancel(request: ParsedRequest): Step {
    const match = this.match(request, "cancel");
    if (!("appointment" in match)) return match;
    const removed = this.calendar.remove(match.appointment.id) ?? match.appointment;
    console.log("📅 cancelled", { id: removed.id, title: removed.title });
    return { outcome: { type: "cancelled", appointment: removed }, state: IDLE };
  }

  private match(request: ParsedRequest, action: ChangeAction): Step | { appointment: Appointment } {
    const candidates = this.calendar.findByReference(request.reference ?? {});
    if (candidates.length === 1) return { appointment: candidates[0] };
    if (!candidates.length) {
      return { outcome: { type: "not-found", action, appointments: this.calendar.listAll() }, state: IDLE };
    }
    return { outcome: { type: "ambiguous-match", action, candidates }, state: IDLE };
  }

  private store(title: string, interval: Interval, notes?: string): Appointment {
    const appointment = this.calendar.add({
      title,
      start: interval.start,
      end: interval.end,
      ...(notes ? { notes } : {}),
    });
    console.log("📅 booked", {
      id: appointment.id,
      title: appointment.title,
      start: appointment.start.toISOString(),
      end: appointment.end.toISOString(),
    });
    return appointment;
  }
}
