import type { BusinessRules } from "../../config/businessRules.js";
import type { UtteranceParser } from "../booking/utteranceParser.js";
import { CalendarStore } from "../calendar/CalendarStore.js";
import type { Appointment } from "../calendar/types.js";
import { Orchestrator, type TranscriptEntry, type TurnResult } from "./orchestrator.js";
import { IDLE, type ConversationState } from "./state.js";

interface Session {
  calendar: CalendarStore;
  orchestrator: Orchestrator;
  state: ConversationState;
  transcript: TranscriptEntry[];
  /** tail of the per-session turn chain */
  queue: Promise<unknown>;
}

export interface SessionTurn {
  transcript: TranscriptEntry[];
  state: ConversationState;
  appointments: Appointment[];
  result: TurnResult;
}

export interface SessionSnapshot {
  sessionId: string;
  state: ConversationState;
  appointments: Appointment[];
  transcript: TranscriptEntry[];
}

export interface SessionRegistryOptions {
  rules: BusinessRules;
  parser: UtteranceParser;
  clock?: () => Date;
}

/**
 * One calendar and one conversation per session id. Turns for the same
 * session run one after another; different sessions never wait on each other.
 */
export class SessionRegistry {
  private sessions = new Map<string, Session>();

  constructor(private options: SessionRegistryOptions) {}

  get rules(): BusinessRules {
    return this.options.rules;
  }

  handleTurn(sessionId: string, text: string): Promise<SessionTurn> {
    const session = this.open(sessionId);
    const turn = session.queue.then(async () => {
      const result = await session.orchestrator.handleTurn(text, session.state);
      session.state = result.state;
      session.transcript.push(...result.transcript);
      return {
        transcript: result.transcript,
        state: result.state,
        appointments: session.calendar.listAll(),
        result,
      };
    });
    // a failed turn must not block the ones queued behind it
    session.queue = turn.catch((error: unknown) => {
      console.error("📅 turn failed", { sessionId, error });
    });
    return turn;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /** Read-only view; an unknown id answers empty without opening a session. */
  snapshot(sessionId: string): SessionSnapshot {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return { sessionId, state: IDLE, appointments: [], transcript: [] };
    }
    return {
      sessionId,
      state: session.state,
      appointments: session.calendar.listAll(),
      transcript: [...session.transcript],
    };
  }

  reset(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  private open(sessionId: string): Session {
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;

    const calendar = new CalendarStore(this.options.rules);
    const session: Session = {
      calendar,
      orchestrator: new Orchestrator({
        calendar,
        parser: this.options.parser,
        clock: this.options.clock,
      }),
      state: IDLE,
      transcript: [],
      queue: Promise.resolve(),
    };
    this.sessions.set(sessionId, session);
    return session;
  }
}
