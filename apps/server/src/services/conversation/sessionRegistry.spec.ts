import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { setTimeout as delay } from "node:timers/promises";
import { createBusinessRules } from "../../config/businessRules.js";
import type { StructuredExtractor } from "../booking/externalParser.js";
import { UtteranceParser } from "../booking/utteranceParser.js";
import { SessionRegistry } from "./sessionRegistry.js";

const rules = createBusinessRules();
// Monday 2026-10-19, 09:00 in Phoenix
const NOW = new Date("2026-10-19T16:00:00Z");

function createRegistry(extractor?: StructuredExtractor) {
  return new SessionRegistry({
    rules,
    parser: new UtteranceParser({ timeZone: rules.timeZone, extractor }),
    clock: () => NOW,
  });
}

describe("SessionRegistry", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("keeps calendars apart per session", async () => {
    const registry = createRegistry();

    const turn = await registry.handleTurn("alice", "Book a dentist appointment tomorrow at 3pm");

    expect(turn.appointments).toHaveLength(1);
    expect(registry.snapshot("alice").appointments).toHaveLength(1);
    expect(registry.snapshot("bob").appointments).toEqual([]);
    expect(registry.has("bob")).toBe(false);
  });

  it("threads the pending state between turns", async () => {
    const registry = createRegistry();

    const offer = await registry.handleTurn("alice", "Book a haircut on Wednesday");
    expect(offer.state.kind).toBe("awaiting_slot_choice");

    const choice = await registry.handleTurn("alice", "2pm");
    expect(choice.result.outcome.type).toBe("booked");
    expect(registry.snapshot("alice").state).toEqual({ kind: "idle" });
    expect(registry.snapshot("alice").transcript.map((entry) => entry.speaker)).toEqual([
      "User",
      "Assistant",
      "User",
      "Assistant",
    ]);
  });

  it("runs turns for one session in arrival order", async () => {
    const extract = vi.fn(async (text: string) => {
      await delay(text.includes("first") ? 30 : 0);
      return { title: text.includes("first") ? "first" : "second", date: "2026-10-20", time: "10:00", durationMinutes: 30 };
    });
    const registry = createRegistry({ extract });

    const [first, second] = await Promise.all([
      registry.handleTurn("alice", "Book the first meeting tomorrow at 10am"),
      registry.handleTurn("alice", "Book the second meeting tomorrow at 10am"),
    ]);

    expect(first.result.outcome.type).toBe("booked");
    expect(second.result.outcome.type).toBe("conflict-offer");
    expect(registry.snapshot("alice").appointments.map((appointment) => appointment.title)).toEqual(["first"]);
  });

  it("forgets a session on reset", async () => {
    const registry = createRegistry();
    await registry.handleTurn("alice", "Book a dentist appointment tomorrow at 3pm");

    expect(registry.reset("alice")).toBe(true);
    expect(registry.has("alice")).toBe(false);
    expect(registry.reset("alice")).toBe(false);
  });
});
