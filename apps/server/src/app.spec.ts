import { describe, it, expect, vi, afterEach } from "vitest";
import { createSchedulingService } from "./app.js";
import { SchedulerConfigError } from "./config/businessRules.js";

describe("createSchedulingService", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("builds business rules from the environment", () => {
    const registry = createSchedulingService({ PORT: 3000, USE_EXTERNAL_PARSER: false, LUNCH_START: "12:00" });

    expect(registry.rules.lunch).toEqual({ start: 720, end: 840 });
  });

  it("runs on rules alone when the parser key is missing", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const registry = createSchedulingService(
      { PORT: 3000, USE_EXTERNAL_PARSER: true },
      { clock: () => new Date("2026-10-19T16:00:00Z") }
    );

    const turn = await registry.handleTurn("demo", "Book a dentist appointment tomorrow at 3pm");

    expect(turn.result.request.source).toBe("rules");
    expect(log).toHaveBeenCalledWith("🧠 USE_EXTERNAL_PARSER is set but OPENAI_API_KEY is missing, using rules only");
  });

  it("refuses inconsistent business hours", () => {
    expect(() =>
      createSchedulingService({ PORT: 3000, USE_EXTERNAL_PARSER: false, BUSINESS_CLOSE: "12:00" })
    ).toThrow(SchedulerConfigError);
  });
});
