import { Router, type Request, type Response } from "express";
import { z } from "zod";
import type { SessionRegistry } from "../services/conversation/sessionRegistry.js";

const sessionIdSchema = z.string().trim().min(1).max(128);

const turnSchema = z.object({
  text: z.string().trim().min(1).max(2000),
});

function parseSessionId(req: Request, res: Response): string | null {
  const parsed = sessionIdSchema.safeParse(req.params.sessionId);
  if (!parsed.success) {
    res.status(400).json({ error: "Invalid session id", details: parsed.error.flatten() });
    return null;
  }
  return parsed.data;
}

export function createSessionsRouter(registry: SessionRegistry) {
  const router = Router();

  router.post("/sessions/:sessionId/turns", async (req, res) => {
    const sessionId = parseSessionId(req, res);
    if (!sessionId) return;
    const parsed = turnSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid input", details: parsed.error.flatten() });
    }

    try {
      const turn = await registry.handleTurn(sessionId, parsed.data.text);
      return res.json({
        transcript: turn.transcript,
        state: turn.state,
        outcome: turn.result.outcome.type,
        appointments: turn.appointments,
      });
    } catch (error) {
      console.error("Failed to handle turn", error);
      return res.status(500).json({ error: "Failed to handle turn" });
    }
  });

  router.get("/sessions/:sessionId/appointments", (req, res) => {
    const sessionId = parseSessionId(req, res);
    if (!sessionId) return;
    return res.json({ appointments: registry.snapshot(sessionId).appointments });
  });

  router.get("/sessions/:sessionId/state", (req, res) => {
    const sessionId = parseSessionId(req, res);
    if (!sessionId) return;
    const snapshot = registry.snapshot(sessionId);
    return res.json({ state: snapshot.state, transcript: snapshot.transcript });
  });

  router.delete("/sessions/:sessionId", (req, res) => {
    const sessionId = parseSessionId(req, res);
    if (!sessionId) return;
    return res.json({ ok: true, removed: registry.reset(sessionId) });
  });

  return router;
}
