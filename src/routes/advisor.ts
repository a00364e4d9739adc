// src/routes/advisor.ts
// Chat surface: one session per conversation, one POST per user message.
import { Router, type Request, type Response } from "express";
import * as logger from "../lib/logger";
import type { BookingActions } from "../lib/advisor/actions";
import { stepAndComplete } from "../lib/advisor/completion";
import type { SessionStore } from "../lib/advisor/sessionStore";

export type AdvisorRouteDeps = {
  sessions: SessionStore;
  actions: BookingActions | null;
};

export function createAdvisorRouter({ sessions, actions }: AdvisorRouteDeps) {
  const router = Router();

  // POST /api/advisor/sessions → greeting turn
  router.post("/sessions", async (_req: Request, res: Response) => {
    try {
      const { id, session } = sessions.create();
      const turn = await session.step("");
      logger.debug("💬 [ADVISOR] session created", id);
      return res.status(201).json({ sessionId: id, text: turn.text, state: turn.state, context: turn.context });
    } catch (e) {
      logger.error("❌ [ADVISOR] create session error:", e);
      return res.status(500).json({ error: "internal" });
    }
  });

  // POST /api/advisor/sessions/:id/messages  { text }
  router.post("/sessions/:id/messages", async (req: Request, res: Response) => {
    const text: unknown = req.body?.text;
    if (typeof text !== "string") {
      return res.status(400).json({ error: "text must be a string" });
    }

    const session = sessions.get(req.params.id);
    if (!session) return res.status(404).json({ error: "session_not_found" });

    try {
      const { turn, integrations } = await stepAndComplete(session, text, actions);
      return res.json({
        sessionId: req.params.id,
        text: turn.text,
        state: turn.state,
        context: turn.context,
        integrations,
      });
    } catch (e) {
      logger.error("❌ [ADVISOR] message error:", e);
      return res.status(500).json({ error: "internal" });
    }
  });

  router.get("/sessions/:id", (req: Request, res: Response) => {
    const session = sessions.get(req.params.id);
    if (!session) return res.status(404).json({ error: "session_not_found" });
    return res.json({ sessionId: req.params.id, state: session.state, context: session.context });
  });

  // Start over: the client creates a new session afterwards.
  router.delete("/sessions/:id", (req: Request, res: Response) => {
    if (!sessions.delete(req.params.id)) return res.status(404).json({ error: "session_not_found" });
    return res.sendStatus(204);
  });

  return router;
}
