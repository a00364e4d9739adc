// src/routes/webhook/voice.ts
// Twilio voice: speech <Gather> loop, one session per CallSid.
import { Router, type Request, type Response } from "express";
import { twiml } from "twilio";
import * as logger from "../../lib/logger";
import { stepAndComplete } from "../../lib/advisor/completion";
import { toPlainSpeech } from "../../lib/advisor/text";
import type { AdvisorRouteDeps } from "../advisor";

const LANGUAGE = "en-US";
const VOICE = "alice";
// Empty gathers in a row before the call is ended.
const MAX_SILENT_PROMPTS = 3;

function bodyString(req: Request, key: string): string {
  const v: unknown = req.body?.[key];
  return typeof v === "string" ? v.trim() : "";
}

function gatherReply(req: Request, text: string) {
  const vr = new twiml.VoiceResponse();
  const gather = vr.gather({
    input: ["speech"],
    action: `${req.baseUrl}/gather`,
    method: "POST",
    language: LANGUAGE,
    speechTimeout: "auto",
  });
  gather.say({ language: LANGUAGE, voice: VOICE }, toPlainSpeech(text));

  // No speech: ask once more through the same endpoint.
  vr.redirect({ method: "POST" }, `${req.baseUrl}/gather`);
  return vr;
}

function hangupReply(...lines: string[]) {
  const vr = new twiml.VoiceResponse();
  for (const line of lines) vr.say({ language: LANGUAGE, voice: VOICE }, line);
  vr.hangup();
  return vr;
}

function sendTwiml(res: Response, vr: { toString(): string }) {
  res.type("text/xml");
  return res.send(vr.toString());
}

export function createVoiceRouter({ sessions, actions }: AdvisorRouteDeps) {
  const router = Router();
  const silentPrompts = new Map<string, number>();

  // POST /webhook/voice → greeting + disclaimer
  router.post("/", async (req: Request, res: Response) => {
    const callSid = bodyString(req, "CallSid");
    try {
      if (callSid) silentPrompts.delete(callSid);
      const { id, session } = callSid ? sessions.create(callSid) : sessions.create();
      const turn = await session.step("");
      logger.debug("📞 [VOICE] call started", id);
      return sendTwiml(res, gatherReply(req, turn.text));
    } catch (e) {
      logger.error("❌ [VOICE] start error:", e);
      return sendTwiml(res, hangupReply("Sorry, something went wrong. Please call again later."));
    }
  });

  // POST /webhook/voice/gather  { CallSid, SpeechResult }
  router.post("/gather", async (req: Request, res: Response) => {
    const callSid = bodyString(req, "CallSid");
    const speech = bodyString(req, "SpeechResult");

    try {
      const session = callSid ? sessions.get(callSid) : null;
      if (!session) {
        const fresh = callSid ? sessions.create(callSid) : sessions.create();
        const turn = await fresh.session.step("");
        return sendTwiml(res, gatherReply(req, `Let's start again. ${turn.text}`));
      }

      if (!speech) {
        const silent = (silentPrompts.get(callSid) ?? 0) + 1;
        if (silent >= MAX_SILENT_PROMPTS) {
          logger.debug("📞 [VOICE] no speech, ending call", callSid);
          silentPrompts.delete(callSid);
          sessions.delete(callSid);
          return sendTwiml(
            res,
            hangupReply("I still couldn't hear anything, so I'll end the call here. Please call again anytime. Goodbye.")
          );
        }
        silentPrompts.set(callSid, silent);
        return sendTwiml(res, gatherReply(req, "Sorry, I didn't catch that. Could you say it again?"));
      }
      silentPrompts.delete(callSid);

      const { turn, integrations } = await stepAndComplete(session, speech, actions);
      if (integrations?.errors.length) {
        logger.warn("⚠️ [VOICE] integrations reported errors:", integrations.errors);
      }

      if (turn.state === "BOOKING_COMPLETE") {
        sessions.delete(callSid);
        return sendTwiml(res, hangupReply(toPlainSpeech(turn.text), "Thank you for calling. Goodbye."));
      }

      return sendTwiml(res, gatherReply(req, turn.text));
    } catch (e) {
      logger.error("❌ [VOICE] gather error:", e);
      return sendTwiml(res, gatherReply(req, "Sorry, something went wrong on my side. Could you say that again?"));
    }
  });

  return router;
}
