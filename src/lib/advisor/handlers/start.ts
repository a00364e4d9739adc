// src/lib/advisor/handlers/start.ts
import { DISCLAIMER, TOKENS } from "../catalog";
import { includesAny } from "../text";
import type { HandlerResult, StateHandler } from "./types";

export const INTENT_OPTIONS =
  "Great. What would you like to do today?\n\n" +
  "• **Book a new advisor slot**: I'll collect your topic and preferred time, then offer two slots.\n" +
  "• **Reschedule**: change an existing booking (you'll need your booking code).\n" +
  "• **Cancel**: cancel an existing booking (you'll need your booking code).\n\n" +
  "Please say: book new, reschedule, or cancel.";

// GREETING: whatever arrives, greet and read the disclaimer.
export const handleGreeting: StateHandler = async (): Promise<HandlerResult> => ({
  state: "DISCLAIMER",
  reply:
    "Hello, you're speaking with the Advisor Appointment Assistant. " +
    "I can help you book, reschedule, or cancel an advisor slot, " +
    "and share what to prepare.\n\n" +
    `Before we begin, I must share a short disclaimer:\n${DISCLAIMER}\n\n` +
    "Shall we continue?",
});

export const handleDisclaimer: StateHandler = async ({ userText }) => {
  if (includesAny(userText, TOKENS.disclaimerYes)) {
    return { state: "INTENT_CONFIRMATION", reply: INTENT_OPTIONS };
  }
  return {
    state: "DISCLAIMER",
    reply: "No problem. When you're ready, just say you'd like to continue with booking or questions.",
  };
};
