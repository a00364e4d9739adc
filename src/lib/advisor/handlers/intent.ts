// src/lib/advisor/handlers/intent.ts
import { TOKENS, TOPIC_LABELS } from "../catalog";
import { includesAny, lower } from "../text";
import type { IntentName, IntentResult } from "../types";
import type { StateHandler } from "./types";

// Cancel before reschedule: "cancel" must never read as a reschedule.
export function resolveIntent(userText: string, intentResult: IntentResult): IntentName | null {
  const t = lower(userText);

  if (includesAny(t, TOKENS.intentCancel)) return "cancel";
  if (includesAny(t, TOKENS.intentReschedule)) return "reschedule";
  if (intentResult.intent === "book_new" || includesAny(t, TOKENS.intentBook)) return "book_new";

  if (!intentResult.intent && includesAny(t, TOKENS.intentBookLoose)) return "book_new";
  return intentResult.intent;
}

export const TOPIC_EXAMPLES = `${TOPIC_LABELS.slice(0, -1).join(", ")}, or ${TOPIC_LABELS[TOPIC_LABELS.length - 1]}`;

export const handleIntentConfirmation: StateHandler = async ({ userText, intentResult }) => {
  const intent = resolveIntent(userText, intentResult);

  if (intent === "book_new") {
    return {
      state: "TOPIC_COLLECTION",
      ctxPatch: { intent },
      reply:
        "I'll help you book a new advisor slot. " +
        "What would you like to discuss with the advisor?\n" +
        `For example: ${TOPIC_EXAMPLES}.`,
    };
  }

  if (intent === "reschedule") {
    return {
      state: "RESCHEDULE_ASK_CODE",
      ctxPatch: { intent },
      reply:
        "I'll help you reschedule. Please have your booking code ready, " +
        "it looks like NL-A742. What is your booking code?",
    };
  }

  if (intent === "cancel") {
    return {
      state: "CANCEL_ASK_CODE",
      ctxPatch: { intent },
      reply: "I'll help you cancel your booking. Please tell me your booking code (for example, NL-A742).",
    };
  }

  return {
    state: "INTENT_CONFIRMATION",
    reply:
      "I didn't catch that. What would you like to do?\n\n" +
      "• Say **book new** to book a new advisor slot.\n" +
      "• Say **reschedule** to change an existing booking.\n" +
      "• Say **cancel** to cancel an existing booking.",
  };
};
