// src/lib/advisor/completion.ts
import type { ActionResult, BookingActions } from "./actions";
import { DEFAULT_TOPIC } from "./catalog";
import type { ConversationSession } from "./session";
import { chosenSlot } from "./summary";
import type { AgentTurn, ConversationState, Slot } from "./types";

export type CompletionEvent =
  | { kind: "booking"; bookingCode: string; topic: string; slot: Slot }
  | { kind: "reschedule"; existingBookingCode: string; slot: Slot }
  | { kind: "cancel"; existingBookingCode: string }
  | { kind: "waitlist"; topic: string; preferredDatetimeText: string | null };

/**
 * What the turn just finished, if anything. Only the transition into
 * BOOKING_COMPLETE counts; repeated summaries afterwards yield null.
 */
export function detectCompletion(stateBefore: ConversationState, turn: AgentTurn): CompletionEvent | null {
  if (turn.state !== "BOOKING_COMPLETE" || stateBefore === "BOOKING_COMPLETE") return null;
  const ctx = turn.context;

  if (stateBefore === "CONFIRMATION") {
    const slot = chosenSlot(ctx);
    if (!slot) return null;

    if (ctx.intent === "reschedule") {
      if (!ctx.existingBookingCode) return null;
      return { kind: "reschedule", existingBookingCode: ctx.existingBookingCode, slot };
    }

    if (!ctx.bookingCode) return null;
    return { kind: "booking", bookingCode: ctx.bookingCode, topic: ctx.topicLabel || DEFAULT_TOPIC, slot };
  }

  if (stateBefore === "CANCEL_CONFIRM") {
    if (!ctx.existingBookingCode) return null;
    return { kind: "cancel", existingBookingCode: ctx.existingBookingCode };
  }

  if (stateBefore === "SLOT_OFFER") {
    return {
      kind: "waitlist",
      topic: ctx.topicLabel || DEFAULT_TOPIC,
      preferredDatetimeText: ctx.preferredDatetimeText,
    };
  }

  return null;
}

/**
 * Runs one turn and, when it finishes something, its booking actions.
 * The session's next turn waits for both.
 */
export function stepAndComplete(
  session: ConversationSession,
  text: string,
  actions: BookingActions | null
): Promise<{ turn: AgentTurn; completion: CompletionEvent | null; integrations: ActionResult | null }> {
  return session.stepThen(text, async (before, turn) => {
    const completion = detectCompletion(before, turn);
    const integrations = completion && actions ? await actions.handle(completion) : null;
    return { turn, completion, integrations };
  });
}
