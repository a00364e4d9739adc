// src/lib/advisor/handlers/confirm.ts
import { TOKENS } from "../catalog";
import { summarizeBooking } from "../summary";
import { includesAny } from "../text";
import type { StateHandler } from "./types";

export const handleConfirmation: StateHandler = async ({ userText, ctx, timezoneLabel, generateBookingCode }) => {
  if (includesAny(userText, TOKENS.confirmYes)) {
    // A reschedule keeps its existing code.
    if (ctx.intent === "reschedule") {
      return { state: "BOOKING_COMPLETE", reply: summarizeBooking(ctx, timezoneLabel) };
    }

    const bookingCode = await generateBookingCode();
    return {
      state: "BOOKING_COMPLETE",
      ctxPatch: { bookingCode },
      reply: summarizeBooking({ ...ctx, bookingCode }, timezoneLabel),
    };
  }

  if (includesAny(userText, TOKENS.confirmNo)) {
    return {
      state: "DATETIME_COLLECTION",
      reply:
        "No problem, we won't book that slot. " +
        `Tell me another day and approximate time that works for you, in ${timezoneLabel}.`,
    };
  }

  return {
    state: "CONFIRMATION",
    reply: "Please say 'yes' to confirm this slot, or 'no' to choose another time.",
  };
};

// BOOKING_COMPLETE: stay and repeat the summary.
export const handleComplete: StateHandler = async ({ ctx, timezoneLabel }) => ({
  state: "BOOKING_COMPLETE",
  reply: summarizeBooking(ctx, timezoneLabel),
});
