// src/lib/advisor/handlers/bookingCode.ts
// Reschedule / cancel: collect the code of an existing booking.
import { TOKENS } from "../catalog";
import { includesAny } from "../text";
import type { StateHandler } from "./types";

const ASK_CODE = "Please tell me your booking code (for example, NL-A742).";

export const handleRescheduleAskCode: StateHandler = async ({ userText, timezoneLabel, availabilityText }) => {
  const code = userText.trim();
  if (!code) return { state: "RESCHEDULE_ASK_CODE", reply: ASK_CODE };

  return {
    state: "DATETIME_COLLECTION",
    ctxPatch: { existingBookingCode: code },
    reply:
      "Thanks. To which date and time would you like to reschedule? " +
      `You can book a slot, if available, **${availabilityText}** (${timezoneLabel}).`,
  };
};

export const handleCancelAskCode: StateHandler = async ({ userText }) => {
  const code = userText.trim();
  if (!code) return { state: "CANCEL_ASK_CODE", reply: ASK_CODE };

  return {
    state: "CANCEL_CONFIRM",
    ctxPatch: { existingBookingCode: code },
    reply: `I'll cancel the booking for code **${code}**. Confirm cancellation? Say yes or no.`,
  };
};

export const handleCancelConfirm: StateHandler = async ({ userText, ctx }) => {
  if (includesAny(userText, TOKENS.cancelYes)) {
    const code = ctx.existingBookingCode || "your booking";
    return {
      state: "BOOKING_COMPLETE",
      reply: `Cancellation recorded for **${code}**. You will receive a confirmation. Anything else?`,
    };
  }

  if (includesAny(userText, TOKENS.cancelNo)) {
    return {
      state: "INTENT_CONFIRMATION",
      reply: "Cancellation not done. What would you like to do: book new, reschedule, or cancel?",
    };
  }

  return {
    state: "CANCEL_CONFIRM",
    reply: "Please say yes to confirm cancellation, or no to keep the booking.",
  };
};
