// src/lib/advisor/summary.ts
import { DEFAULT_TOPIC } from "./catalog";
import { slotLabel } from "./slot";
import type { ConversationContext, Slot } from "./types";

export function chosenSlot(ctx: Readonly<ConversationContext>): Slot | null {
  if (ctx.chosenSlotIndex === null) return null;
  return ctx.offeredSlots[ctx.chosenSlotIndex] ?? null;
}

export function secureLinkPath(code: string) {
  return `/complete-booking/${code}`;
}

/**
 * What BOOKING_COMPLETE says, most specific first: reschedule done,
 * new booking, bare reschedule / cancel acknowledgement, not booked.
 */
export function summarizeBooking(ctx: Readonly<ConversationContext>, timezoneLabel: string): string {
  const slot = chosenSlot(ctx);

  if (ctx.intent === "reschedule" && ctx.existingBookingCode && slot) {
    return (
      `Your booking **${ctx.existingBookingCode}** has been rescheduled to ${slotLabel(slot)}.\n\n` +
      `All times are in ${timezoneLabel}. Anything else?`
    );
  }

  if (ctx.bookingCode && slot) {
    return (
      "Your tentative advisor slot is booked.\n\n" +
      `- Topic: ${ctx.topicLabel || DEFAULT_TOPIC}\n` +
      `- Slot: ${slotLabel(slot)}\n` +
      `- Booking code: ${ctx.bookingCode}\n\n` +
      "Please note: this is a tentative hold. To securely share your " +
      "contact details and any documents, use the secure link we provide:\n" +
      `${secureLinkPath(ctx.bookingCode)}\n\n` +
      `All times are in ${timezoneLabel}. ` +
      "You can mention your booking code when you contact support."
    );
  }

  if (ctx.intent === "reschedule" && ctx.existingBookingCode) {
    return (
      `Your reschedule request for booking code **${ctx.existingBookingCode}** has been noted. ` +
      "An advisor will reach out with new slot options. Anything else?"
    );
  }

  if (ctx.intent === "cancel" && ctx.existingBookingCode) {
    return `Cancellation for **${ctx.existingBookingCode}** has been recorded. Anything else?`;
  }

  return (
    "You are not currently booked into a specific slot. " +
    "If you'd like, we can look at more times or place you on a waitlist."
  );
}
