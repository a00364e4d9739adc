// src/lib/advisor/integrations.ts
// Google-backed gateways for the booking actions, built from settings.
import { getSettings, isGoogleConfigured, type Settings } from "../../config/settings";
import { sendAdvisorNotification } from "../mailer";
import {
  googleCreateEvent,
  googleDeleteEvent,
  googleFindEventByBookingCode,
  googlePatchEventTime,
} from "../../services/googleCalendar";
import { appendLedgerRow, findLedgerRow, updateLedgerCells } from "../../services/googleSheets";
import type { BookingIntegrations, CalendarGateway, LedgerGateway } from "./actions";
import { createLedgerAwareCodeGenerator, type CodeGenerator } from "./bookingCode";
import { slotToRange } from "./slot";
import type { Slot } from "./types";

function rangeOrThrow(slot: Slot, durationMin: number) {
  const range = slotToRange(slot, durationMin);
  if (!range) throw new Error("invalid_slot");
  return range;
}

export function createGoogleCalendarGateway(settings: Settings): CalendarGateway {
  const ref = { accountId: settings.google.accountId, calendarId: settings.google.calendarId };
  const duration = settings.bookingDurationMin;

  return {
    async createHold({ summary, description, slot }) {
      const { startISO, endISO } = rangeOrThrow(slot, duration);
      await googleCreateEvent({ ...ref, summary, description, startISO, endISO, timeZone: slot.timezone });
    },
    async findEventId(bookingCode) {
      const event = await googleFindEventByBookingCode({ ...ref, code: bookingCode });
      return event?.id ?? null;
    },
    async moveEvent(eventId, slot) {
      const { startISO, endISO } = rangeOrThrow(slot, duration);
      await googlePatchEventTime({ ...ref, eventId, startISO, endISO, timeZone: slot.timezone });
    },
    async deleteEvent(eventId) {
      await googleDeleteEvent({ ...ref, eventId });
    },
  };
}

export function createGoogleLedgerGateway(settings: Settings): LedgerGateway {
  const ref = { accountId: settings.google.accountId, sheetId: settings.google.sheetId };
  return {
    append: (row) => appendLedgerRow(ref, row),
    findRow: (bookingCode) => findLedgerRow(ref, bookingCode),
    updateCells: (rowNumber, fromCol, values) => updateLedgerCells(ref, rowNumber, fromCol, values),
  };
}

/** Unconfigured parts come back null and their actions report "skipped". */
export function createDefaultIntegrations(settings: Settings = getSettings()): BookingIntegrations {
  const google = isGoogleConfigured(settings);
  return {
    calendar: google && settings.google.calendarId ? createGoogleCalendarGateway(settings) : null,
    ledger: google && settings.google.sheetId ? createGoogleLedgerGateway(settings) : null,
    notify: sendAdvisorNotification,
  };
}

/** New codes are checked against the ledger when there is one. */
export function createCodeGenerator(settings: Settings, ledger: LedgerGateway | null): CodeGenerator {
  const prefix = settings.bookingCodePrefix;
  if (!ledger) return createLedgerAwareCodeGenerator(async () => false, { prefix, maxAttempts: 1 });
  return createLedgerAwareCodeGenerator(async (code) => (await ledger.findRow(code)) !== null, { prefix });
}
