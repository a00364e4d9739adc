// src/lib/advisor/slotSources/index.ts
import { getSettings, isGoogleConfigured, type Settings } from "../../../config/settings";
import { googleFreeBusy } from "../../../services/googleCalendar";
import type { SlotSource } from "../types";
import { CalendarSlotSource } from "./calendar";
import { FallbackSlotSource } from "./fallback";
import { StaticSlotSource } from "./static";

export { CalendarSlotSource, computeOfferableSlots } from "./calendar";
export { FallbackSlotSource } from "./fallback";
export { InMemorySlotSource, StaticSlotSource, parseSlotFile } from "./static";

// Calendar free/busy with the static file behind it, or the file alone.
export function createDefaultSlotSource(settings: Settings = getSettings()): SlotSource {
  const fromFile = new StaticSlotSource(settings.slotsFile, settings.timeZone);
  if (!isGoogleConfigured(settings) || !settings.google.calendarId) return fromFile;

  const { accountId, calendarId } = settings.google;
  const fromCalendar = new CalendarSlotSource(
    (range) => googleFreeBusy({ accountId, calendarId, ...range }),
    {
      timeZone: settings.timeZone,
      window: settings.availability,
      durationMin: settings.bookingDurationMin,
    }
  );
  return new FallbackSlotSource(fromCalendar, fromFile);
}
