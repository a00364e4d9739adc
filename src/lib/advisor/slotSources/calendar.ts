// src/lib/advisor/slotSources/calendar.ts
import { DateTime } from "luxon";
import * as logger from "../../logger";
import type { AvailabilityWindow } from "../../../config/settings";
import type { FreeBusyResult } from "../../../services/googleCalendar";
import type { BusyBlock } from "../freebusy";
import { createSlot } from "../slot";
import type { Slot, SlotSource } from "../types";

type Range = { start: DateTime; end: DateTime };

function toRanges(busy: readonly BusyBlock[], timeZone: string): Range[] {
  return busy
    .map((b) => ({
      start: DateTime.fromISO(b.start, { zone: timeZone }),
      end: DateTime.fromISO(b.end, { zone: timeZone }),
    }))
    .filter((b) => b.start.isValid && b.end.isValid);
}

/**
 * Candidate starts every `stepMinutes` inside business hours on the
 * allowed weekdays, from today through `daysAhead`. A slot must end by
 * closing time; past starts and busy overlaps are dropped.
 */
export function computeOfferableSlots(opts: {
  now: DateTime;
  timeZone: string;
  window: AvailabilityWindow;
  durationMin: number;
  busy: readonly BusyBlock[];
}): Slot[] {
  const { window, durationMin, timeZone } = opts;
  const now = opts.now.setZone(timeZone);
  const busy = toRanges(opts.busy, timeZone);
  const step = Math.max(1, window.stepMinutes);

  const out: Slot[] = [];
  const lastDay = now.plus({ days: window.daysAhead }).startOf("day");

  for (let day = now.startOf("day"); day <= lastDay; day = day.plus({ days: 1 })) {
    if (!window.weekdays.includes(day.weekday)) continue;

    const close = day.set({ hour: window.endHour });
    for (let start = day.set({ hour: window.startHour }); start < close; start = start.plus({ minutes: step })) {
      if (start < now) continue;
      const end = start.plus({ minutes: durationMin });
      if (end > close) break;
      if (busy.some((b) => start < b.end && b.start < end)) continue;

      const date = start.toISODate();
      if (date) out.push(createSlot(date, start.toFormat("HH:mm"), timeZone));
    }
  }

  return out;
}

export type FreeBusyQuery = (range: { timeMin: string; timeMax: string }) => Promise<FreeBusyResult>;

/** Free slots from the advisor's calendar. Degraded free/busy yields []. */
export class CalendarSlotSource implements SlotSource {
  constructor(
    private readonly freeBusy: FreeBusyQuery,
    private readonly opts: {
      timeZone: string;
      window: AvailabilityWindow;
      durationMin: number;
      now?: () => DateTime;
    }
  ) {}

  async listOfferableSlots(): Promise<Slot[]> {
    const now = (this.opts.now ?? (() => DateTime.now()))().setZone(this.opts.timeZone);
    const timeMin = now.toISO();
    const timeMax = now.plus({ days: this.opts.window.daysAhead }).endOf("day").toISO();
    if (!timeMin || !timeMax) return [];

    const fb = await this.freeBusy({ timeMin, timeMax });
    if (fb.degraded) {
      logger.warn("⚠️ [SLOTS] free/busy degraded, no calendar slots");
      return [];
    }

    return computeOfferableSlots({
      now,
      timeZone: this.opts.timeZone,
      window: this.opts.window,
      durationMin: this.opts.durationMin,
      busy: fb.busy,
    });
  }
}
