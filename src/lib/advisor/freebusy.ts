// src/lib/advisor/freebusy.ts
import { arr, isObject, str } from "../json";

export type BusyBlock = { start: string; end: string };

function mapBusy(list: unknown[]): BusyBlock[] {
  const out: BusyBlock[] = [];
  for (const b of list) {
    if (!isObject(b)) continue;
    const start = str(b.start);
    const end = str(b.end);
    if (start && end) out.push({ start, end });
  }
  return out;
}

/**
 * Busy blocks from a freeBusy response. A degraded response yields [];
 * callers must not read that as "all free".
 */
export function extractBusyBlocks(fb: unknown, calendarId?: string): BusyBlock[] {
  if (!isObject(fb) || fb.degraded === true) return [];

  const calendars = fb.calendars;
  if (!isObject(calendars)) return mapBusy(arr(fb.busy));

  const getBusy = (key: string) => {
    const cal = calendars[key];
    return isObject(cal) && Array.isArray(cal.busy) ? mapBusy(cal.busy) : null;
  };

  // 1) the requested calendar, even when empty
  if (calendarId) {
    const b = getBusy(calendarId);
    if (b) return b;
  }

  // 2) primary
  const primary = getBusy("primary");
  if (primary) return primary;

  // 3) otherwise every calendar in the response
  return Object.keys(calendars).flatMap((key) => getBusy(key) ?? []);
}
