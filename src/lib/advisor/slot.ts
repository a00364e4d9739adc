// src/lib/advisor/slot.ts
import { DateTime } from "luxon";
import type { Slot } from "./types";

export function createSlot(date: string, time: string, timezone: string): Slot {
  return Object.freeze({ date, time: normalizeTime(time), timezone });
}

// "9:30" -> "09:30"; anything unparseable is returned as given.
export function normalizeTime(hhmm: string) {
  const m = String(hhmm || "").trim().match(/^(\d{1,2}):(\d{2})$/);
  if (!m) return hhmm;
  return `${m[1].padStart(2, "0")}:${m[2]}`;
}

export function slotMinutes(slot: Slot): number {
  const [h, m] = slot.time.split(":");
  return Number(h) * 60 + Number(m || 0);
}

/** Luxon weekday of the slot's calendar date: 1=Mon ... 7=Sun. */
export function slotWeekday(slot: Slot): number {
  return DateTime.fromISO(slot.date).weekday;
}

// "Tuesday, Feb 10 at 2:00 PM IST"
export function slotLabel(slot: Slot): string {
  const dt = DateTime.fromISO(`${slot.date}T${normalizeTime(slot.time)}`).setLocale("en-US");
  if (!dt.isValid) return `${slot.date} at ${slot.time} ${slot.timezone}`;
  return `${dt.toFormat("cccc, LLL d")} at ${dt.toFormat("h:mm a")} ${slot.timezone}`;
}

export function compareSlots(a: Slot, b: Slot): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  return slotMinutes(a) - slotMinutes(b);
}

/** Start/end as ISO strings with the zone's offset, for calendar writes. */
export function slotToRange(slot: Slot, durationMin: number): { startISO: string; endISO: string } | null {
  const start = DateTime.fromISO(`${slot.date}T${normalizeTime(slot.time)}`, { zone: slot.timezone });
  if (!start.isValid) return null;

  const startISO = start.toISO({ suppressMilliseconds: true });
  const endISO = start.plus({ minutes: durationMin }).toISO({ suppressMilliseconds: true });
  if (!startISO || !endISO) return null;
  return { startISO, endISO };
}

export function renderSlotOptions(slots: readonly Slot[]) {
  return slots.map((s, i) => `${i + 1}. ${slotLabel(s)}`).join("\n");
}
