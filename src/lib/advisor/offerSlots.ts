// src/lib/advisor/offerSlots.ts
import * as logger from "../logger";
import { parsePreferredDateTime, type PreferredDateTime } from "./preference";
import { compareSlots, slotMinutes, slotWeekday } from "./slot";
import type { Slot, SlotSource } from "./types";

export const MAX_OFFERED_SLOTS = 2;

export type OfferOptions = {
  referenceYear: number;
};

/** Filter + rank, pure. Exported for the slot sources' tests. */
export function rankSlots(all: readonly Slot[], pref: PreferredDateTime): Slot[] {
  let kept: Slot[];

  if (pref.date !== null) {
    kept = all.filter((s) => s.date === pref.date);
  } else if (pref.weekday !== null) {
    const wd = pref.weekday;
    kept = all.filter((s) => slotWeekday(s) === wd);
  } else {
    kept = [...all];
  }

  const minutes = pref.minutes;
  if (minutes !== null) {
    kept.sort((a, b) => {
      const da = Math.abs(slotMinutes(a) - minutes);
      const db = Math.abs(slotMinutes(b) - minutes);
      return da - db || compareSlots(a, b);
    });
  } else {
    kept.sort(compareSlots);
  }

  return kept.slice(0, MAX_OFFERED_SLOTS);
}

/**
 * Up to two slots for a free-text preference, best match first.
 * A weekday or date with nothing open yields [] (waitlist), never
 * another day. A failing source also yields [].
 */
export async function offerSlots(
  source: SlotSource,
  preferredText: string | null | undefined,
  opts: OfferOptions
): Promise<Slot[]> {
  const pref = parsePreferredDateTime(preferredText ?? "", opts.referenceYear);

  let all: Slot[];
  try {
    all = await source.listOfferableSlots();
  } catch (err) {
    logger.error("❌ [SLOTS] slot source failed:", err instanceof Error ? err.message : err);
    return [];
  }

  const offered = rankSlots(all, pref);
  logger.debug("🗓️ [SLOTS] offer", { preferredText, pref, candidates: all.length, offered: offered.length });
  return offered;
}
