// src/lib/advisor/slotSources/fallback.ts
import * as logger from "../../logger";
import type { Slot, SlotSource } from "../types";

/** Primary first; secondary when the primary throws or has nothing to offer. */
export class FallbackSlotSource implements SlotSource {
  constructor(
    private readonly primary: SlotSource,
    private readonly secondary: SlotSource
  ) {}

  async listOfferableSlots(): Promise<Slot[]> {
    try {
      const slots = await this.primary.listOfferableSlots();
      if (slots.length) return slots;
      logger.debug("🗓️ [SLOTS] primary source empty, using fallback");
    } catch (e) {
      logger.warn("⚠️ [SLOTS] primary source failed, using fallback:", e instanceof Error ? e.message : e);
    }
    return this.secondary.listOfferableSlots();
  }
}
