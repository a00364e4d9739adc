// src/lib/advisor/slotSources/static.ts
import { promises as fs } from "fs";
import * as logger from "../../logger";
import { arr, isObject, str } from "../../json";
import { createSlot } from "../slot";
import type { Slot, SlotSource } from "../types";

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const TIME_RE = /^\d{1,2}:\d{2}$/;

/**
 * `{ available_slots: [{ date, timezone?, times: ["10:00", ...] }] }`.
 * Malformed entries are skipped.
 */
export function parseSlotFile(data: unknown, defaultTimeZone: string): Slot[] {
  if (!isObject(data)) return [];

  const slots: Slot[] = [];
  for (const entry of arr(data.available_slots)) {
    if (!isObject(entry)) continue;
    const date = str(entry.date);
    if (!date || !DATE_RE.test(date)) continue;
    const tz = str(entry.timezone) || defaultTimeZone;

    for (const t of arr(entry.times)) {
      if (typeof t === "string" && TIME_RE.test(t)) slots.push(createSlot(date, t, tz));
    }
  }
  return slots;
}

/** Fixed list from a JSON file, read once. */
export class StaticSlotSource implements SlotSource {
  private cache: Promise<Slot[]> | null = null;

  constructor(
    private readonly file: string,
    private readonly defaultTimeZone: string
  ) {}

  listOfferableSlots(): Promise<Slot[]> {
    if (!this.cache) {
      // Failed reads are retried on the next call.
      this.cache = this.load().catch((e: unknown) => {
        this.cache = null;
        throw e;
      });
    }
    return this.cache;
  }

  private async load(): Promise<Slot[]> {
    const raw = await fs.readFile(this.file, "utf8");
    const slots = parseSlotFile(JSON.parse(raw), this.defaultTimeZone);
    logger.debug("🗂️ [SLOTS] static slots loaded:", slots.length, "from", this.file);
    return slots;
  }
}

/** Slots held in memory; mostly for tests and demos. */
export class InMemorySlotSource implements SlotSource {
  constructor(private readonly slots: readonly Slot[]) {}

  async listOfferableSlots(): Promise<Slot[]> {
    return [...this.slots];
  }
}
