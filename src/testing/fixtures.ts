// src/testing/fixtures.ts
// Shared test fixtures. data/mock_calendar.json holds Tue 10 – Sat 14 Feb 2026.
import * as path from "path";
import { vi } from "vitest";
import type { ActionResult, BookingActions } from "../lib/advisor/actions";
import { ConversationSession, type SessionOptions } from "../lib/advisor/session";
import { createSlot } from "../lib/advisor/slot";
import { StaticSlotSource } from "../lib/advisor/slotSources/static";
import type { AgentTurn, Slot } from "../lib/advisor/types";

export const MOCK_CALENDAR_FILE = path.resolve(__dirname, "../../data/mock_calendar.json");

export const TZ = "Asia/Kolkata";

export function slot(date: string, time: string): Slot {
  return createSlot(date, time, TZ);
}

export function mockCalendarSource() {
  return new StaticSlotSource(MOCK_CALENDAR_FILE, TZ);
}

export function newSession(opts: Partial<SessionOptions> = {}) {
  return new ConversationSession({ slotSource: mockCalendarSource(), referenceYear: 2026, ...opts });
}

/** Feeds every input in order and returns all turns. */
export async function runTurns(session: ConversationSession, inputs: string[]): Promise<AgentTurn[]> {
  const turns: AgentTurn[] = [];
  for (const input of inputs) turns.push(await session.step(input));
  return turns;
}

export const OK_RESULT: ActionResult = {
  calendar: { ok: true, message: "Calendar hold created" },
  sheets: { ok: true, message: "Pre-booking logged to sheet" },
  email: { ok: true, message: "Email skipped" },
  errors: [],
};

export function fakeActions(result: ActionResult = OK_RESULT) {
  const handle = vi.fn<BookingActions["handle"]>(async () => result);
  const actions: BookingActions = { handle };
  return { actions, handle };
}
