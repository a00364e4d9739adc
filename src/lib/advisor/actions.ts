// src/lib/advisor/actions.ts
// Calendar / ledger / email side effects of a finished conversation.
import * as logger from "../logger";
import type { AdvisorNotice } from "../mailer";
import type { LedgerRow } from "../../services/googleSheets";
import { DEFAULT_TOPIC } from "./catalog";
import type { CompletionEvent } from "./completion";
import { slotLabel } from "./slot";
import type { Slot } from "./types";

export const LEDGER_SOURCE = "voice_agent";

export type ActionOutcome = { ok: boolean; message: string };

export type ActionResult = {
  calendar: ActionOutcome;
  sheets: ActionOutcome;
  email: ActionOutcome;
  errors: string[];
};

export interface CalendarGateway {
  createHold(input: { summary: string; description: string; slot: Slot }): Promise<void>;
  findEventId(bookingCode: string): Promise<string | null>;
  moveEvent(eventId: string, slot: Slot): Promise<void>;
  deleteEvent(eventId: string): Promise<void>;
}

export interface LedgerGateway {
  append(row: LedgerRow): Promise<void>;
  /** 1-based row number, or null */
  findRow(bookingCode: string): Promise<number | null>;
  updateCells(rowNumber: number, fromCol: string, values: string[]): Promise<void>;
}

export type AdvisorNotifier = (notice: AdvisorNotice) => Promise<ActionOutcome>;

export type BookingIntegrations = {
  calendar: CalendarGateway | null;
  ledger: LedgerGateway | null;
  notify: AdvisorNotifier | null;
  now?: () => Date;
};

export interface BookingActions {
  handle(event: CompletionEvent): Promise<ActionResult>;
}

export function eventTitle(topic: string, bookingCode: string) {
  return `Advisor Q&A — ${topic} — ${bookingCode}`;
}

function skipped(what: string): ActionOutcome {
  return { ok: true, message: `${what} skipped` };
}

function failure(what: string, e: unknown): ActionOutcome {
  const msg = e instanceof Error ? e.message : String(e);
  logger.error(`❌ [ACTIONS] ${what} failed:`, msg);
  return { ok: false, message: `${what} error: ${msg}` };
}

async function attempt(what: string, fn: () => Promise<ActionOutcome>): Promise<ActionOutcome> {
  try {
    return await fn();
  } catch (e) {
    return failure(what, e);
  }
}

function ledgerTimestamp(now: Date) {
  return `${now.toISOString().slice(0, 19).replace("T", " ")} UTC`;
}

export function createBookingActions(integrations: BookingIntegrations): BookingActions {
  const { calendar, ledger, notify } = integrations;
  const now = integrations.now ?? (() => new Date());

  const row = (bookingCode: string, topic: string, label: string, status: string): LedgerRow => ({
    timestamp: ledgerTimestamp(now()),
    bookingCode,
    topic,
    slotLabel: label,
    status,
    source: LEDGER_SOURCE,
  });

  const email = (notice: AdvisorNotice) =>
    notify ? attempt("Email", () => notify(notice)) : Promise.resolve(skipped("Email"));

  async function booking(e: Extract<CompletionEvent, { kind: "booking" }>): Promise<ActionResult> {
    const label = slotLabel(e.slot);

    const cal = calendar
      ? await attempt("Calendar", async () => {
          await calendar.createHold({
            summary: eventTitle(e.topic, e.bookingCode),
            description: `Tentative advisor slot. Topic: ${e.topic}. Code: ${e.bookingCode}.`,
            slot: e.slot,
          });
          return { ok: true, message: "Calendar hold created" };
        })
      : skipped("Calendar");

    const sheets = ledger
      ? await attempt("Sheets", async () => {
          await ledger.append(row(e.bookingCode, e.topic, label, "tentative"));
          return { ok: true, message: "Pre-booking logged to sheet" };
        })
      : skipped("Sheets");

    const mail = await email({ kind: "booking", bookingCode: e.bookingCode, topic: e.topic, slotLabel: label });
    return collect(cal, sheets, mail);
  }

  async function reschedule(e: Extract<CompletionEvent, { kind: "reschedule" }>): Promise<ActionResult> {
    const code = e.existingBookingCode.trim();
    const label = slotLabel(e.slot);

    if (calendar) {
      let eventId: string | null;
      try {
        eventId = await calendar.findEventId(code);
      } catch (err) {
        return collect(failure("Calendar", err), skipped("Sheets"), skipped("Email"));
      }
      // Nothing to move: leave the ledger and the advisor alone.
      if (!eventId) {
        return collect({ ok: false, message: "Booking code not found on calendar." }, skipped("Sheets"), skipped("Email"));
      }
      const id = eventId;
      const cal = await attempt("Calendar", async () => {
        await calendar.moveEvent(id, e.slot);
        return { ok: true, message: "Calendar event rescheduled" };
      });
      return collect(cal, await rescheduleLedger(code, label), await email({ kind: "reschedule", bookingCode: code, slotLabel: label }));
    }

    return collect(
      skipped("Calendar"),
      await rescheduleLedger(code, label),
      await email({ kind: "reschedule", bookingCode: code, slotLabel: label })
    );
  }

  async function rescheduleLedger(code: string, label: string): Promise<ActionOutcome> {
    if (!ledger) return skipped("Sheets");

    return attempt("Sheets", async () => {
      const rowNumber = await ledger.findRow(code);
      if (rowNumber !== null) {
        await ledger.updateCells(rowNumber, "D", [label, "rescheduled"]);
        return { ok: true, message: "Existing sheet row updated to new slot (rescheduled)" };
      }
      // No row for this code yet: append one.
      await ledger.append(row(code, DEFAULT_TOPIC, label, "rescheduled"));
      return { ok: true, message: "Reschedule appended (original row not found)" };
    });
  }

  async function cancel(e: Extract<CompletionEvent, { kind: "cancel" }>): Promise<ActionResult> {
    const code = e.existingBookingCode.trim();

    const cal = calendar
      ? await attempt("Calendar", async () => {
          const eventId = await calendar.findEventId(code);
          if (!eventId) return { ok: false, message: "Booking code not found on calendar." };
          await calendar.deleteEvent(eventId);
          return { ok: true, message: "Calendar event cancelled (deleted)" };
        })
      : skipped("Calendar");

    const sheets = ledger
      ? await attempt("Sheets", async () => {
          const rowNumber = await ledger.findRow(code);
          if (rowNumber === null) return { ok: false, message: "Booking code not found in sheet" };
          await ledger.updateCells(rowNumber, "E", ["cancelled"]);
          return { ok: true, message: "Sheet row status updated to cancelled" };
        })
      : skipped("Sheets");

    return collect(cal, sheets, await email({ kind: "cancel", bookingCode: code }));
  }

  async function waitlist(e: Extract<CompletionEvent, { kind: "waitlist" }>): Promise<ActionResult> {
    const sheets = ledger
      ? await attempt("Sheets", async () => {
          await ledger.append(row("", e.topic, e.preferredDatetimeText ?? "", "waitlist"));
          return { ok: true, message: "Waitlist request logged to sheet" };
        })
      : skipped("Sheets");

    return collect(skipped("Calendar"), sheets, skipped("Email"));
  }

  return {
    async handle(event) {
      logger.debug("📌 [ACTIONS] completion", event.kind);
      switch (event.kind) {
        case "booking":
          return booking(event);
        case "reschedule":
          return reschedule(event);
        case "cancel":
          return cancel(event);
        case "waitlist":
          return waitlist(event);
      }
    },
  };
}

function collect(calendar: ActionOutcome, sheets: ActionOutcome, email: ActionOutcome): ActionResult {
  const errors = [calendar, sheets, email].filter((o) => !o.ok).map((o) => o.message);
  return { calendar, sheets, email, errors };
}
