// src/services/googleSheets.ts
// Pre-booking ledger. Columns A:F = timestamp, code, topic, slot label, status, source.
import * as logger from "../lib/logger";
import { arr, readJson } from "../lib/json";
import { sameBookingCode } from "../lib/advisor/bookingCode";
import { googleFetch } from "./googleAuth";

const API = "https://sheets.googleapis.com/v4/spreadsheets";
const RANGE = "A:F";
const CODE_COL = 1;

export type SheetRef = { accountId: string; sheetId: string };

export type LedgerRow = {
  timestamp: string;
  bookingCode: string;
  topic: string;
  slotLabel: string;
  status: string;
  source: string;
};

function valuesUrl(sheetId: string, range: string, suffix = "") {
  return `${API}/${encodeURIComponent(sheetId)}/values/${encodeURIComponent(range)}${suffix}`;
}

async function failIfNotOk(resp: Response, what: string) {
  if (resp.ok) return;
  const json = await readJson(resp);
  logger.error(`❌ [SHEETS] ${what} failed:`, resp.status, json.error);
  throw new Error("google_sheets_failed");
}

export async function appendLedgerRow(ref: SheetRef, row: LedgerRow): Promise<void> {
  const qs = new URLSearchParams({ valueInputOption: "USER_ENTERED", insertDataOption: "INSERT_ROWS" });
  const resp = await googleFetch(ref.accountId, valuesUrl(ref.sheetId, RANGE, `:append?${qs.toString()}`), {
    method: "POST",
    body: JSON.stringify({
      values: [[row.timestamp, row.bookingCode, row.topic, row.slotLabel, row.status, row.source]],
    }),
  });
  await failIfNotOk(resp, "append");
}

/** 1-based sheet row of the first row whose code column matches, or null. */
export async function findLedgerRow(ref: SheetRef, bookingCode: string): Promise<number | null> {
  const resp = await googleFetch(ref.accountId, valuesUrl(ref.sheetId, RANGE));
  await failIfNotOk(resp, "read");

  const rows = arr((await readJson(resp)).values);
  for (let i = 0; i < rows.length; i++) {
    const cell = arr(rows[i])[CODE_COL];
    if (typeof cell === "string" && sameBookingCode(cell, bookingCode)) return i + 1;
  }
  return null;
}

/** Writes consecutive cells starting at `fromCol` (e.g. "D") of one row. */
export async function updateLedgerCells(ref: SheetRef, rowNumber: number, fromCol: string, values: string[]) {
  const toCol = String.fromCharCode(fromCol.charCodeAt(0) + values.length - 1);
  const range = `${fromCol}${rowNumber}:${toCol}${rowNumber}`;
  const qs = new URLSearchParams({ valueInputOption: "USER_ENTERED" });

  const resp = await googleFetch(ref.accountId, valuesUrl(ref.sheetId, range, `?${qs.toString()}`), {
    method: "PUT",
    body: JSON.stringify({ range, values: [values] }),
  });
  await failIfNotOk(resp, "update");
}
