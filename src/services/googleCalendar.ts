// src/services/googleCalendar.ts
import * as logger from "../lib/logger";
import { arr, isObject, readJson, str, type JsonObject } from "../lib/json";
import { extractBusyBlocks, type BusyBlock } from "../lib/advisor/freebusy";
import { sameBookingCode } from "../lib/advisor/bookingCode";
import { googleFetch } from "./googleAuth";

const API = "https://www.googleapis.com/calendar/v3";

// Event titles end with this separator followed by the booking code.
export const TITLE_SEPARATOR = " — ";

export type CalendarRef = { accountId: string; calendarId: string };

export type FreeBusyResult = { busy: BusyBlock[]; degraded: boolean };

export type CalendarEvent = { id: string; summary: string; htmlLink: string | null };

function eventsUrl(calendarId: string, eventId?: string) {
  const base = `${API}/calendars/${encodeURIComponent(calendarId)}/events`;
  return eventId ? `${base}/${encodeURIComponent(eventId)}` : base;
}

function toEvent(json: JsonObject): CalendarEvent | null {
  const id = str(json.id);
  if (!id) return null;
  return { id, summary: str(json.summary) ?? "", htmlLink: str(json.htmlLink) ?? null };
}

/** Lost connection or a failing API degrade to no busy data instead of throwing. */
export async function googleFreeBusy(params: CalendarRef & { timeMin: string; timeMax: string }): Promise<FreeBusyResult> {
  let resp: Response;
  try {
    resp = await googleFetch(params.accountId, `${API}/freeBusy`, {
      method: "POST",
      body: JSON.stringify({
        timeMin: params.timeMin,
        timeMax: params.timeMax,
        items: [{ id: params.calendarId }],
      }),
    });
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    if (msg === "google_not_connected" || msg === "google_refresh_failed") {
      return { busy: [], degraded: true };
    }
    throw e;
  }

  const json = await readJson(resp);
  if (!resp.ok) {
    logger.error("❌ [GCAL] freebusy failed:", resp.status, json.error);
    return { busy: [], degraded: true };
  }

  return { busy: extractBusyBlocks(json, params.calendarId), degraded: false };
}

export async function googleCreateEvent(
  params: CalendarRef & {
    summary: string;
    description?: string;
    startISO: string;
    endISO: string;
    timeZone: string;
  }
): Promise<CalendarEvent> {
  const resp = await googleFetch(params.accountId, eventsUrl(params.calendarId), {
    method: "POST",
    body: JSON.stringify({
      summary: params.summary,
      description: params.description || "",
      start: { dateTime: params.startISO, timeZone: params.timeZone },
      end: { dateTime: params.endISO, timeZone: params.timeZone },
      status: "tentative",
    }),
  });

  const json = await readJson(resp);
  const event = toEvent(json);
  if (!resp.ok || !event) {
    logger.error("❌ [GCAL] create event failed:", resp.status, json.error);
    if (resp.status === 401 || resp.status === 403) throw new Error("google_not_connected");
    throw new Error("google_calendar_failed");
  }
  return event;
}

function titleCode(summary: string) {
  const i = summary.lastIndexOf(TITLE_SEPARATOR);
  return i >= 0 ? summary.slice(i + TITLE_SEPARATOR.length).trim() : "";
}

/**
 * Event whose title ends in the booking code, searched from 90 days ago
 * to a year ahead. "NLP 760" matches a title ending in "NL-P760"; a
 * partial code or another word of the title matches nothing.
 */
export async function googleFindEventByBookingCode(
  params: CalendarRef & { code: string; now?: Date }
): Promise<CalendarEvent | null> {
  const code = params.code.trim();
  if (!code) return null;

  const now = params.now ?? new Date();
  const day = 24 * 60 * 60 * 1000;
  let pageToken: string | undefined;

  do {
    const qs = new URLSearchParams({
      timeMin: new Date(now.getTime() - 90 * day).toISOString(),
      timeMax: new Date(now.getTime() + 365 * day).toISOString(),
      singleEvents: "true",
      orderBy: "startTime",
      maxResults: "250",
    });
    if (pageToken) qs.set("pageToken", pageToken);

    const resp = await googleFetch(params.accountId, `${eventsUrl(params.calendarId)}?${qs.toString()}`);
    const json = await readJson(resp);
    if (!resp.ok) {
      logger.error("❌ [GCAL] events list failed:", resp.status, json.error);
      throw new Error("google_calendar_failed");
    }

    for (const item of arr(json.items)) {
      if (!isObject(item)) continue;
      const event = toEvent(item);
      if (!event) continue;
      if (sameBookingCode(titleCode(event.summary), code)) return event;
    }

    pageToken = str(json.nextPageToken);
  } while (pageToken);

  return null;
}

export async function googlePatchEventTime(
  params: CalendarRef & { eventId: string; startISO: string; endISO: string; timeZone: string }
): Promise<void> {
  const resp = await googleFetch(params.accountId, eventsUrl(params.calendarId, params.eventId), {
    method: "PATCH",
    body: JSON.stringify({
      start: { dateTime: params.startISO, timeZone: params.timeZone },
      end: { dateTime: params.endISO, timeZone: params.timeZone },
    }),
  });

  if (!resp.ok) {
    const json = await readJson(resp);
    logger.error("❌ [GCAL] patch event failed:", resp.status, json.error);
    throw new Error("google_calendar_failed");
  }
}

// 404 / 410: already gone, nothing to do.
export async function googleDeleteEvent(params: CalendarRef & { eventId: string }): Promise<void> {
  const resp = await googleFetch(params.accountId, eventsUrl(params.calendarId, params.eventId), {
    method: "DELETE",
  });

  if (resp.ok || resp.status === 404 || resp.status === 410) return;

  const json = await readJson(resp);
  logger.error("❌ [GCAL] delete event failed:", resp.status, json.error);
  throw new Error("google_calendar_failed");
}
