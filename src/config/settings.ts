// src/config/settings.ts
import * as path from "path";

export type AvailabilityWindow = {
  weekdays: number[]; // luxon weekday: 1=Mon ... 7=Sun
  startHour: number;
  endHour: number;
  daysAhead: number;
  stepMinutes: number;
};

export type Settings = {
  port: number;
  timeZone: string;
  timezoneLabel: string;
  dateReferenceYear: number;
  bookingCodePrefix: string;
  bookingDurationMin: number;
  availability: AvailabilityWindow;
  slotsFile: string;
  sessionTtlMin: number;

  google: {
    clientId: string;
    clientSecret: string;
    redirectUrl: string;
    stateSecret: string;
    accountId: string;
    calendarId: string;
    sheetId: string;
  };

  advisorEmail: string;
  smtp: {
    host: string;
    port: number;
    user: string;
    pass: string;
    from: string;
  };

  adminJwtSecret: string;
  corsOrigins: string[];
};

const WEEKDAY_LABELS = ["Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday", "Sunday"];

function envString(name: string, fallback = ""): string {
  const v = process.env[name];
  return typeof v === "string" && v.trim() ? v.trim() : fallback;
}

function envInt(name: string, fallback: number): number {
  const raw = envString(name);
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isInteger(n) ? n : fallback;
}

function envIntList(name: string, fallback: number[]): number[] {
  const raw = envString(name);
  if (!raw) return fallback;
  const list = raw
    .split(",")
    .map((s) => Number(s.trim()))
    .filter((n) => Number.isInteger(n) && n >= 1 && n <= 7);
  return list.length ? list : fallback;
}

export function getSettings(): Settings {
  return {
    port: envInt("PORT", 3001),
    timeZone: envString("TIMEZONE", "Asia/Kolkata"),
    timezoneLabel: envString("TIMEZONE_LABEL", "IST"),
    // "10 Feb" resolves against this year; bump it when the booking window moves.
    dateReferenceYear: envInt("DATE_REFERENCE_YEAR", 2026),
    bookingCodePrefix: envString("BOOKING_CODE_PREFIX", "NL"),
    bookingDurationMin: envInt("BOOKING_DURATION_MIN", 30),
    availability: {
      weekdays: envIntList("AVAILABILITY_WEEKDAYS", [2, 3, 4, 5, 6]),
      startHour: envInt("AVAILABILITY_START_HOUR", 9),
      endHour: envInt("AVAILABILITY_END_HOUR", 17),
      daysAhead: envInt("AVAILABILITY_DAYS_AHEAD", 14),
      stepMinutes: envInt("SLOT_STEP_MIN", 30),
    },
    slotsFile: path.resolve(
      process.cwd(),
      envString("SLOTS_FILE", path.join("data", "mock_calendar.json"))
    ),
    sessionTtlMin: envInt("SESSION_TTL_MIN", 30),

    google: {
      clientId: envString("GOOGLE_CLIENT_ID"),
      clientSecret: envString("GOOGLE_CLIENT_SECRET"),
      redirectUrl: envString("GOOGLE_OAUTH_REDIRECT_URL"),
      stateSecret: envString("GOOGLE_STATE_SECRET"),
      accountId: envString("GOOGLE_ACCOUNT_ID", "advisor"),
      calendarId: envString("GOOGLE_CALENDAR_ID", "primary"),
      sheetId: envString("GOOGLE_SHEET_ID"),
    },

    advisorEmail: envString("ADVISOR_EMAIL"),
    smtp: {
      host: envString("SMTP_HOST"),
      port: envInt("SMTP_PORT", 587),
      user: envString("SMTP_USER"),
      pass: envString("SMTP_PASS"),
      from: envString("SMTP_FROM", "noreply@advisor-desk.local"),
    },

    adminJwtSecret: envString("ADMIN_JWT_SECRET"),
    corsOrigins: envString("CORS_ORIGINS")
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean),
  };
}

export function isGoogleConfigured(settings: Settings = getSettings()): boolean {
  return !!(settings.google.clientId && settings.google.clientSecret);
}

function hourLabel(h: number): string {
  if (h === 0 || h === 24) return "12am";
  if (h === 12) return "12pm";
  return h < 12 ? `${h}am` : `${h - 12}pm`;
}

/**
 * "Tuesday through Saturday, between 9am and 5pm" for contiguous weekdays,
 * otherwise the days are listed.
 */
export function describeAvailability(
  window: Pick<AvailabilityWindow, "weekdays" | "startHour" | "endHour">
): string {
  const days = [...new Set(window.weekdays)].sort((a, b) => a - b);
  const names = days.map((d) => WEEKDAY_LABELS[d - 1]);

  const contiguous = days.length > 2 && days.every((d, i) => i === 0 || d === days[i - 1] + 1);

  let dayText: string;
  if (!names.length) dayText = "any day";
  else if (contiguous) dayText = `${names[0]} through ${names[names.length - 1]}`;
  else if (names.length === 1) dayText = names[0];
  else dayText = `${names.slice(0, -1).join(", ")} and ${names[names.length - 1]}`;

  return `${dayText}, between ${hourLabel(window.startHour)} and ${hourLabel(window.endHour)}`;
}
