// src/lib/advisor/preference.ts
import { DateTime } from "luxon";

export type PreferredDateTime = {
  /** Luxon weekday, 1=Mon ... 7=Sun */
  weekday: number | null;
  /** Minutes since midnight */
  minutes: number | null;
  /** YYYY-MM-DD */
  date: string | null;
};

const MONTHS: ReadonlyArray<readonly string[]> = [
  ["january", "jan"],
  ["february", "feb"],
  ["march", "mar"],
  ["april", "apr"],
  ["may"],
  ["june", "jun"],
  ["july", "jul"],
  ["august", "aug"],
  ["september", "sept", "sep"],
  ["october", "oct"],
  ["november", "nov"],
  ["december", "dec"],
];

const WEEKDAY_NAMES = ["monday", "tuesday", "wednesday", "thursday", "friday", "saturday", "sunday"];

// Index = luxon weekday - 1
const WEEKDAY_ABBREVS: ReadonlyArray<readonly string[]> = [
  ["mon"],
  ["tue", "tues"],
  ["wed"],
  ["thu", "thur", "thurs"],
  ["fri"],
  ["sat"],
  ["sun"],
];

const NOTHING: PreferredDateTime = { weekday: null, minutes: null, date: null };

type DateHit = { date: string; weekday: number; matched: string };

function resolveDate(year: number, month: number, day: number): DateTime | null {
  if (day < 1 || day > 31) return null;
  const dt = DateTime.fromObject({ year, month, day });
  return dt.isValid ? dt : null;
}

function findExplicitDate(t: string, referenceYear: number): DateHit | null {
  for (let i = 0; i < MONTHS.length; i++) {
    const month = `(?:${MONTHS[i].join("|")})`;

    const patterns = [
      new RegExp(`(?<![\\d:])(\\d{1,2})\\s*${month}\\b`),
      new RegExp(`\\b${month}\\s*(\\d{1,2})\\b`),
    ];

    for (const re of patterns) {
      const m = t.match(re);
      if (!m) continue;
      const dt = resolveDate(referenceYear, i + 1, Number(m[1]));
      const iso = dt?.toISODate();
      if (dt && iso) return { date: iso, weekday: dt.weekday, matched: m[0] };
    }
  }
  return null;
}

function findWeekday(t: string): number | null {
  for (let i = 0; i < WEEKDAY_NAMES.length; i++) {
    if (new RegExp(`\\b${WEEKDAY_NAMES[i]}`).test(t)) return i + 1;
  }
  for (let i = 0; i < WEEKDAY_ABBREVS.length; i++) {
    if (WEEKDAY_ABBREVS[i].some((a) => new RegExp(`\\b${a}\\b`).test(t))) return i + 1;
  }
  return null;
}

function to24h(hour: number, minute: number, ampm: string | undefined): number | null {
  if (hour > 23 || minute > 59) return null;
  let h = hour;
  if (ampm === "pm" && h < 12) h += 12;
  else if (ampm === "am" && h === 12) h = 0;
  return h * 60 + minute;
}

// "10am", "2 pm", "14:30", "9:15am", or a bare hour.
function findTime(t: string): number | null {
  const m = t.match(/(?:^|\s)(\d{1,2})(?::(\d{2}))?\s*(am|pm)?(?=\s|$|[,.!?;])/);
  if (m) {
    const minutes = to24h(Number(m[1]), m[2] ? Number(m[2]) : 0, m[3]);
    if (minutes !== null) return minutes;
  }

  const loose = t.match(/\b(\d{1,2})\s*(am|pm)\b/);
  if (loose) return to24h(Number(loose[1]), 0, loose[2]);

  return null;
}

/**
 * Reads a spoken or typed preference such as "Friday, 10am", "4 Feb, 10am"
 * or "Feb 4 at 14:30". An explicit date wins over a weekday name and
 * brings its own weekday; the time is read independently.
 */
export function parsePreferredDateTime(text: string, referenceYear: number): PreferredDateTime {
  const t = String(text || "").toLowerCase().trim();
  if (!t) return { ...NOTHING };

  const hit = findExplicitDate(t, referenceYear);
  if (hit) {
    return {
      weekday: hit.weekday,
      minutes: findTime(t.replace(hit.matched, " ")),
      date: hit.date,
    };
  }

  return { weekday: findWeekday(t), minutes: findTime(t), date: null };
}

export function hasPreference(p: PreferredDateTime) {
  return p.weekday !== null || p.minutes !== null || p.date !== null;
}
