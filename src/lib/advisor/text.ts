// src/lib/advisor/text.ts
import { TOPICS } from "./catalog";
import type { TopicLabel } from "./types";

export function lower(s: string) {
  return String(s || "").toLowerCase().trim();
}

export function includesAny(text: string, tokens: readonly string[]) {
  const t = lower(text);
  return tokens.some((tok) => t.includes(tok));
}

export function detectTopic(text: string): TopicLabel | null {
  const t = lower(text);
  if (!t) return null;

  for (const [label, keywords] of TOPICS) {
    if (keywords.some((kw) => t.includes(kw.toLowerCase()))) return label;
  }
  return null;
}

// "1", "option 2", "I'll take slot 1": a pick, never a clock time.
export function parseOptionPick(text: string): 0 | 1 | null {
  const t = lower(text);
  const m = t.match(/^([12])\s*[).]?$/) ?? t.match(/\b(?:option|slot)\s*([12])\b/);
  if (!m) return null;
  return m[1] === "1" ? 0 : 1;
}

// For voice output: drop markdown emphasis and bullets.
export function toPlainSpeech(text: string) {
  return String(text || "")
    .replace(/\*\*/g, "")
    .replace(/^\s*[-•]\s+/gm, "")
    .replace(/\n{2,}/g, "\n")
    .trim();
}
