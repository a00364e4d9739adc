// src/lib/advisor/catalog.ts
// Keyword tables. Order matters: earlier entries win ties.
import type { IntentName, TopicLabel } from "./types";

export const DISCLAIMER =
  "This is for informational purposes only and does not constitute investment advice. " +
  "Please consult a qualified advisor for decisions.";

export const INTENT_KEYWORDS: ReadonlyArray<readonly [IntentName, readonly string[]]> = [
  ["book_new", ["book", "schedule", "appointment", "slot", "meeting"]],
  ["reschedule", ["change", "reschedule", "move", "different time", "postpone"]],
  ["cancel", ["cancel", "delete", "remove", "abort"]],
  ["prepare", ["what to bring", "prepare", "documents needed", "what do i need"]],
  ["availability", ["when available", "free slots", "open times", "availability"]],
];

export const TOPICS: ReadonlyArray<readonly [TopicLabel, readonly string[]]> = [
  ["KYC/Onboarding", ["kyc", "onboarding", "verification", "documents", "identity"]],
  ["SIP/Mandates", ["sip", "mandate", "systematic", "recurring", "auto-debit"]],
  ["Statements/Tax Docs", ["statement", "tax", "form 16", "capital gains", "annual statement"]],
  ["Withdrawals & Timelines", ["withdraw", "redeem", "timeline", "when will i get", "payout"]],
  ["Account Changes/Nominee", ["change", "nominee", "bank details", "update", "modify"]],
];

export const TOPIC_LABELS: readonly TopicLabel[] = TOPICS.map(([label]) => label);

export const DEFAULT_TOPIC = "Advisor Q&A";

// Dialog tokens, matched as lower-case substrings.
export const TOKENS = {
  disclaimerYes: ["yes", "yeah", "ok", "sure", "continue", "go ahead"],

  intentCancel: ["cancel", "abort", "delete", "remove"],
  intentReschedule: ["reschedule", "change booking", "move my slot", "postpone", "different time"],
  intentBook: ["book", "new slot", "appointment", "schedule a", "book a"],
  intentBookLoose: ["schedule", "slot", "meeting"],

  cancelYes: ["yes", "yeah", "confirm", "go ahead", "cancel", "sure", "ok"],
  cancelNo: ["no", "don't", "do not"],

  slotNone: ["none", "neither"],
  slotFirst: ["first", "1", "one", "option 1", "slot 1"],
  slotSecond: ["second", "2", "two", "option 2", "slot 2"],

  confirmYes: ["yes", "yeah", "confirm", "go ahead", "book", "sounds good", "ok", "sure"],
  confirmNo: ["no", "don't", "do not", "change", "different"],
} as const;
