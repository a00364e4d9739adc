// src/lib/advisor/intentClassifier.ts
import { INTENT_KEYWORDS } from "./catalog";
import type { IntentClassifier, IntentName, IntentResult } from "./types";

type IntentTable = ReadonlyArray<readonly [IntentName, readonly string[]]>;

function confidenceFor(score: number): IntentResult["confidence"] {
  if (score <= 0) return 0;
  if (score === 1) return 0.4;
  if (score === 2) return 0.7;
  return 0.9;
}

/**
 * Counts keyword-phrase hits per intent and keeps the strictly highest
 * count; ties stay with the intent declared first.
 *
 * Any classifier honoring `IntentClassifier` (same vocabulary, same
 * confidence ladder) can replace this one.
 */
export class KeywordIntentClassifier implements IntentClassifier {
  constructor(private readonly intents: IntentTable = INTENT_KEYWORDS) {}

  classify(text: string): IntentResult {
    const rawText = typeof text === "string" ? text : "";
    const t = rawText.toLowerCase().trim();
    if (!t) return { intent: null, confidence: 0, rawText };

    let bestIntent: IntentName | null = null;
    let bestScore = 0;

    for (const [intent, keywords] of this.intents) {
      const score = keywords.filter((kw) => t.includes(kw.toLowerCase())).length;
      if (score > bestScore) {
        bestScore = score;
        bestIntent = intent;
      }
    }

    if (!bestIntent) return { intent: null, confidence: 0, rawText };
    return { intent: bestIntent, confidence: confidenceFor(bestScore), rawText };
  }
}

export function classifyIntent(text: string): IntentResult {
  return new KeywordIntentClassifier().classify(text);
}
