// src/lib/advisor/bookingCode.ts
import { randomInt } from "crypto";
import * as logger from "../logger";

const LETTERS = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";

/** Returns an integer in [min, max). */
export type RandomInt = (min: number, max: number) => number;

export type CodeGenerator = () => Promise<string>;

/** "NL-A742": prefix, one letter, three digits. */
export function generateBookingCode(prefix: string, rand: RandomInt = randomInt): string {
  const letter = LETTERS[rand(0, LETTERS.length)];
  const number = rand(100, 1000);
  return `${prefix}-${letter}${number}`;
}

// Uppercase alphanumerics only: "nl a742", "NL-A742" and "NLA742" compare equal.
export function normalizeBookingCode(code: string) {
  return String(code || "").toUpperCase().replace(/[^A-Z0-9]/g, "");
}

export function sameBookingCode(a: string, b: string) {
  const na = normalizeBookingCode(a);
  return na !== "" && na === normalizeBookingCode(b);
}

/**
 * Regenerates while `isTaken` reports the candidate as already used.
 * A failing lookup accepts the candidate; after `maxAttempts` the last
 * candidate is returned.
 */
export function createLedgerAwareCodeGenerator(
  isTaken: (code: string) => Promise<boolean>,
  opts: { prefix: string; maxAttempts?: number; rand?: RandomInt }
): CodeGenerator {
  const maxAttempts = Math.max(1, opts.maxAttempts ?? 5);

  return async () => {
    let code = generateBookingCode(opts.prefix, opts.rand);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      let taken: boolean;
      try {
        taken = await isTaken(code);
      } catch (e) {
        logger.warn("⚠️ [BOOKING] code lookup failed, accepting", code, e instanceof Error ? e.message : e);
        return code;
      }
      if (!taken) return code;

      logger.debug("🔁 [BOOKING] code already in ledger:", code);
      if (attempt < maxAttempts) code = generateBookingCode(opts.prefix, opts.rand);
    }

    logger.warn("⚠️ [BOOKING] no free code after", maxAttempts, "attempts, using", code);
    return code;
  };
}
