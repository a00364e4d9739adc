// src/lib/advisor/handlers/offerSlots.ts
// DATETIME_COLLECTION and SLOT_OFFER.
import { TOKENS } from "../catalog";
import { offerSlots } from "../offerSlots";
import { hasPreference, parsePreferredDateTime } from "../preference";
import { renderSlotOptions, slotLabel } from "../slot";
import { includesAny, lower, parseOptionPick } from "../text";
import type { Slot } from "../types";
import type { HandlerDeps, HandlerResult, StateHandler } from "./types";

const PICK_PROMPT =
  "Please say 'first' or 'option 1', or 'second' or 'option 2'. If neither works, say 'none'.";

const WAITLIST_OFFER =
  "I couldn't find any open advisor slots matching your preference. " +
  "For now, I can place you on a waitlist and an advisor will reach out " +
  "when a suitable time opens. Would you like to be added to the waitlist?";

function renderOffer(intro: string, slots: readonly Slot[]) {
  return `${intro}\n\n${renderSlotOptions(slots)}\n\n${PICK_PROMPT}`;
}

function anotherTime(lead: string, timezoneLabel: string) {
  return `${lead} Tell me another day and time that works for you, in ${timezoneLabel}.`;
}

export const handleDatetime: StateHandler = async ({ userText, slotSource, referenceYear }) => {
  const preferredDatetimeText = userText.trim() || null;
  const slots = await offerSlots(slotSource, preferredDatetimeText, { referenceYear });

  return {
    state: "SLOT_OFFER",
    ctxPatch: { preferredDatetimeText, offeredSlots: slots, chosenSlotIndex: null },
    reply: slots.length
      ? renderOffer("Thanks. Based on your preference, here are two available slots:", slots)
      : WAITLIST_OFFER,
  };
};

async function reoffer(deps: HandlerDeps): Promise<HandlerResult> {
  const preferredDatetimeText = deps.userText.trim();
  const slots = await offerSlots(deps.slotSource, preferredDatetimeText, {
    referenceYear: deps.referenceYear,
  });
  const ctxPatch = { preferredDatetimeText, offeredSlots: slots, chosenSlotIndex: null };

  if (!slots.length) {
    return {
      state: "DATETIME_COLLECTION",
      ctxPatch,
      reply: anotherTime("I couldn't find any slots for that day.", deps.timezoneLabel),
    };
  }

  return {
    state: "SLOT_OFFER",
    ctxPatch,
    reply: renderOffer("No problem. Based on your new preference, here are two available slots:", slots),
  };
}

function pickFromWords(t: string): 0 | 1 | null {
  // "second one" names option 2 even though it contains "one".
  if (t.includes("second") || t.includes("option 2") || t.includes("slot 2")) return 1;
  if (includesAny(t, TOKENS.slotFirst)) return 0;
  if (includesAny(t, TOKENS.slotSecond)) return 1;
  return null;
}

export const handleSlotChoice: StateHandler = async (deps) => {
  const { userText, ctx, timezoneLabel, referenceYear } = deps;
  const t = lower(userText);

  // A bare "1" / "option 2" is a pick, not a clock time.
  let idx = parseOptionPick(t);

  if (idx === null) {
    const pref = parsePreferredDateTime(t, referenceYear);
    if (hasPreference(pref) && t.length > 2) return reoffer(deps);

    // "none" before "one"
    if (includesAny(t, TOKENS.slotNone)) {
      return {
        state: "BOOKING_COMPLETE",
        reply:
          "I understand that none of the suggested slots work for you. " +
          "I'll place a note to add you to the waitlist so an advisor can " +
          "offer alternatives. You won't be booked into any slot right now.",
      };
    }

    // Answering the waitlist question after an empty offer.
    if (!ctx.offeredSlots.length) {
      if (includesAny(t, TOKENS.disclaimerYes)) {
        return {
          state: "BOOKING_COMPLETE",
          reply:
            "You're on the waitlist. An advisor will reach out when a suitable time opens. " +
            "You won't be booked into any slot right now.",
        };
      }
      if (includesAny(t, TOKENS.cancelNo)) {
        return { state: "DATETIME_COLLECTION", reply: anotherTime("No problem.", timezoneLabel) };
      }
    }

    idx = pickFromWords(t);
  }

  if (idx === null) {
    return {
      state: "SLOT_OFFER",
      reply:
        "Please choose one of the options by saying 'first' or 'second'. " +
        "If neither works, say 'none'. Or tell me a different day and time (e.g. Friday, 10am).",
    };
  }

  const chosen = ctx.offeredSlots[idx];
  if (!chosen) {
    return {
      state: "DATETIME_COLLECTION",
      reply: "Those options seem to have expired. Let me fetch fresh slots. Which day and time suits you?",
    };
  }

  return {
    state: "CONFIRMATION",
    ctxPatch: { chosenSlotIndex: idx },
    reply:
      "Just to confirm, I have you for:\n" +
      `- ${slotLabel(chosen)}\n\n` +
      `All times are in ${timezoneLabel}. ` +
      "Shall I place a tentative hold for this advisor slot?",
  };
};
