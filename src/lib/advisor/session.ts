// src/lib/advisor/session.ts
import * as logger from "../logger";
import { describeAvailability, type AvailabilityWindow } from "../../config/settings";
import { generateBookingCode, type CodeGenerator } from "./bookingCode";
import { KeywordIntentClassifier } from "./intentClassifier";
import { handleCancelAskCode, handleCancelConfirm, handleRescheduleAskCode } from "./handlers/bookingCode";
import { handleComplete, handleConfirmation } from "./handlers/confirm";
import { handleIntentConfirmation } from "./handlers/intent";
import { handleDatetime, handleSlotChoice } from "./handlers/offerSlots";
import { handleDisclaimer, handleGreeting } from "./handlers/start";
import { handleTopic } from "./handlers/topic";
import type { HandlerResult, StateHandler } from "./handlers/types";
import {
  createContext,
  type AgentTurn,
  type ConversationContext,
  type ConversationState,
  type IntentClassifier,
  type SlotSource,
} from "./types";

const HANDLERS: Record<ConversationState, StateHandler> = {
  GREETING: handleGreeting,
  DISCLAIMER: handleDisclaimer,
  INTENT_CONFIRMATION: handleIntentConfirmation,
  TOPIC_COLLECTION: handleTopic,
  DATETIME_COLLECTION: handleDatetime,
  SLOT_OFFER: handleSlotChoice,
  CONFIRMATION: handleConfirmation,
  BOOKING_COMPLETE: handleComplete,
  RESCHEDULE_ASK_CODE: handleRescheduleAskCode,
  CANCEL_ASK_CODE: handleCancelAskCode,
  CANCEL_CONFIRM: handleCancelConfirm,
};

// The classifier's guess is only taken while the user is choosing what to do.
const INTENT_STATES: ReadonlySet<ConversationState> = new Set<ConversationState>([
  "GREETING",
  "DISCLAIMER",
  "INTENT_CONFIRMATION",
]);

export type SessionOptions = {
  slotSource: SlotSource;
  timezoneLabel?: string;
  referenceYear?: number;
  bookingCodePrefix?: string;
  generateBookingCode?: CodeGenerator;
  classifier?: IntentClassifier;
  availability?: Pick<AvailabilityWindow, "weekdays" | "startHour" | "endHour">;
};

function snapshot(ctx: ConversationContext): Readonly<ConversationContext> {
  return Object.freeze({ ...ctx, offeredSlots: [...ctx.offeredSlots] });
}

/**
 * One linear conversation. Each `step` runs the current state's handler
 * once and applies its patch. Overlapping calls are queued: a turn starts
 * from the state the previous one left.
 */
export class ConversationSession {
  private _state: ConversationState = "GREETING";
  private ctx: ConversationContext = createContext();

  private readonly slotSource: SlotSource;
  private readonly classifier: IntentClassifier;
  private readonly timezoneLabel: string;
  private readonly referenceYear: number;
  private readonly availabilityText: string;
  private readonly nextCode: CodeGenerator;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(opts: SessionOptions) {
    this.slotSource = opts.slotSource;
    this.classifier = opts.classifier ?? new KeywordIntentClassifier();
    this.timezoneLabel = opts.timezoneLabel ?? "IST";
    this.referenceYear = opts.referenceYear ?? 2026;
    this.availabilityText = describeAvailability(
      opts.availability ?? { weekdays: [2, 3, 4, 5, 6], startHour: 9, endHour: 17 }
    );

    const prefix = opts.bookingCodePrefix ?? "NL";
    this.nextCode = opts.generateBookingCode ?? (async () => generateBookingCode(prefix));
  }

  get state(): ConversationState {
    return this._state;
  }

  get context(): Readonly<ConversationContext> {
    return snapshot(this.ctx);
  }

  step(userText: string): Promise<AgentTurn> {
    return this.stepThen(userText, async (_from, turn) => turn);
  }

  /**
   * Runs a turn, then `after` with the state it started from, before the
   * next queued turn begins.
   */
  stepThen<T>(userText: string, after: (from: ConversationState, turn: AgentTurn) => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const from = this._state;
      return after(from, await this.runTurn(userText));
    });
    // The caller sees the failure; the queue moves on.
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async runTurn(userText: string): Promise<AgentTurn> {
    const text = typeof userText === "string" ? userText : "";
    const intentResult = this.classifier.classify(text);

    if (intentResult.intent && !this.ctx.existingBookingCode && INTENT_STATES.has(this._state)) {
      this.ctx = { ...this.ctx, intent: intentResult.intent };
    }

    const from = this._state;
    let out: HandlerResult;
    try {
      out = await HANDLERS[from]({
        userText: text,
        ctx: snapshot(this.ctx),
        intentResult,
        timezoneLabel: this.timezoneLabel,
        availabilityText: this.availabilityText,
        referenceYear: this.referenceYear,
        slotSource: this.slotSource,
        generateBookingCode: this.nextCode,
      });
    } catch (e) {
      logger.error("❌ [ADVISOR] handler failed in", from, e instanceof Error ? e.message : e);
      out = { state: from, reply: "Sorry, something went wrong on my side. Could you say that again?" };
    }

    if (out.ctxPatch) this.ctx = { ...this.ctx, ...out.ctxPatch };
    this._state = out.state;

    logger.debug("🗓️ [ADVISOR] transition", { from, to: out.state, intent: this.ctx.intent });

    return { text: out.reply, state: this._state, context: snapshot(this.ctx), intentResult };
  }
}
