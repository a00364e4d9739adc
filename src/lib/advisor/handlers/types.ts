// src/lib/advisor/handlers/types.ts
import type { CodeGenerator } from "../bookingCode";
import type {
  ConversationContext,
  ConversationState,
  IntentResult,
  SlotSource,
} from "../types";

export type HandlerDeps = {
  userText: string;
  ctx: Readonly<ConversationContext>;
  intentResult: IntentResult;

  timezoneLabel: string;
  // "Tuesday through Saturday, between 9am and 5pm"
  availabilityText: string;
  referenceYear: number;
  slotSource: SlotSource;
  generateBookingCode: CodeGenerator;
};

export type HandlerResult = {
  state: ConversationState;
  reply: string;
  ctxPatch?: Partial<ConversationContext>;
};

export type StateHandler = (deps: HandlerDeps) => Promise<HandlerResult>;
