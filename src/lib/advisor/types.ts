// src/lib/advisor/types.ts

export type ConversationState =
  | "GREETING"
  | "DISCLAIMER"
  | "INTENT_CONFIRMATION"
  | "TOPIC_COLLECTION"
  | "DATETIME_COLLECTION"
  | "SLOT_OFFER"
  | "CONFIRMATION"
  | "BOOKING_COMPLETE"
  | "RESCHEDULE_ASK_CODE"
  | "CANCEL_ASK_CODE"
  | "CANCEL_CONFIRM";

export type IntentName = "book_new" | "reschedule" | "cancel" | "prepare" | "availability";

export type TopicLabel =
  | "KYC/Onboarding"
  | "SIP/Mandates"
  | "Statements/Tax Docs"
  | "Withdrawals & Timelines"
  | "Account Changes/Nominee";

export type Slot = {
  readonly date: string; // YYYY-MM-DD
  readonly time: string; // HH:mm (24h)
  readonly timezone: string;
};

export type IntentResult = {
  intent: IntentName | null;
  confidence: 0 | 0.4 | 0.7 | 0.9;
  rawText: string;
};

export type ConversationContext = {
  intent: IntentName | null;
  topicLabel: TopicLabel | null;
  preferredDatetimeText: string | null;
  offeredSlots: Slot[];
  chosenSlotIndex: 0 | 1 | null;

  // new bookings only
  bookingCode: string | null;
  // reschedule / cancel of a booking made earlier
  existingBookingCode: string | null;
};

export type AgentTurn = {
  text: string;
  state: ConversationState;
  context: Readonly<ConversationContext>;
  intentResult: IntentResult;
};

export interface SlotSource {
  listOfferableSlots(): Promise<Slot[]>;
}

export interface IntentClassifier {
  classify(text: string): IntentResult;
}

export function createContext(): ConversationContext {
  return {
    intent: null,
    topicLabel: null,
    preferredDatetimeText: null,
    offeredSlots: [],
    chosenSlotIndex: null,
    bookingCode: null,
    existingBookingCode: null,
  };
}
