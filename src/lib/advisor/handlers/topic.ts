// src/lib/advisor/handlers/topic.ts
import { TOPIC_LABELS } from "../catalog";
import { detectTopic } from "../text";
import type { StateHandler } from "./types";

export const handleTopic: StateHandler = async ({ userText, timezoneLabel, availabilityText }) => {
  const topicLabel = detectTopic(userText);

  if (!topicLabel) {
    return {
      state: "TOPIC_COLLECTION",
      reply:
        "I didn't quite catch the topic. Please choose one of these:\n" +
        TOPIC_LABELS.map((label) => `- ${label}`).join("\n"),
    };
  }

  return {
    state: "DATETIME_COLLECTION",
    ctxPatch: { topicLabel },
    reply:
      `Got it, we'll discuss **${topicLabel}**.\n\n` +
      `You can book a slot, if available, **${availabilityText}** (${timezoneLabel}). ` +
      "On which day and roughly what time would you prefer to speak with the advisor?",
  };
};
