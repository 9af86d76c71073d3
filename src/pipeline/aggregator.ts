import type { Conversation, Message } from "./types.js";

const LOW_INFORMATION_WORDS: ReadonlySet<string> = new Set([
  "hi", "hey", "hello", "hiya", "yo", "sup",
  "thanks", "thank you", "thx", "ty", "thank u",
  "ok", "okay", "k", "kk", "sure", "yes", "no", "yep", "yup", "nope", "yeah",
  "lol", "lmao", "haha", "hehe",
  "good", "nice", "cool", "awesome", "great",
  "gm", "gn", "morning", "good morning", "afternoon", "evening", "night", "good night",
]);

const EMOJI_ONLY = /^[\p{Extended_Pictographic}\p{Emoji_Modifier}\u200d\ufe0f\s]+$/u;
const PUNCTUATION_ONLY = /^[\p{P}\p{S}\s]*$/u;
const LAUGHTER = /^(?:(?:ha){2,}h?|(?:he){2,}|lo+l)$/;
const TRAILING_PUNCTUATION = /[.!?,~]+$/;

function normalize(text: string): string {
  return text.trim().toLowerCase().replace(TRAILING_PUNCTUATION, "").trim();
}

export function isLowInformation(text: string): boolean {
  const trimmed = text.trim();
  if (PUNCTUATION_ONLY.test(trimmed)) return true;
  if (EMOJI_ONLY.test(trimmed)) return true;

  const normalized = normalize(trimmed);
  return LOW_INFORMATION_WORDS.has(normalized) || LAUGHTER.test(normalized);
}

/** Orders platform ids, which are decimal strings of varying length. */
export function compareIds(a: string, b: string): number {
  const numeric = /^\d+$/;
  if (numeric.test(a) && numeric.test(b) && a.length !== b.length) {
    return a.length - b.length;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareMessages(a: Message, b: Message): number {
  return a.sentAt - b.sentAt || compareIds(a.id, b.id);
}

/** The other participant of a one-on-one message, seen from `selfId`. */
export function counterpartOf(message: Message, selfId: string): string {
  return message.senderId === selfId ? message.recipientId : message.senderId;
}

export function aggregate(messages: readonly Message[], counterpartId: string): Conversation {
  const ordered = [...messages].sort(compareMessages);
  const filtered = ordered.filter((message) => !isLowInformation(message.text));

  return {
    counterpartId,
    messages: ordered,
    substantive: filtered.length > 0 ? filtered : ordered,
    messageCount: ordered.length,
  };
}
