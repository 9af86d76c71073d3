import type { Conversation, Message, Profile, SummaryResult } from "./types.js";
import type { TextModel } from "../ai/types.js";
import type { Logger } from "../logging/logger.js";
import { errorMessage } from "../utils/errors.js";

export interface Summarizer {
  /** Never throws; always returns non-empty text. */
  summarize(conversation: Conversation, profile: Profile): Promise<SummaryResult>;
}

export interface ModelSummarizerOptions {
  readonly maxWords: number;
  readonly maxPromptMessages: number;
  readonly temperature: number;
}

const TOPIC_KEYWORDS: readonly (readonly [string, readonly string[]])[] = [
  ["work/project", ["project", "work", "meeting", "deadline", "task", "client"]],
  ["collaboration", ["collaborate", "partner", "team", "together", "joint"]],
  ["planning", ["plan", "schedule", "when", "where", "time", "date"]],
  ["business", ["business", "deal", "proposal", "contract", "opportunity"]],
  ["technical", ["code", "github", "api", "database", "bug", "feature"]],
  ["social", ["event", "party", "dinner", "coffee", "hang out", "meet up"]],
];

const ACTION_KEYWORDS = ["agreed", "decided", "planned", "scheduled", "will", "going to", "next"];

const MAX_TOPICS = 2;

const SYSTEM_PROMPT =
  "You are a helpful assistant that creates concise, accurate summaries of conversations while protecting privacy.";

function formatDay(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

function formatMinute(ms: number): string {
  return new Date(ms).toISOString().slice(0, 16).replace("T", " ");
}

export function detectTopics(text: string): string[] {
  return TOPIC_KEYWORDS.filter(([, keywords]) => keywords.some((k) => text.includes(k))).map(
    ([topic]) => topic,
  );
}

export function fallbackSummary(conversation: Conversation, profile: Profile): string {
  const name = `@${profile.username}`;
  const { messages, messageCount } = conversation;
  const first = messages[0];
  const last = messages[messages.length - 1];
  if (!first || !last) {
    return `No messages with ${name} (0 messages)`;
  }

  const allText = messages.map((m) => m.text.toLowerCase()).join(" ");
  const topics = detectTopics(allText).slice(0, MAX_TOPICS);

  const start = formatDay(first.sentAt);
  const end = formatDay(last.sentAt);
  const range = start === end ? start : `${start} to ${end}`;

  let summary =
    topics.length > 0
      ? `Conversation with ${name} about ${topics.join(", ")}`
      : `General conversation with ${name}`;
  summary += ` (${messageCount} messages, ${range})`;

  if (ACTION_KEYWORDS.some((k) => allText.includes(k))) {
    summary += ". Contains agreements or planned actions";
  }
  return summary;
}

/**
 * Cuts `text` to at most `maxWords` words. A cut keeps room for the ellipsis,
 * ends on the last sentence boundary if that keeps 70% of the kept text, and
 * always ends with "...".
 */
export function enforceWordLimit(text: string, maxWords: number): string {
  const trimmed = text.trim();
  const words = trimmed.split(/\s+/);
  if (words.length <= maxWords) return trimmed;

  const truncated = words.slice(0, Math.max(1, maxWords - 3)).join(" ");
  const sentenceEnd = Math.max(truncated.lastIndexOf("."), truncated.lastIndexOf("•"));
  if (sentenceEnd > truncated.length * 0.7) {
    return `${truncated.slice(0, sentenceEnd + 1)}...`;
  }
  return `${truncated}...`;
}

export function formatTranscript(messages: readonly Message[], counterpartId: string): string {
  return messages
    .map((m) => {
      const who = m.senderId === counterpartId ? "them" : "me";
      return `[${formatMinute(m.sentAt)}] ${who}: ${m.text}`;
    })
    .join("\n");
}

export function buildSummaryPrompt(
  conversation: Conversation,
  profile: Profile,
  opts: Pick<ModelSummarizerOptions, "maxWords" | "maxPromptMessages">,
): string {
  const recent = conversation.substantive.slice(-opts.maxPromptMessages);
  const transcript = formatTranscript(recent, conversation.counterpartId);

  return `Summarize this direct-message conversation in ${opts.maxWords} words or less, focusing on KEY INFORMATION ONLY.

Conversation with @${profile.username} (${profile.displayName}). Total messages: ${conversation.messageCount}

PRIORITIZATION GUIDELINES (in order of importance):
1. DECISIONS MADE: agreements, plans or conclusions reached
2. ACTION ITEMS: tasks, commitments or next steps mentioned
3. KEY TOPICS: main subjects discussed
4. IMPORTANT DATES/EVENTS: specific meetings, deadlines or events

FILTERING RULES:
- EXCLUDE: greetings, small talk, thanks, casual banter
- EXCLUDE: personal details, addresses, phone numbers and other sensitive data; never quote them verbatim
- If it is mostly casual chat, state: "Casual conversation about [topic]"

FORMAT: concise bullet points or short sentences.

Conversation:
${transcript}

KEY SUMMARY:`;
}

export class FallbackSummarizer implements Summarizer {
  async summarize(conversation: Conversation, profile: Profile): Promise<SummaryResult> {
    return { text: fallbackSummary(conversation, profile), source: "fallback" };
  }
}

export class ModelSummarizer implements Summarizer {
  private readonly log: Logger;

  constructor(
    private readonly model: TextModel,
    private readonly fallback: Summarizer,
    private readonly opts: ModelSummarizerOptions,
    log: Logger,
  ) {
    this.log = log.child({ component: "summarizer" });
  }

  async summarize(conversation: Conversation, profile: Profile): Promise<SummaryResult> {
    if (conversation.messageCount === 0) {
      return this.fallback.summarize(conversation, profile);
    }

    const prompt = buildSummaryPrompt(conversation, profile, this.opts);
    try {
      const answer = await this.model.complete(prompt, {
        system: SYSTEM_PROMPT,
        maxTokens: Math.min(this.opts.maxWords * 2, 500),
        temperature: this.opts.temperature,
      });
      const text = enforceWordLimit(answer, this.opts.maxWords);
      if (!text) {
        this.log.warn({ counterpartId: conversation.counterpartId }, "empty summary, using fallback");
        return this.fallback.summarize(conversation, profile);
      }
      this.log.debug(
        { counterpartId: conversation.counterpartId, words: text.split(/\s+/).length },
        "summary generated",
      );
      return { text, source: "ai" };
    } catch (err) {
      this.log.warn(
        { counterpartId: conversation.counterpartId, err: errorMessage(err) },
        "summary model unavailable, using fallback",
      );
      return this.fallback.summarize(conversation, profile);
    }
  }
}
