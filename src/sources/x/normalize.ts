import { z } from "zod";
import type { Message, Profile } from "../../pipeline/types.js";
import type { Identity, MessagePage, RecentEvent, RecentPage } from "../types.js";
import type { Logger } from "../../logging/logger.js";
import { NotFoundError } from "../../utils/errors.js";

const dmEventSchema = z.object({
  id: z.string().min(1),
  event_type: z.string(),
  text: z.string().default(""),
  sender_id: z.string().min(1),
  dm_conversation_id: z.string().optional(),
  created_at: z.string().refine((v) => !Number.isNaN(Date.parse(v)), "invalid timestamp"),
});

type DmEvent = z.infer<typeof dmEventSchema>;

const eventsEnvelopeSchema = z.object({
  data: z.array(z.unknown()).optional(),
  meta: z.object({ next_token: z.string().optional() }).passthrough().optional(),
});

const urlEntitySchema = z.object({
  url: z.string().optional(),
  expanded_url: z.string().optional(),
});

const userSchema = z.object({
  id: z.string(),
  username: z.string(),
  name: z.string().default(""),
  description: z.string().optional(),
  location: z.string().optional(),
  url: z.string().optional(),
  verified: z.boolean().optional(),
  entities: z
    .object({ url: z.object({ urls: z.array(urlEntitySchema).optional() }).optional() })
    .passthrough()
    .optional(),
});

const userEnvelopeSchema = z.object({ data: userSchema.optional() });

const MESSAGE_CREATE = "MessageCreate";

function parseEvents(payload: unknown, log: Logger): { events: DmEvent[]; nextCursor?: string } {
  const envelope = eventsEnvelopeSchema.parse(payload);
  const events: DmEvent[] = [];
  for (const raw of envelope.data ?? []) {
    const parsed = dmEventSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn({ issues: parsed.error.issues.map((i) => i.message) }, "dropping malformed DM event");
      continue;
    }
    if (parsed.data.event_type !== MESSAGE_CREATE) continue;
    events.push(parsed.data);
  }
  return { events, nextCursor: envelope.meta?.next_token };
}

export function normalizeDmEvents(
  payload: unknown,
  counterpartId: string,
  selfId: string,
  log: Logger,
): MessagePage {
  const { events, nextCursor } = parseEvents(payload, log);
  const messages: Message[] = events.map((e) => ({
    id: e.id,
    senderId: e.sender_id,
    recipientId: e.sender_id === counterpartId ? selfId : counterpartId,
    text: e.text,
    sentAt: Date.parse(e.created_at),
  }));
  return { messages, nextCursor };
}

/**
 * The other participant of a one-on-one conversation id (`"<a>-<b>"`), or the
 * sender when the id has another shape.
 */
export function conversationCounterpart(
  conversationId: string | undefined,
  senderId: string,
  selfId: string,
): string {
  const parts = conversationId?.split("-") ?? [];
  if (parts.length === 2 && parts.includes(selfId)) {
    const other = parts.find((p) => p !== selfId);
    if (other) return other;
  }
  return senderId;
}

export function normalizeRecentEvents(payload: unknown, selfId: string, log: Logger): RecentPage {
  const { events, nextCursor } = parseEvents(payload, log);
  const recent: RecentEvent[] = events.map((e) => ({
    counterpartId: conversationCounterpart(e.dm_conversation_id, e.sender_id, selfId),
    sentAt: Date.parse(e.created_at),
  }));
  return { events: recent, nextCursor };
}

export function normalizeUser(payload: unknown, counterpartId: string): Profile {
  const { data } = userEnvelopeSchema.parse(payload);
  if (!data) {
    throw new NotFoundError(`User ${counterpartId} not found`);
  }

  const expanded = data.entities?.url?.urls?.[0]?.expanded_url;
  return {
    counterpartId: data.id,
    username: data.username,
    displayName: data.name,
    bio: data.description || undefined,
    location: data.location || undefined,
    website: expanded || data.url || undefined,
    verified: data.verified ?? false,
  };
}

export function normalizeMe(payload: unknown): Identity {
  const { data } = userEnvelopeSchema.parse(payload);
  if (!data) {
    throw new NotFoundError("Authenticated user lookup returned no data");
  }
  return { id: data.id, username: data.username };
}
