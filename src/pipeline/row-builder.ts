import type { Conversation, LinkedInResult, OutputRow, Profile, SummaryResult } from "./types.js";

/** `YYYY-MM-DD HH:MM:SS` in UTC. */
export function formatTimestamp(ms: number): string {
  return new Date(ms).toISOString().slice(0, 19).replace("T", " ");
}

export function buildRow(
  profile: Profile,
  conversation: Conversation,
  summary: SummaryResult,
  linkedin: LinkedInResult,
): OutputRow {
  const last = conversation.messages[conversation.messages.length - 1];

  return {
    counterpartId: profile.counterpartId,
    username: profile.username,
    displayName: profile.displayName,
    linkedinUrl: linkedin.url ?? "",
    location: profile.location ?? "",
    bio: profile.bio ?? "",
    website: profile.website ?? "",
    verified: profile.verified === true,
    summary: summary.text,
    messageCount: conversation.messageCount,
    lastMessageAt: last ? formatTimestamp(last.sentAt) : "",
  };
}
