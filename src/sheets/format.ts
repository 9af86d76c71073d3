import type { OutputRow } from "../pipeline/types.js";

export const HEADERS = [
  "Username",
  "User ID",
  "Real Name",
  "LinkedIn URL",
  "Location",
  "Bio",
  "Website",
  "Verified",
  "Conversation Summary",
  "Message Count",
  "Last Message Date",
] as const;

/** Zero-based index of the "User ID" key column. */
export const KEY_COLUMN = 1;

export const CELL_LIMIT = 50_000;
const TRUNCATION_SUFFIX = "... [truncated]";

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

export function fitCell(value: string): string {
  if (value.length <= CELL_LIMIT) return value;
  let cut = CELL_LIMIT - 50;
  // Never split a surrogate pair.
  if (isHighSurrogate(value.charCodeAt(cut - 1))) cut--;
  return value.slice(0, cut) + TRUNCATION_SUFFIX;
}

export function fallbackUsername(counterpartId: string): string {
  return `User_${counterpartId.slice(0, 8)}`;
}

export function toCells(row: OutputRow): string[] {
  return [
    row.username || fallbackUsername(row.counterpartId),
    row.counterpartId,
    fitCell(row.displayName),
    row.linkedinUrl,
    fitCell(row.location),
    fitCell(row.bio),
    row.website,
    row.verified ? "TRUE" : "FALSE",
    fitCell(row.summary),
    String(row.messageCount),
    row.lastMessageAt,
  ];
}

/** Column letter for a zero-based index (0 → A). */
export function columnLetter(index: number): string {
  let n = index + 1;
  let letters = "";
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

export const LAST_COLUMN = columnLetter(HEADERS.length - 1);
