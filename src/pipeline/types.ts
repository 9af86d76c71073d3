export interface Message {
  readonly id: string;
  readonly senderId: string;
  readonly recipientId: string;
  readonly text: string;
  /** Epoch milliseconds. */
  readonly sentAt: number;
}

export interface Conversation {
  readonly counterpartId: string;
  /** Chronological, ties broken by message id. */
  readonly messages: readonly Message[];
  /** `messages` without low-information chatter; never empty unless `messages` is. */
  readonly substantive: readonly Message[];
  readonly messageCount: number;
}

export interface Profile {
  readonly counterpartId: string;
  readonly username: string;
  readonly displayName: string;
  readonly bio?: string;
  readonly location?: string;
  readonly website?: string;
  readonly verified: boolean;
}

export type SummarySource = "ai" | "fallback";

export interface SummaryResult {
  readonly text: string;
  readonly source: SummarySource;
}

export type LinkedInConfidence = "high" | "medium" | "low" | "not_found";

export type LinkedInMethod = "pattern" | "ai";

export interface LinkedInResult {
  readonly url?: string;
  readonly confidence: LinkedInConfidence;
  readonly reasoning?: string;
  readonly method: LinkedInMethod;
  /** AI generate attempts made; 0 when the pattern stage answered. */
  readonly attempts: number;
}

export interface OutputRow {
  readonly counterpartId: string;
  readonly username: string;
  readonly displayName: string;
  readonly linkedinUrl: string;
  readonly location: string;
  readonly bio: string;
  readonly website: string;
  readonly verified: boolean;
  readonly summary: string;
  readonly messageCount: number;
  readonly lastMessageAt: string;
}

export interface RunOptions {
  readonly counterpartIds?: readonly string[];
  /** Select the N most recently active counterparts instead of explicit ids. */
  readonly recent?: number;
  readonly maxMessages: number;
  readonly sinceDays?: number;
  readonly summarize: boolean;
  readonly clearSheet: boolean;
  readonly dryRun: boolean;
  readonly enrichLinkedIn: boolean;
  /** Cap on AI LinkedIn lookups; 0 means no cap. */
  readonly enrichLimit: number;
}

export interface CounterpartFailure {
  readonly counterpartId: string;
  readonly error: string;
}

export interface RunStats {
  readonly totalMessages: number;
  readonly averageMessages: number;
  readonly aiSummaries: number;
  readonly fallbackSummaries: number;
  readonly linkedinFound: number;
  readonly mostRecentMessageAt: string;
}

export interface RunReport {
  readonly processed: number;
  readonly skipped: number;
  readonly failed: number;
  readonly written: number;
  readonly failures: readonly CounterpartFailure[];
  readonly stats: RunStats;
  readonly rows: readonly OutputRow[];
  readonly writeError?: string;
}
