import type { Message, Profile } from "../pipeline/types.js";

export interface Identity {
  readonly id: string;
  readonly username: string;
}

export interface MessagePage {
  /** Newest first, as delivered. */
  readonly messages: readonly Message[];
  readonly nextCursor?: string;
}

export interface RecentEvent {
  readonly counterpartId: string;
  readonly sentAt: number;
}

export interface RecentPage {
  readonly events: readonly RecentEvent[];
  readonly nextCursor?: string;
}

export interface MessageSource {
  whoami(): Promise<Identity>;
  fetchPage(counterpartId: string, cursor?: string): Promise<MessagePage>;
  fetchRecentPage(cursor?: string): Promise<RecentPage>;
}

export interface ProfileSource {
  getProfile(counterpartId: string): Promise<Profile>;
}
