import pino from "pino";
import type { Conversation, Message, Profile } from "../../src/pipeline/types.js";
import type { LedgerConfig } from "../../src/config/types.js";
import type { Logger } from "../../src/logging/logger.js";
import { aggregate } from "../../src/pipeline/aggregator.js";

export const SELF_ID = "100";

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function makeMessage(overrides: Partial<Message> = {}): Message {
  return {
    id: "1",
    senderId: "200",
    recipientId: SELF_ID,
    text: "Hello there, how is the launch going?",
    sentAt: Date.UTC(2024, 2, 1, 9, 30),
    ...overrides,
  };
}

export function makeProfile(overrides: Partial<Profile> = {}): Profile {
  return {
    counterpartId: "200",
    username: "jane",
    displayName: "Jane Doe",
    verified: false,
    ...overrides,
  };
}

export function makeConversation(messages: readonly Message[], counterpartId = "200"): Conversation {
  return aggregate(messages, counterpartId);
}

export function makeLedgerConfig(overrides: Partial<LedgerConfig> = {}): LedgerConfig {
  return {
    x: {
      apiKey: "test-key",
      apiSecret: "test-secret",
      accessToken: "test-token",
      accessTokenSecret: "test-token-secret",
      maxRequestsPerWindow: 280,
      windowMs: 900_000,
      pageSize: 100,
      timeoutMs: 30_000,
    },
    sheets: { credentialsPath: "config/service_account.json" },
    summarizer: {
      model: "gpt-4o-mini",
      maxWords: 200,
      maxPromptMessages: 50,
      temperature: 0.3,
      timeoutMs: 30_000,
      maxRetries: 2,
    },
    linkedin: {
      model: "claude-3-5-haiku-latest",
      maxAttempts: 3,
      timeoutMs: 30_000,
      maxRetries: 2,
    },
    logging: { level: "info" },
    ...overrides,
  };
}
