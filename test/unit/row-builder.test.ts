import { describe, it, expect } from "vitest";
import { buildRow, formatTimestamp } from "../../src/pipeline/row-builder.js";
import type { LinkedInResult, SummaryResult } from "../../src/pipeline/types.js";
import { makeConversation, makeMessage, makeProfile } from "../helpers/fixtures.js";

const summary: SummaryResult = { text: "Agreed on the launch date.", source: "ai" };
const notFound: LinkedInResult = { confidence: "not_found", method: "ai", attempts: 0 };

describe("formatTimestamp", () => {
  it("formats epoch milliseconds in UTC", () => {
    expect(formatTimestamp(Date.UTC(2024, 2, 4, 7, 5, 9))).toBe("2024-03-04 07:05:09");
  });
});

describe("buildRow", () => {
  it("maps every field and uses the last message time", () => {
    const conversation = makeConversation([
      makeMessage({ id: "1", sentAt: Date.UTC(2024, 2, 1, 9, 30) }),
      makeMessage({ id: "2", sentAt: Date.UTC(2024, 2, 4, 18, 45, 12) }),
    ]);
    const profile = makeProfile({
      bio: "CTO at Acme",
      location: "Berlin",
      website: "https://acme.example",
      verified: true,
    });
    const linkedin: LinkedInResult = {
      url: "https://www.linkedin.com/in/jane-doe",
      confidence: "high",
      method: "pattern",
      attempts: 0,
    };

    expect(buildRow(profile, conversation, summary, linkedin)).toEqual({
      counterpartId: "200",
      username: "jane",
      displayName: "Jane Doe",
      linkedinUrl: "https://www.linkedin.com/in/jane-doe",
      location: "Berlin",
      bio: "CTO at Acme",
      website: "https://acme.example",
      verified: true,
      summary: "Agreed on the launch date.",
      messageCount: 2,
      lastMessageAt: "2024-03-04 18:45:12",
    });
  });

  it("fills absent fields with empty strings", () => {
    const row = buildRow(makeProfile(), makeConversation([]), summary, notFound);
    expect(row).toMatchObject({
      linkedinUrl: "",
      location: "",
      bio: "",
      website: "",
      verified: false,
      messageCount: 0,
      lastMessageAt: "",
    });
  });

  it("is deterministic", () => {
    const conversation = makeConversation([makeMessage()]);
    const first = buildRow(makeProfile(), conversation, summary, notFound);
    const second = buildRow(makeProfile(), conversation, summary, notFound);
    expect(second).toEqual(first);
  });
});
