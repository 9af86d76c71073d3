import { describe, it, expect } from "vitest";
import {
  aggregate,
  compareIds,
  counterpartOf,
  isLowInformation,
} from "../../src/pipeline/aggregator.js";
import { SELF_ID, makeMessage } from "../helpers/fixtures.js";

describe("isLowInformation", () => {
  it.each(["hi", "Hey!", "  thanks.  ", "ok", "lol", "hahaha", "Good morning!", "👍", "🎉🎉", "...", "?!", ""])(
    "treats %j as chatter",
    (text) => {
      expect(isLowInformation(text)).toBe(true);
    },
  );

  it.each(["let's ship the report Friday", "ok, send me the deck", "hi, are you free at 3?", "42"])(
    "keeps %j",
    (text) => {
      expect(isLowInformation(text)).toBe(false);
    },
  );
});

describe("compareIds", () => {
  it("orders decimal ids numerically", () => {
    expect(compareIds("99", "100")).toBeLessThan(0);
    expect(compareIds("1000", "999")).toBeGreaterThan(0);
  });

  it("orders equal-length ids lexically", () => {
    expect(compareIds("120", "121")).toBeLessThan(0);
    expect(compareIds("121", "121")).toBe(0);
  });
});

describe("counterpartOf", () => {
  it("returns the sender of an inbound message", () => {
    expect(counterpartOf(makeMessage({ senderId: "200", recipientId: SELF_ID }), SELF_ID)).toBe("200");
  });

  it("returns the recipient of an outbound message", () => {
    expect(counterpartOf(makeMessage({ senderId: SELF_ID, recipientId: "300" }), SELF_ID)).toBe("300");
  });
});

describe("aggregate", () => {
  it("sorts by time and breaks ties by id", () => {
    const t = Date.UTC(2024, 0, 1);
    const conversation = aggregate(
      [
        makeMessage({ id: "30", sentAt: t + 2000, text: "third message here" }),
        makeMessage({ id: "100", sentAt: t, text: "tie with a longer id" }),
        makeMessage({ id: "99", sentAt: t, text: "tie with a shorter id" }),
      ],
      "200",
    );

    expect(conversation.messages.map((m) => m.id)).toEqual(["99", "100", "30"]);
    const times = conversation.messages.map((m) => m.sentAt);
    expect([...times].sort((a, b) => a - b)).toEqual(times);
  });

  it("filters chatter from the substantive view but counts every message", () => {
    const conversation = aggregate(
      [
        makeMessage({ id: "1", text: "hi", sentAt: 1 }),
        makeMessage({ id: "2", text: "let's ship the report Friday", sentAt: 2 }),
        makeMessage({ id: "3", text: "👍", sentAt: 3 }),
      ],
      "200",
    );

    expect(conversation.messageCount).toBe(3);
    expect(conversation.substantive.map((m) => m.id)).toEqual(["2"]);
  });

  it("keeps the full sequence when everything is chatter", () => {
    const conversation = aggregate(
      [makeMessage({ id: "2", text: "thanks", sentAt: 2 }), makeMessage({ id: "1", text: "hi", sentAt: 1 })],
      "200",
    );

    expect(conversation.substantive.map((m) => m.id)).toEqual(["1", "2"]);
  });

  it("handles an empty conversation", () => {
    expect(aggregate([], "200")).toEqual({
      counterpartId: "200",
      messages: [],
      substantive: [],
      messageCount: 0,
    });
  });

  it("does not mutate its input", () => {
    const input = [makeMessage({ id: "2", sentAt: 2 }), makeMessage({ id: "1", sentAt: 1 })];
    aggregate(input, "200");
    expect(input.map((m) => m.id)).toEqual(["2", "1"]);
  });
});
