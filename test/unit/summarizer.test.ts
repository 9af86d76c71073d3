import { describe, it, expect } from "vitest";
import {
  FallbackSummarizer,
  ModelSummarizer,
  enforceWordLimit,
  fallbackSummary,
  formatTranscript,
} from "../../src/pipeline/summarizer.js";
import { AIUnavailableError } from "../../src/utils/errors.js";
import { SELF_ID, makeConversation, makeMessage, makeProfile, silentLogger } from "../helpers/fixtures.js";
import { ScriptedModel } from "../helpers/scripted-model.js";

const planning = makeConversation([
  makeMessage({ id: "1", text: "Can we plan the project kickoff?", sentAt: Date.UTC(2024, 2, 1, 9, 30) }),
  makeMessage({
    id: "2",
    senderId: SELF_ID,
    recipientId: "200",
    text: "Agreed, I will send the agenda",
    sentAt: Date.UTC(2024, 2, 4, 10, 0),
  }),
]);

const options = { maxWords: 200, maxPromptMessages: 50, temperature: 0.3 };

function modelSummarizer(model: ScriptedModel, opts = options) {
  return new ModelSummarizer(model, new FallbackSummarizer(), opts, silentLogger());
}

describe("fallbackSummary", () => {
  it("names the counterpart when there are no messages", () => {
    expect(fallbackSummary(makeConversation([]), makeProfile())).toBe("No messages with @jane (0 messages)");
  });

  it("lists at most two topics, the date range and planned actions", () => {
    expect(fallbackSummary(planning, makeProfile())).toBe(
      "Conversation with @jane about work/project, planning (2 messages, 2024-03-01 to 2024-03-04). Contains agreements or planned actions",
    );
  });

  it("falls back to a general description on a single day", () => {
    const conversation = makeConversation([
      makeMessage({ text: "Loved your talk yesterday", sentAt: Date.UTC(2024, 2, 1, 12, 0) }),
    ]);
    expect(fallbackSummary(conversation, makeProfile())).toBe(
      "General conversation with @jane (1 messages, 2024-03-01)",
    );
  });
});

describe("enforceWordLimit", () => {
  it("returns short text unchanged", () => {
    expect(enforceWordLimit("  one two three ", 5)).toBe("one two three");
  });

  it("cuts long text and marks the cut", () => {
    expect(enforceWordLimit("a b c d e f g h i j k l", 10)).toBe("a b c d e f g...");
  });

  it("prefers a late sentence boundary", () => {
    const text = "The team agreed on the launch plan. Next steps follow in detail here today";
    expect(enforceWordLimit(text, 10)).toBe("The team agreed on the launch plan....");
  });

  it("ignores an early sentence boundary", () => {
    expect(enforceWordLimit("Done. a b c d e f g h i j", 10)).toBe("Done. a b c d e f...");
  });
});

describe("formatTranscript", () => {
  it("labels each line with time and speaker", () => {
    expect(formatTranscript(planning.messages, "200")).toBe(
      "[2024-03-01 09:30] them: Can we plan the project kickoff?\n" +
        "[2024-03-04 10:00] me: Agreed, I will send the agenda",
    );
  });
});

describe("FallbackSummarizer", () => {
  it("never calls a model and marks its source", async () => {
    const result = await new FallbackSummarizer().summarize(planning, makeProfile());
    expect(result.source).toBe("fallback");
    expect(result.text).toBe(fallbackSummary(planning, makeProfile()));
  });
});

describe("ModelSummarizer", () => {
  it("returns the trimmed model answer", async () => {
    const model = new ScriptedModel(["  Agreed to ship the report on Friday.  "]);
    const result = await modelSummarizer(model).summarize(planning, makeProfile());
    expect(result).toEqual({ text: "Agreed to ship the report on Friday.", source: "ai" });
  });

  it("sends the transcript, the counterpart and the limits", async () => {
    const model = new ScriptedModel(["Kickoff planned."]);
    await modelSummarizer(model).summarize(planning, makeProfile());

    const prompt = model.prompts[0] ?? "";
    expect(prompt).toContain("in 200 words or less");
    expect(prompt).toContain("Conversation with @jane (Jane Doe). Total messages: 2");
    expect(prompt).toContain("[2024-03-01 09:30] them: Can we plan the project kickoff?");
    expect(prompt).toContain("[2024-03-04 10:00] me: Agreed, I will send the agenda");
    expect(model.options[0]).toMatchObject({ maxTokens: 400, temperature: 0.3 });
    expect(model.options[0]?.system).toContain("protecting privacy");
  });

  it("keeps only the most recent substantive messages in the prompt", async () => {
    const model = new ScriptedModel(["Agenda coming."]);
    await modelSummarizer(model, { ...options, maxPromptMessages: 1 }).summarize(planning, makeProfile());

    const prompt = model.prompts[0] ?? "";
    expect(prompt).not.toContain("Can we plan the project kickoff?");
    expect(prompt).toContain("me: Agreed, I will send the agenda");
  });

  it("falls back when the model is unavailable", async () => {
    const model = new ScriptedModel([new AIUnavailableError("quota exceeded")]);
    const result = await modelSummarizer(model).summarize(planning, makeProfile());
    expect(result).toEqual({ text: fallbackSummary(planning, makeProfile()), source: "fallback" });
  });

  it("falls back on an empty answer", async () => {
    const model = new ScriptedModel(["   "]);
    const result = await modelSummarizer(model).summarize(planning, makeProfile());
    expect(result.source).toBe("fallback");
  });

  it("does not call the model for an empty conversation", async () => {
    const model = new ScriptedModel(["unused"]);
    const result = await modelSummarizer(model).summarize(makeConversation([]), makeProfile());
    expect(result).toEqual({ text: "No messages with @jane (0 messages)", source: "fallback" });
    expect(model.calls).toBe(0);
  });

  it("cuts long answers to the word limit", async () => {
    const model = new ScriptedModel(["a b c d e f g h i j k l"]);
    const result = await modelSummarizer(model, { ...options, maxWords: 10 }).summarize(planning, makeProfile());
    expect(result).toEqual({ text: "a b c d e f g...", source: "ai" });
  });
});
