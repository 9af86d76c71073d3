import Anthropic from "@anthropic-ai/sdk";
import type { CompleteOptions, TextModel, TextModelOptions } from "./types.js";
import type { Logger } from "../logging/logger.js";
import { retry } from "../utils/retry.js";
import { AIUnavailableError, errorMessage, isTransient } from "../utils/errors.js";

const DEFAULT_MAX_TOKENS = 1024;

export class AnthropicTextModel implements TextModel {
  readonly provider = "anthropic";
  readonly model: string;
  private readonly client: Anthropic;
  private readonly maxAttempts: number;
  private readonly log: Logger;

  constructor(opts: TextModelOptions, log: Logger) {
    this.model = opts.model;
    this.maxAttempts = opts.maxRetries + 1;
    this.client = new Anthropic({ apiKey: opts.apiKey, timeout: opts.timeoutMs, maxRetries: 0 });
    this.log = log.child({ component: "anthropic", model: opts.model });
  }

  async complete(prompt: string, opts: CompleteOptions = {}): Promise<string> {
    try {
      const response = await retry(
        () =>
          this.client.messages.create({
            model: this.model,
            max_tokens: opts.maxTokens ?? DEFAULT_MAX_TOKENS,
            system: opts.system,
            messages: [{ role: "user", content: prompt }],
            temperature: opts.temperature,
          }),
        {
          maxAttempts: this.maxAttempts,
          shouldRetry: isTransient,
          onRetry: (err, attempt, delayMs) =>
            this.log.warn({ err: errorMessage(err), attempt, delayMs }, "retrying completion"),
        },
      );

      const textContent = response.content.find((c) => c.type === "text");
      if (!textContent || textContent.type !== "text" || !textContent.text.trim()) {
        throw new AIUnavailableError(`Anthropic ${this.model} returned no text content`);
      }
      return textContent.text.trim();
    } catch (err) {
      if (err instanceof AIUnavailableError) throw err;
      throw new AIUnavailableError(`Anthropic ${this.model} call failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
