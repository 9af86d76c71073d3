import OpenAI from "openai";
import type { CompleteOptions, TextModel, TextModelOptions } from "./types.js";
import type { Logger } from "../logging/logger.js";
import { retry } from "../utils/retry.js";
import { AIUnavailableError, errorMessage, isTransient } from "../utils/errors.js";

const DEFAULT_MAX_TOKENS = 500;

export class OpenAiTextModel implements TextModel {
  readonly provider = "openai";
  readonly model: string;
  private readonly client: OpenAI;
  private readonly maxAttempts: number;
  private readonly log: Logger;

  constructor(opts: TextModelOptions, log: Logger) {
    this.model = opts.model;
    this.maxAttempts = opts.maxRetries + 1;
    // Retries are ours, so the SDK's own are switched off.
    this.client = new OpenAI({ apiKey: opts.apiKey, timeout: opts.timeoutMs, maxRetries: 0 });
    this.log = log.child({ component: "openai", model: opts.model });
  }

  async complete(prompt: string, opts: CompleteOptions = {}): Promise<string> {
    try {
      const response = await retry(
        () =>
          this.client.chat.completions.create({
            model: this.model,
            messages: opts.system
              ? [
                  { role: "system", content: opts.system },
                  { role: "user", content: prompt },
                ]
              : [{ role: "user", content: prompt }],
            max_tokens: opts.maxTokens ?? DEFAULT_MAX_TOKENS,
            temperature: opts.temperature,
          }),
        {
          maxAttempts: this.maxAttempts,
          shouldRetry: isTransient,
          onRetry: (err, attempt, delayMs) =>
            this.log.warn({ err: errorMessage(err), attempt, delayMs }, "retrying completion"),
        },
      );

      const text = response.choices[0]?.message.content?.trim();
      if (!text) {
        throw new AIUnavailableError(`OpenAI ${this.model} returned an empty completion`);
      }
      return text;
    } catch (err) {
      if (err instanceof AIUnavailableError) throw err;
      throw new AIUnavailableError(`OpenAI ${this.model} call failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
