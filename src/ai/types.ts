export interface CompleteOptions {
  readonly system?: string;
  readonly maxTokens?: number;
  readonly temperature?: number;
}

/**
 * A stateless prompt-in, text-out capability. Implementations throw
 * `AIUnavailableError` and nothing else; they never return partial output.
 */
export interface TextModel {
  readonly provider: string;
  readonly model: string;
  complete(prompt: string, opts?: CompleteOptions): Promise<string>;
}

export interface TextModelOptions {
  readonly apiKey: string;
  readonly model: string;
  readonly timeoutMs: number;
  /** Retries after the first attempt of a call. */
  readonly maxRetries: number;
}
