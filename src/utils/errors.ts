/** Credentials rejected by a collaborator. Aborts the run. */
export class AuthError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AuthError";
  }
}

/** The platform refused a request until `resetAt` (epoch ms). */
export class RateLimitedError extends Error {
  readonly resetAt: number;

  constructor(resetAt: number, options?: ErrorOptions) {
    super(`Rate limited until ${new Date(resetAt).toISOString()}`, options);
    this.name = "RateLimitedError";
    this.resetAt = resetAt;
  }
}

export class NotFoundError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "NotFoundError";
  }
}

/** A language-model call timed out, hit a quota or returned nothing usable. */
export class AIUnavailableError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AIUnavailableError";
  }
}

/** The sheet's header row does not match the expected column layout. */
export class SchemaMismatchError extends Error {
  readonly expected: readonly string[];
  readonly actual: readonly string[];

  constructor(expected: readonly string[], actual: readonly string[]) {
    super(
      `Sheet header mismatch: expected [${expected.join(", ")}], found [${actual.join(", ")}]`,
    );
    this.name = "SchemaMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Errors that end the whole run rather than one counterpart. */
export function isFatal(err: unknown): boolean {
  return err instanceof AuthError || err instanceof ConfigError;
}

/** HTTP status carried by SDK errors (openai, @anthropic-ai/sdk, gaxios, twitter-api-v2). */
export function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("code" in err && typeof err.code === "number") return err.code;
  if ("response" in err && typeof err.response === "object" && err.response !== null) {
    const { response } = err;
    if ("status" in response && typeof response.status === "number") return response.status;
  }
  return undefined;
}

/** Timeouts, network failures, throttling and server errors are worth another try. */
export function isTransient(err: unknown): boolean {
  const status = httpStatusOf(err);
  if (status === undefined) return true;
  return status === 408 || status === 409 || status === 429 || status >= 500;
}
