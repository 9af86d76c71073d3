import type { LinkedInResult, Profile, SummaryResult } from "../pipeline/types.js";
import type { TextModel } from "../ai/types.js";
import type { Logger } from "../logging/logger.js";
import { errorMessage } from "../utils/errors.js";
import { extractCompany, extractLinkedInUrl, findProfileUrl } from "./patterns.js";
import {
  buildGeneratePrompt,
  buildValidatePrompt,
  isNotFound,
  parseVerdict,
  type IdentityContext,
} from "./prompts.js";

export const DEFAULT_MAX_ATTEMPTS = 3;

export interface ResolverOptions {
  readonly maxAttempts?: number;
}

type DiscoveryState =
  | { readonly kind: "generate"; readonly attempt: number }
  | { readonly kind: "validate"; readonly attempt: number; readonly candidate: string }
  | { readonly kind: "accept"; readonly attempt: number; readonly candidate: string }
  | {
      readonly kind: "reject";
      readonly attempt: number;
      readonly candidate?: string;
      readonly reason: string;
    }
  | { readonly kind: "give-up"; readonly attempts: number; readonly reason: string };

type TerminalState = Extract<DiscoveryState, { kind: "accept" | "give-up" }>;

/** Pattern-stage answer alone; undefined when the profile states no URL. */
export function resolveFromPatterns(profile: Pick<Profile, "website" | "bio">): LinkedInResult | undefined {
  const url = extractLinkedInUrl(profile);
  if (!url) return undefined;
  return { url, confidence: "high", method: "pattern", attempts: 0, reasoning: "Stated in profile" };
}

export class LinkedInResolver {
  private readonly maxAttempts: number;
  private readonly log: Logger;

  constructor(
    private readonly model: TextModel | undefined,
    opts: ResolverOptions,
    log: Logger,
  ) {
    this.maxAttempts = Math.max(1, opts.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.log = log.child({ component: "linkedin" });
  }

  get aiEnabled(): boolean {
    return this.model !== undefined;
  }

  /** Never throws. `summary` feeds the AI prompt; `allowAi` false skips the AI stage even when a model is configured. */
  async resolve(profile: Profile, summary?: SummaryResult, allowAi = true): Promise<LinkedInResult> {
    const fromPattern = resolveFromPatterns(profile);
    if (fromPattern) return fromPattern;

    if (!this.model || !allowAi) {
      return {
        confidence: "not_found",
        method: "ai",
        attempts: 0,
        reasoning: this.model ? "AI discovery skipped" : "AI discovery not configured",
      };
    }

    const ctx: IdentityContext = {
      name: profile.displayName,
      username: profile.username,
      location: profile.location,
      bio: profile.bio,
      company: extractCompany(profile.bio),
      summary: summary?.text || undefined,
    };
    const final = await this.discover(this.model, ctx, profile.counterpartId);

    if (final.kind === "accept") {
      return {
        url: final.candidate,
        confidence: "high",
        method: "ai",
        attempts: final.attempt,
        reasoning: `Validated on attempt ${final.attempt}`,
      };
    }
    return { confidence: "not_found", method: "ai", attempts: final.attempts, reasoning: final.reason };
  }

  private async discover(model: TextModel, ctx: IdentityContext, counterpartId: string): Promise<TerminalState> {
    const rejected: string[] = [];
    let state: DiscoveryState = { kind: "generate", attempt: 1 };

    for (;;) {
      switch (state.kind) {
        case "generate":
          state = await this.generate(model, ctx, rejected, state.attempt);
          break;
        case "validate":
          state = await this.validate(model, ctx, state.candidate, state.attempt);
          break;
        case "reject":
          this.log.debug(
            { counterpartId, attempt: state.attempt, candidate: state.candidate, reason: state.reason },
            "candidate rejected",
          );
          if (state.candidate && !rejected.includes(state.candidate)) {
            rejected.push(state.candidate);
          }
          state =
            state.attempt >= this.maxAttempts
              ? {
                  kind: "give-up",
                  attempts: state.attempt,
                  reason: `No candidate passed validation in ${state.attempt} attempts`,
                }
              : { kind: "generate", attempt: state.attempt + 1 };
          break;
        case "accept":
        case "give-up":
          this.log.debug({ counterpartId, outcome: state.kind }, "linkedin discovery finished");
          return state;
      }
    }
  }

  private async generate(
    model: TextModel,
    ctx: IdentityContext,
    rejected: readonly string[],
    attempt: number,
  ): Promise<DiscoveryState> {
    let answer: string;
    try {
      answer = await model.complete(buildGeneratePrompt(ctx, rejected), { temperature: 0, maxTokens: 200 });
    } catch (err) {
      return { kind: "reject", attempt, reason: `Generate failed: ${errorMessage(err)}` };
    }

    if (isNotFound(answer)) {
      return { kind: "give-up", attempts: attempt, reason: "Model reported no matching profile" };
    }
    const candidate = findProfileUrl(answer);
    if (!candidate) {
      return { kind: "reject", attempt, reason: "Answer contained no profile URL" };
    }
    if (rejected.includes(candidate)) {
      return { kind: "reject", attempt, candidate, reason: "Repeated a rejected candidate" };
    }
    return { kind: "validate", attempt, candidate };
  }

  private async validate(
    model: TextModel,
    ctx: IdentityContext,
    candidate: string,
    attempt: number,
  ): Promise<DiscoveryState> {
    try {
      const answer = await model.complete(buildValidatePrompt(ctx, candidate), { temperature: 0, maxTokens: 10 });
      return parseVerdict(answer) === "pass"
        ? { kind: "accept", attempt, candidate }
        : { kind: "reject", attempt, candidate, reason: "Validation failed" };
    } catch (err) {
      return { kind: "reject", attempt, candidate, reason: `Validate failed: ${errorMessage(err)}` };
    }
  }
}
