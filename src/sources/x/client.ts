import { TwitterApi } from "twitter-api-v2";
import { z } from "zod";
import type { Profile } from "../../pipeline/types.js";
import type { Identity, MessagePage, MessageSource, ProfileSource, RecentPage } from "../types.js";
import type { XConfig } from "../../config/types.js";
import type { Logger } from "../../logging/logger.js";
import {
  AuthError,
  NotFoundError,
  RateLimitedError,
  errorMessage,
  httpStatusOf,
} from "../../utils/errors.js";
import { normalizeDmEvents, normalizeMe, normalizeRecentEvents, normalizeUser } from "./normalize.js";

export type XQuery = Record<string, string | number | undefined>;

/** The slice of the X API v2 the client needs; JSON bodies come back unvalidated. */
export interface XHttp {
  get(path: string, query: XQuery): Promise<unknown>;
}

export interface XClientOptions {
  readonly pageSize: number;
  readonly windowMs: number;
  readonly now?: () => number;
}

const DM_EVENT_FIELDS = "id,text,created_at,sender_id,dm_conversation_id,event_type";
const USER_FIELDS = "description,location,url,verified,name,username,entities";

const rateLimitSchema = z.object({
  rateLimit: z.object({ reset: z.number() }).optional(),
});

function withTimeout<T>(promise: Promise<T>, ms: number, what: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${what} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createXHttp(config: XConfig): XHttp {
  const api = new TwitterApi({
    appKey: config.apiKey,
    appSecret: config.apiSecret,
    accessToken: config.accessToken,
    accessSecret: config.accessTokenSecret,
  });
  const v2 = api.readOnly.v2;
  return {
    get: (path, query) => withTimeout(v2.get(path, query), config.timeoutMs, `GET ${path}`),
  };
}

export class XClient implements MessageSource, ProfileSource {
  private readonly log: Logger;
  private readonly now: () => number;
  private identity: Identity | undefined;
  private readonly profiles = new Map<string, Profile>();

  constructor(
    private readonly http: XHttp,
    private readonly opts: XClientOptions,
    log: Logger,
  ) {
    this.log = log.child({ component: "x" });
    this.now = opts.now ?? Date.now;
  }

  async whoami(): Promise<Identity> {
    if (this.identity) return this.identity;
    const payload = await this.get("users/me", { "user.fields": "username" });
    this.identity = normalizeMe(payload);
    this.log.debug({ selfId: this.identity.id }, "authenticated");
    return this.identity;
  }

  async fetchPage(counterpartId: string, cursor?: string): Promise<MessagePage> {
    const self = await this.whoami();
    const payload = await this.get(`dm_conversations/with/${counterpartId}/dm_events`, {
      "dm_event.fields": DM_EVENT_FIELDS,
      event_types: "MessageCreate",
      max_results: this.opts.pageSize,
      pagination_token: cursor,
    });
    return this.normalize(() => normalizeDmEvents(payload, counterpartId, self.id, this.log));
  }

  async fetchRecentPage(cursor?: string): Promise<RecentPage> {
    const self = await this.whoami();
    const payload = await this.get("dm_events", {
      "dm_event.fields": DM_EVENT_FIELDS,
      event_types: "MessageCreate",
      max_results: this.opts.pageSize,
      pagination_token: cursor,
    });
    return this.normalize(() => normalizeRecentEvents(payload, self.id, this.log));
  }

  async getProfile(counterpartId: string): Promise<Profile> {
    const cached = this.profiles.get(counterpartId);
    if (cached) return cached;

    const payload = await this.get(`users/${counterpartId}`, { "user.fields": USER_FIELDS });
    const profile = this.normalize(() => normalizeUser(payload, counterpartId));
    this.profiles.set(counterpartId, profile);
    return profile;
  }

  private async get(path: string, query: XQuery): Promise<unknown> {
    try {
      return await this.http.get(path, query);
    } catch (err) {
      throw this.mapError(err, path);
    }
  }

  private normalize<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof NotFoundError) throw err;
      throw new Error(`Unexpected X API payload: ${errorMessage(err)}`, { cause: err });
    }
  }

  private mapError(err: unknown, path: string): Error {
    const status = httpStatusOf(err);
    if (status === 401 || status === 403) {
      return new AuthError(`X API rejected credentials for ${path} (HTTP ${status})`, { cause: err });
    }
    if (status === 429) {
      const parsed = rateLimitSchema.safeParse(err);
      const reset = parsed.success ? parsed.data.rateLimit?.reset : undefined;
      const resetAt = reset !== undefined ? reset * 1000 : this.now() + this.opts.windowMs;
      return new RateLimitedError(resetAt, { cause: err });
    }
    if (status === 404) {
      return new NotFoundError(`X API ${path} not found`, { cause: err });
    }
    return new Error(`X API ${path} failed: ${errorMessage(err)}`, { cause: err });
  }
}
