import type {
  Conversation,
  CounterpartFailure,
  LinkedInResult,
  Message,
  OutputRow,
  Profile,
  RunOptions,
  RunReport,
  RunStats,
  SummaryResult,
} from "./types.js";
import type { MessageSource, ProfileSource } from "../sources/types.js";
import type { Summarizer } from "./summarizer.js";
import type { LinkedInResolver } from "../linkedin/resolver.js";
import type { SheetWriter } from "../sheets/writer.js";
import type { Logger } from "../logging/logger.js";
import { FallbackSummarizer } from "./summarizer.js";
import { aggregate, counterpartOf } from "./aggregator.js";
import { buildRow } from "./row-builder.js";
import { RateGate, sleep as realSleep, type RateBudget, type Sleep } from "../sources/rate-budget.js";
import { ConfigError, NotFoundError, errorMessage, isFatal } from "../utils/errors.js";

export const DEFAULT_MAX_MESSAGES = 100;

export const DEFAULT_RUN_OPTIONS: RunOptions = {
  maxMessages: DEFAULT_MAX_MESSAGES,
  summarize: true,
  clearSheet: false,
  dryRun: false,
  enrichLinkedIn: false,
  enrichLimit: 0,
};

const DAY_MS = 86_400_000;

export interface OrchestratorDeps {
  readonly messages: MessageSource;
  readonly profiles: ProfileSource;
  readonly summarizer: Summarizer;
  readonly resolver: LinkedInResolver;
  /** Absent when no spreadsheet is configured; only dry runs are possible then. */
  readonly sheet?: SheetWriter;
  readonly budget: RateBudget;
  readonly sleep?: Sleep;
  readonly now?: () => number;
  readonly logger: Logger;
}

interface Processed {
  readonly row: OutputRow;
  readonly summary: SummaryResult;
  readonly linkedin: LinkedInResult;
}

export function placeholderProfile(counterpartId: string): Profile {
  return {
    counterpartId,
    username: `user_${counterpartId}`,
    displayName: "Unknown User",
    verified: false,
  };
}

export function computeStats(processed: readonly Processed[]): RunStats {
  const totalMessages = processed.reduce((sum, p) => sum + p.row.messageCount, 0);
  const averageMessages =
    processed.length > 0 ? Math.round((totalMessages / processed.length) * 10) / 10 : 0;
  const mostRecent = processed
    .map((p) => p.row.lastMessageAt)
    .reduce((latest, at) => (at > latest ? at : latest), "");

  return {
    totalMessages,
    averageMessages,
    aiSummaries: processed.filter((p) => p.summary.source === "ai").length,
    fallbackSummaries: processed.filter((p) => p.summary.source === "fallback").length,
    linkedinFound: processed.filter((p) => p.linkedin.url !== undefined).length,
    mostRecentMessageAt: mostRecent,
  };
}

export class Orchestrator {
  private readonly log: Logger;
  private readonly gate: RateGate;
  private readonly now: () => number;
  private readonly fallback = new FallbackSummarizer();

  constructor(private readonly deps: OrchestratorDeps) {
    this.log = deps.logger.child({ component: "orchestrator" });
    this.gate = new RateGate(deps.budget, deps.sleep ?? realSleep, this.log);
    this.now = deps.now ?? Date.now;
  }

  async run(options: RunOptions): Promise<RunReport> {
    const self = await this.gate.run("whoami", () => this.deps.messages.whoami());
    this.log.info({ selfId: self.id, username: self.username }, "authenticated with X");

    let writeError: string | undefined;
    if (!options.dryRun) {
      writeError = await this.prepareSheet(options.clearSheet);
    }

    const counterparts = await this.selectCounterparts(options, self.id);
    this.log.info({ count: counterparts.length }, "counterparts selected");

    const processed: Processed[] = [];
    const failures: CounterpartFailure[] = [];
    let skipped = 0;
    let aiLookups = 0;

    for (const [index, counterpartId] of counterparts.entries()) {
      const log = this.log.child({ counterpartId });
      log.info({ current: index + 1, total: counterparts.length }, "processing counterpart");
      try {
        const conversation = await this.collect(counterpartId, self.id, options);
        if (conversation.messageCount === 0) {
          log.info("no messages in window, skipping");
          skipped++;
          continue;
        }

        const allowAi =
          options.enrichLinkedIn && (options.enrichLimit === 0 || aiLookups < options.enrichLimit);
        const result = await this.process(conversation, options.summarize, allowAi);
        if (result.linkedin.method === "ai" && result.linkedin.attempts > 0) aiLookups++;
        processed.push(result);
      } catch (err) {
        if (isFatal(err)) throw err;
        log.error({ err: errorMessage(err) }, "counterpart failed");
        failures.push({ counterpartId, error: errorMessage(err) });
      }
    }

    const rows = processed.map((p) => p.row).sort((a, b) => b.lastMessageAt.localeCompare(a.lastMessageAt));

    let written = 0;
    if (!options.dryRun && writeError === undefined) {
      try {
        written = await this.write(rows, options.clearSheet);
      } catch (err) {
        writeError = errorMessage(err);
        this.log.error({ err: writeError }, "sheet write failed");
      }
    }

    const report: RunReport = {
      processed: processed.length,
      skipped,
      failed: failures.length,
      written,
      failures,
      stats: computeStats(processed),
      rows,
      ...(writeError !== undefined ? { writeError } : {}),
    };

    this.log.info(
      {
        processed: report.processed,
        skipped: report.skipped,
        failed: report.failed,
        written: report.written,
        ...report.stats,
      },
      "run finished",
    );
    return report;
  }

  /** Returns the reason writing is impossible, or undefined when the sheet is ready. */
  private async prepareSheet(clearSheet: boolean): Promise<string | undefined> {
    const sheet = this.deps.sheet;
    if (!sheet) {
      throw new ConfigError("No spreadsheet configured; set sheets.spreadsheetId or use --dry-run");
    }
    const info = await sheet.verify();
    this.log.info({ spreadsheet: info.spreadsheetTitle, sheet: info.sheetTitle }, "sheet verified");

    try {
      await sheet.ensureHeaders({ overwrite: clearSheet });
      return undefined;
    } catch (err) {
      if (isFatal(err)) throw err;
      const message = errorMessage(err);
      this.log.error({ err: message }, "sheet is not writable, rows will not be written");
      return message;
    }
  }

  private async write(rows: readonly OutputRow[], clearSheet: boolean): Promise<number> {
    const sheet = this.deps.sheet;
    if (!sheet) return 0;
    if (clearSheet) await sheet.clear();
    return sheet.upsertRows(rows);
  }

  /** The `limit` most recently active counterparts, newest first. */
  async discover(limit: number): Promise<string[]> {
    const self = await this.gate.run("whoami", () => this.deps.messages.whoami());
    return this.selectCounterparts({ ...DEFAULT_RUN_OPTIONS, recent: limit }, self.id);
  }

  private async selectCounterparts(options: RunOptions, selfId: string): Promise<string[]> {
    if (options.counterpartIds && options.counterpartIds.length > 0) {
      return [...new Set(options.counterpartIds)].filter((id) => id !== selfId);
    }

    const wanted = options.recent ?? 0;
    const selected: string[] = [];
    const seenCursors = new Set<string>();
    let cursor: string | undefined;

    while (selected.length < wanted) {
      const page = await this.gate.run("recent-events", () => this.deps.messages.fetchRecentPage(cursor));
      for (const event of page.events) {
        if (event.counterpartId === selfId || selected.includes(event.counterpartId)) continue;
        selected.push(event.counterpartId);
        if (selected.length >= wanted) break;
      }
      if (!page.nextCursor || seenCursors.has(page.nextCursor)) break;
      seenCursors.add(page.nextCursor);
      cursor = page.nextCursor;
    }
    return selected;
  }

  private async collect(counterpartId: string, selfId: string, options: RunOptions): Promise<Conversation> {
    const cutoff = options.sinceDays !== undefined ? this.now() - options.sinceDays * DAY_MS : undefined;
    const collected: Message[] = [];
    let cursor: string | undefined;
    let done = false;

    while (!done && collected.length < options.maxMessages) {
      const page = await this.gate.run("dm-events", () =>
        this.deps.messages.fetchPage(counterpartId, cursor),
      );
      for (const message of page.messages) {
        if (cutoff !== undefined && message.sentAt < cutoff) {
          done = true;
          break;
        }
        if (counterpartOf(message, selfId) !== counterpartId) continue;
        collected.push(message);
        if (collected.length >= options.maxMessages) break;
      }
      if (!page.nextCursor) break;
      cursor = page.nextCursor;
    }

    return aggregate(collected, counterpartId);
  }

  private async process(conversation: Conversation, summarize: boolean, allowAi: boolean): Promise<Processed> {
    const { counterpartId } = conversation;
    const profile = await this.profileOf(counterpartId);

    const summarizer = summarize ? this.deps.summarizer : this.fallback;
    const summary = await summarizer.summarize(conversation, profile);
    const linkedin = await this.deps.resolver.resolve(profile, summary, allowAi);

    this.log.debug(
      { counterpartId, summarySource: summary.source, linkedin: linkedin.confidence },
      "counterpart processed",
    );
    return { row: buildRow(profile, conversation, summary, linkedin), summary, linkedin };
  }

  private async profileOf(counterpartId: string): Promise<Profile> {
    try {
      return await this.gate.run("profile", () => this.deps.profiles.getProfile(counterpartId));
    } catch (err) {
      if (isFatal(err)) throw err;
      if (err instanceof NotFoundError) {
        this.log.warn({ counterpartId }, "profile not found, using placeholder");
      } else {
        this.log.warn({ counterpartId, err: errorMessage(err) }, "profile fetch failed, using placeholder");
      }
      return placeholderProfile(counterpartId);
    }
  }
}
