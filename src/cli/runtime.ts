import type { LedgerConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { MessageSource, ProfileSource } from "../sources/types.js";
import type { TextModel } from "../ai/types.js";
import { loadConfig } from "../config/loader.js";
import { createLogger } from "../logging/logger.js";
import { XClient, createXHttp } from "../sources/x/client.js";
import { RateBudget } from "../sources/rate-budget.js";
import { OpenAiTextModel } from "../ai/openai.js";
import { AnthropicTextModel } from "../ai/anthropic.js";
import { FallbackSummarizer, ModelSummarizer, type Summarizer } from "../pipeline/summarizer.js";
import { LinkedInResolver } from "../linkedin/resolver.js";
import { GoogleSheetsTransport } from "../sheets/google.js";
import { SheetWriter } from "../sheets/writer.js";
import { Orchestrator } from "../pipeline/orchestrator.js";

export interface Runtime {
  readonly config: LedgerConfig;
  readonly logger: Logger;
  readonly x: MessageSource & ProfileSource;
  readonly summaryModel?: TextModel;
  readonly linkedinModel?: TextModel;
  readonly summarizer: Summarizer;
  readonly resolver: LinkedInResolver;
  readonly sheet?: SheetWriter;
  readonly budget: RateBudget;
}

/** Wires collaborators from configuration. Throws `ConfigError` on a bad config. */
export function createRuntime(configPath?: string): Runtime {
  const config = loadConfig(configPath);
  const logger = createLogger(config.logging);

  const x = new XClient(
    createXHttp(config.x),
    { pageSize: config.x.pageSize, windowMs: config.x.windowMs },
    logger,
  );
  const budget = new RateBudget({ maxRequests: config.x.maxRequestsPerWindow, windowMs: config.x.windowMs });

  const { summarizer: s, linkedin: l } = config;
  const summaryModel = s.apiKey
    ? new OpenAiTextModel(
        { apiKey: s.apiKey, model: s.model, timeoutMs: s.timeoutMs, maxRetries: s.maxRetries },
        logger,
      )
    : undefined;
  const linkedinModel = l.apiKey
    ? new AnthropicTextModel(
        { apiKey: l.apiKey, model: l.model, timeoutMs: l.timeoutMs, maxRetries: l.maxRetries },
        logger,
      )
    : undefined;

  const fallback = new FallbackSummarizer();
  const summarizer = summaryModel
    ? new ModelSummarizer(
        summaryModel,
        fallback,
        { maxWords: s.maxWords, maxPromptMessages: s.maxPromptMessages, temperature: s.temperature },
        logger,
      )
    : fallback;
  const resolver = new LinkedInResolver(linkedinModel, { maxAttempts: l.maxAttempts }, logger);

  const sheet = config.sheets.spreadsheetId
    ? new SheetWriter(
        new GoogleSheetsTransport({
          spreadsheetId: config.sheets.spreadsheetId,
          credentialsPath: config.sheets.credentialsPath,
          sheetName: config.sheets.sheetName,
        }),
        logger,
      )
    : undefined;

  logger.debug(
    {
      summaries: summaryModel ? `${summaryModel.provider}:${summaryModel.model}` : "fallback",
      linkedin: linkedinModel ? `${linkedinModel.provider}:${linkedinModel.model}` : "patterns only",
      sheet: sheet ? "configured" : "none",
    },
    "runtime ready",
  );

  return { config, logger, x, summaryModel, linkedinModel, summarizer, resolver, sheet, budget };
}

export function createOrchestrator(runtime: Runtime): Orchestrator {
  return new Orchestrator({
    messages: runtime.x,
    profiles: runtime.x,
    summarizer: runtime.summarizer,
    resolver: runtime.resolver,
    sheet: runtime.sheet,
    budget: runtime.budget,
    logger: runtime.logger,
  });
}
