import { z } from "zod";
import type { LedgerConfig } from "./types.js";

// Empty strings come from `${env:NAME:-}` placeholders and mean "not set".
const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const xSchema = z.object({
  apiKey: z.string().min(1, "x.apiKey is required"),
  apiSecret: z.string().min(1, "x.apiSecret is required"),
  accessToken: z.string().min(1, "x.accessToken is required"),
  accessTokenSecret: z.string().min(1, "x.accessTokenSecret is required"),
  maxRequestsPerWindow: z.number().int().positive().default(280),
  windowMs: z.number().int().positive().default(900_000),
  pageSize: z.number().int().min(1).max(100).default(100),
  timeoutMs: z.number().int().positive().default(30_000),
});

const sheetsSchema = z.object({
  spreadsheetId: optionalSecret,
  credentialsPath: z.string().min(1).default("config/service_account.json"),
  sheetName: optionalSecret,
});

const summarizerSchema = z.object({
  apiKey: optionalSecret,
  model: z.string().min(1).default("gpt-4o-mini"),
  maxWords: z.number().int().min(10).default(200),
  maxPromptMessages: z.number().int().positive().default(50),
  temperature: z.number().min(0).max(2).default(0.3),
  timeoutMs: z.number().int().positive().default(30_000),
  maxRetries: z.number().int().min(0).max(10).default(2),
});

const linkedinSchema = z.object({
  apiKey: optionalSecret,
  model: z.string().min(1).default("claude-3-5-haiku-latest"),
  maxAttempts: z.number().int().min(1).max(10).default(3),
  timeoutMs: z.number().int().positive().default(30_000),
  maxRetries: z.number().int().min(0).max(10).default(2),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: optionalSecret,
  json: z.boolean().optional(),
});

export const ledgerConfigSchema = z.object({
  x: xSchema,
  sheets: sheetsSchema.default({}),
  summarizer: summarizerSchema.default({}),
  linkedin: linkedinSchema.default({}),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): LedgerConfig {
  return ledgerConfigSchema.parse(raw);
}
