export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LedgerConfig {
  readonly x: XConfig;
  readonly sheets: SheetsConfig;
  readonly summarizer: SummarizerConfig;
  readonly linkedin: LinkedInConfig;
  readonly logging: LoggingConfig;
}

export interface XConfig {
  readonly apiKey: string;
  readonly apiSecret: string;
  readonly accessToken: string;
  readonly accessTokenSecret: string;
  readonly maxRequestsPerWindow: number;
  readonly windowMs: number;
  readonly pageSize: number;
  readonly timeoutMs: number;
}

export interface SheetsConfig {
  readonly spreadsheetId?: string;
  readonly credentialsPath: string;
  readonly sheetName?: string;
}

export interface SummarizerConfig {
  readonly apiKey?: string;
  readonly model: string;
  readonly maxWords: number;
  readonly maxPromptMessages: number;
  readonly temperature: number;
  readonly timeoutMs: number;
  readonly maxRetries: number;
}

export interface LinkedInConfig {
  readonly apiKey?: string;
  readonly model: string;
  readonly maxAttempts: number;
  readonly timeoutMs: number;
  readonly maxRetries: number;
}

export interface LoggingConfig {
  readonly level?: LogLevel;
  readonly file?: string;
  readonly json?: boolean;
}
