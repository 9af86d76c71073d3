import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ZodError } from "zod";
import type { LedgerConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";
import { ConfigError } from "../utils/errors.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/g;

// Used when no config file exists: everything comes from the environment.
const ENV_DEFAULTS = {
  x: {
    apiKey: "${env:X_API_KEY:-}",
    apiSecret: "${env:X_API_SECRET:-}",
    accessToken: "${env:X_ACCESS_TOKEN:-}",
    accessTokenSecret: "${env:X_ACCESS_TOKEN_SECRET:-}",
  },
  sheets: {
    spreadsheetId: "${env:GOOGLE_SHEETS_ID:-}",
    credentialsPath: "${env:GOOGLE_SHEETS_CREDENTIALS_PATH:-config/service_account.json}",
  },
  summarizer: {
    apiKey: "${env:OPENAI_API_KEY:-}",
    model: "${env:OPENAI_MODEL:-gpt-4o-mini}",
  },
  linkedin: {
    apiKey: "${env:ANTHROPIC_API_KEY:-}",
  },
  logging: {
    level: "${env:LOG_LEVEL:-info}",
  },
};

/**
 * Replaces `${env:NAME}` placeholders in JSON text. Values are JSON-escaped so
 * backslashes and quotes survive inside string literals; fallbacks are already
 * part of the JSON text and are inserted as written.
 */
export function substituteEnv(raw: string): string {
  return raw.replace(
    ENV_PATTERN,
    (match, varName: string, fallback: string | undefined) => {
      const value = process.env[varName];
      if (value !== undefined) return JSON.stringify(value).slice(1, -1);
      if (fallback !== undefined) return fallback;
      throw new ConfigError(`Missing environment variable: ${varName} (referenced as ${match})`);
    },
  );
}

export function parseConfigText(content: string, source: string): LedgerConfig {
  const substituted = substituteEnv(content);

  let raw: unknown;
  try {
    raw = JSON.parse(substituted);
  } catch (err) {
    throw new ConfigError(`Config is not valid JSON (${source})`, { cause: err });
  }

  try {
    return parseConfig(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      const issues = err.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new ConfigError(`Invalid config (${source}): ${issues}`, { cause: err });
    }
    throw err;
  }
}

export function loadConfig(path?: string): LedgerConfig {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      if (path) {
        throw new ConfigError(`Config file not found: ${configPath}`, { cause: err });
      }
      return parseConfigText(JSON.stringify(ENV_DEFAULTS), "environment");
    }
    throw err;
  }

  return parseConfigText(content, configPath);
}
