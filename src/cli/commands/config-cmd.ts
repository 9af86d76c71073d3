import { Command, Option } from "clipanion";
import { readFileSync } from "node:fs";
import type { LedgerConfig } from "../../config/types.js";
import { loadConfig, parseConfigText } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import { errorMessage } from "../../utils/errors.js";

const REDACTED = "***REDACTED***";

function redact(value: string | undefined): string | undefined {
  return value ? REDACTED : value;
}

export function redactConfig(config: LedgerConfig): LedgerConfig {
  return {
    ...config,
    x: {
      ...config.x,
      apiKey: REDACTED,
      apiSecret: REDACTED,
      accessToken: REDACTED,
      accessTokenSecret: REDACTED,
    },
    summarizer: { ...config.summarizer, apiKey: redact(config.summarizer.apiKey) },
    linkedin: { ...config.linkedin, apiKey: redact(config.linkedin.apiKey) },
  };
}

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show current configuration (secrets redacted)",
    examples: [["Show config", "dm-ledger config show"]],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<void> {
    let config: LedgerConfig;
    try {
      config = loadConfig(this.config);
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    this.context.stdout.write(JSON.stringify(redactConfig(config), null, 2) + "\n");
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "dm-ledger config validate"],
      ["Validate specific file", "dm-ledger config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }

    try {
      parseConfigText(content, configPath);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
    } catch (err) {
      this.context.stdout.write(`Config is INVALID: ${configPath}\n  ${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  }
}
