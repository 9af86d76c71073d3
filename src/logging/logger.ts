import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

// stdout is reserved for command output, so logs go to stderr.
const STDERR = 2;

export function createLogger(config?: LoggingConfig): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const transport = isJson || config?.file
    ? undefined
    : {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss", destination: STDERR },
      };

  const options: pino.LoggerOptions = {
    level,
    ...(transport ? { transport } : {}),
  };

  if (config?.file) {
    return pino(options, pino.destination(config.file));
  }

  if (transport) {
    return pino(options);
  }

  return pino(options, pino.destination(STDERR));
}
