import pino from "pino";
import type { LoggingConfig } from "../config/schema.js";

export type Logger = pino.Logger;

export function createLogger(config?: Partial<LoggingConfig>): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const transport = isJson || config?.file
    ? undefined
    : {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss", destination: 2 },
      };

  const options: pino.LoggerOptions = {
    name: "scrubquery",
    level,
    ...(transport ? { transport } : {}),
  };

  if (config?.file) {
    return pino(options, pino.destination(config.file));
  }

  return pino(options);
}

/**
 * Logger used when the caller supplies none
 */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
