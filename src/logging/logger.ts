import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

export function createLogger(config?: Partial<LoggingConfig>): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const transport = isJson || level === "silent"
    ? undefined
    : {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss", destination: 2 },
      };

  const options: pino.LoggerOptions = {
    name: "wrapped",
    level,
    ...(transport ? { transport } : {}),
  };

  if (config?.file) {
    return pino({ name: "wrapped", level }, pino.destination(config.file));
  }

  // stdout carries the metric bundle, so logs go to stderr
  return transport ? pino(options) : pino(options, pino.destination(2));
}

/** Logger that drops everything; the default when a caller supplies none. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
