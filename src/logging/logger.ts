import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

const STDERR_FD = 2;

/** Writes to stderr, or to `config.file` when set. */
export function createLogger(config?: Partial<LoggingConfig>): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  if (config?.file) {
    return pino({ level }, pino.destination(config.file));
  }

  if (isJson) {
    return pino({ level }, pino.destination(STDERR_FD));
  }

  return pino({
    level,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss", destination: STDERR_FD },
    },
  });
}
