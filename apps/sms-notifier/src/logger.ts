import pino, { type Logger } from "pino";
import { env } from "./config.js";

export type { Logger };

/**
 * Logs go to stderr so stdout only ever carries the final report.
 */
export function createLogger(level: string = env.LOG_LEVEL): Logger {
  const options = {
    level,
    redact: {
      paths: ["apiSecret", "*.apiSecret", "password", "*.password"],
      censor: "[redacted]",
    },
  };

  if (env.NODE_ENV === "development") {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: { singleLine: true, destination: 2 },
      },
    });
  }
  return pino(options, pino.destination(2));
}

export const silentLogger: Logger = pino({ level: "silent" });
