import pino from "pino";

// Pretty print outside production; tests write plain JSON (usually silenced).
const nodeEnv = process.env.NODE_ENV;
const usePrettyTransport = nodeEnv !== "production" && nodeEnv !== "test";
const transport = usePrettyTransport
  ? {
      target: "pino-pretty",
      options: {
        colorize: true,
        ignore: "pid,hostname",
        translateTime: "SYS:standard",
      },
    }
  : undefined;

/**
 * Application logger.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  transport,
});

export type { Logger } from "pino";
