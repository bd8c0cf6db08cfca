import { pino, type Logger } from "pino";

const isDev = process.env.NODE_ENV !== "production";

/**
 * Process-wide logger. Same setup the Fastify apps use: pretty output
 * while developing, structured JSON in production.
 */
export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === "test" ? "silent" : "info"),
  ...(isDev && process.env.NODE_ENV !== "test"
    ? {
        transport: {
          target: "pino-pretty",
          options: { colorize: true },
        },
      }
    : {}),
});

export type { Logger };
