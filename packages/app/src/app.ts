import Fastify, { type FastifyError, type FastifyServerOptions } from "fastify";
import { randomUUID } from "node:crypto";
import { healthRoutes, type BuildInfo } from "./routes/health.js";

const isDev = process.env.NODE_ENV !== "production";
const isTest = process.env.NODE_ENV === "test";

export interface BuildAppOptions extends FastifyServerOptions {
  /** Read-only state shared by every worker, produced once by preload() */
  buildInfo?: BuildInfo;
}

/**
 * Build and configure the Fastify application.
 * Exported separately from the server start so tests can use `app.inject()`.
 */
export async function buildApp(opts?: BuildAppOptions) {
  const { buildInfo, ...fastifyOpts } = opts ?? {};

  const app = Fastify(
    Object.keys(fastifyOpts).length > 0
      ? fastifyOpts
      : {
          logger: isTest
            ? false
            : isDev
            ? {
                transport: {
                  target: "pino-pretty",
                  options: { colorize: true },
                },
              }
            : {
                // Production: structured JSON logging with redaction
                redact: ["req.headers.authorization", "req.headers.cookie"],
              },
          genReqId: (req) => {
            const header = req.headers["x-request-id"];
            return typeof header === "string" && header.length > 0 ? header : randomUUID();
          },
        },
  );

  // ---------------------------------------------------------------------------
  // Global error handler: normalise error responses
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, _request, reply) => {
    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({ error: error.message });
      return;
    }

    reply.log.error(error);
    reply.status(error.statusCode ?? 500).send({
      error: isDev ? error.message : "Internal server error",
    });
  });

  await app.register(healthRoutes, { buildInfo });

  return app;
}
