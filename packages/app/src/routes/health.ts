import type { FastifyPluginAsync } from "fastify";

/** Metadata captured once in the master and shared with every worker */
export interface BuildInfo {
  name: string;
  version: string;
  startedAt: string;
}

export interface HealthRoutesOptions {
  buildInfo?: BuildInfo;
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (app, opts) => {
  // Liveness probe, also used by the image HEALTHCHECK
  app.get("/", async () => ({ status: "alive" }));

  app.get("/api/health", async () => ({
    status: "ok",
    pid: process.pid,
    uptime: Math.round(process.uptime()),
    build: opts.buildInfo ?? null,
    timestamp: new Date().toISOString(),
  }));
};
