/**
 * Server target for the pre-fork launcher: `dist/main.js:app`.
 *
 * `preload` runs once in the master when started with --preload; its result
 * reaches every worker as a frozen snapshot.
 */

import { readFile } from "node:fs/promises";
import type { FastifyInstance } from "fastify";
import { buildApp } from "./app.js";
import type { BuildInfo } from "./routes/health.js";

export async function preload(): Promise<BuildInfo> {
  const raw = await readFile(new URL("../package.json", import.meta.url), "utf8");
  const pkg: unknown = JSON.parse(raw);
  return toBuildInfo(pkg, new Date().toISOString());
}

export function toBuildInfo(pkg: unknown, startedAt: string): BuildInfo {
  const field = (key: string): string => {
    if (typeof pkg !== "object" || pkg === null) return "unknown";
    const value: unknown = Reflect.get(pkg, key);
    return typeof value === "string" ? value : "unknown";
  };
  return { name: field("name"), version: field("version"), startedAt };
}

function isBuildInfo(value: unknown): value is BuildInfo {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "version" in value &&
    typeof value.version === "string" &&
    "startedAt" in value &&
    typeof value.startedAt === "string"
  );
}

export async function app({ snapshot }: { snapshot: unknown }): Promise<FastifyInstance> {
  return buildApp({ buildInfo: isBuildInfo(snapshot) ? snapshot : undefined });
}
