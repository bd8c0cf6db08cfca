/**
 * Worker pool configuration.
 *
 * Precedence: built-in defaults < PORT/WEB_CONCURRENCY environment < JSON
 * config file (-c) < command-line flags. The result is frozen; changing it
 * means restarting the master.
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { parseArgs } from "node:util";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { BindAddress, WorkerPoolConfig } from "../types/index.js";
import { DEFAULT_PORT } from "../lib/constants.js";
import { ConfigError, errorMessage } from "../lib/errors.js";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const WorkerClassSchema = Type.Literal("fastify");

/** Upper bound on the worker count, from the file or the command line */
export const MAX_WORKERS = 256;

/** Contents of the server tuning file */
export const PoolConfigFile = Type.Object(
  {
    workerClass: Type.Optional(WorkerClassSchema),
    workers: Type.Optional(Type.Integer({ minimum: 1, maximum: MAX_WORKERS })),
    bind: Type.Optional(Type.String({ minLength: 1 })),
    timeout: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
    gracefulTimeout: Type.Optional(Type.Number({ minimum: 0 })),
    preload: Type.Optional(Type.Boolean()),
    maxRespawns: Type.Optional(Type.Integer({ minimum: 0 })),
    respawnWindow: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
  },
  { additionalProperties: false },
);

export type PoolConfigFile = Static<typeof PoolConfigFile>;

/** The resolved configuration, as handed to workers */
export const WorkerPoolConfigSchema = Type.Object({
  workerClass: WorkerClassSchema,
  workers: Type.Integer({ minimum: 1, maximum: MAX_WORKERS }),
  bind: Type.Object({
    host: Type.String(),
    port: Type.Integer({ minimum: 0, maximum: 65535 }),
  }),
  timeout: Type.Number({ exclusiveMinimum: 0 }),
  gracefulTimeout: Type.Number({ minimum: 0 }),
  preload: Type.Boolean(),
  maxRespawns: Type.Integer({ minimum: 0 }),
  respawnWindow: Type.Number({ exclusiveMinimum: 0 }),
  target: Type.String({ minLength: 1 }),
});

export const DEFAULT_POOL_CONFIG: Omit<WorkerPoolConfig, "target"> = {
  workerClass: "fastify",
  workers: 2,
  bind: { host: "0.0.0.0", port: DEFAULT_PORT },
  timeout: 30,
  gracefulTimeout: 30,
  preload: false,
  maxRespawns: 0,
  respawnWindow: 60,
};

// ---------------------------------------------------------------------------
// Parsing helpers
// ---------------------------------------------------------------------------

/** Parse "host:port", "[ipv6]:port", ":port" or "port" */
export function parseBind(value: string, fallbackHost = "0.0.0.0"): BindAddress {
  let host = fallbackHost;
  let port: string;

  const ipv6 = /^\[([^\]]+)\]:(\d+)$/.exec(value);
  if (ipv6) {
    host = ipv6[1];
    port = ipv6[2];
  } else if (/^\d+$/.test(value)) {
    port = value;
  } else {
    const colon = value.lastIndexOf(":");
    if (colon < 0) throw new ConfigError(`Invalid bind address "${value}"`);
    host = value.slice(0, colon) || fallbackHost;
    port = value.slice(colon + 1);
  }

  const parsed = Number(port);
  if (!/^\d+$/.test(port) || parsed > 65535) {
    throw new ConfigError(`Invalid port in bind address "${value}"`);
  }
  return { host, port: parsed };
}

function parseNumber(flag: string, value: string, integer = false): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed) || (integer && !Number.isInteger(parsed))) {
    throw new ConfigError(`--${flag} expects ${integer ? "an integer" : "a number"}, got "${value}"`);
  }
  return parsed;
}

async function readConfigFile(path: string): Promise<PoolConfigFile> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(err)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${errorMessage(err)}`);
  }

  if (!Value.Check(PoolConfigFile, data)) {
    const first = Value.Errors(PoolConfigFile, data).First();
    throw new ConfigError(
      `Config file ${path} is invalid: ${first ? `${first.path || "/"} ${first.message}` : "unknown error"}`,
    );
  }
  return data;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export interface LoadPoolConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/** Resolve the pool configuration from argv (without node and script) */
export async function loadPoolConfig(
  argv: string[],
  options: LoadPoolConfigOptions = {},
): Promise<WorkerPoolConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let parsed: ReturnType<typeof parseCli>;
  try {
    parsed = parseCli(argv);
  } catch (err) {
    throw new ConfigError(errorMessage(err));
  }
  const { values, positionals } = parsed;

  // Defaults, then environment
  let config: Omit<WorkerPoolConfig, "target"> = { ...DEFAULT_POOL_CONFIG };
  if (env.PORT) {
    config = { ...config, bind: parseBind(env.PORT, config.bind.host) };
  }
  if (env.WEB_CONCURRENCY) {
    config = { ...config, workers: parseNumber("workers", env.WEB_CONCURRENCY, true) };
  }

  // Config file
  if (values.config) {
    const file = await readConfigFile(resolve(cwd, values.config));
    const { bind, ...rest } = file;
    config = {
      ...config,
      ...rest,
      ...(bind !== undefined ? { bind: parseBind(bind, config.bind.host) } : {}),
    };
  }

  // Flags
  const workerClass = values["worker-class"];
  if (workerClass !== undefined) {
    if (!Value.Check(WorkerClassSchema, workerClass)) {
      throw new ConfigError(`Unknown worker class "${workerClass}"`);
    }
    config = { ...config, workerClass };
  }
  if (values.workers !== undefined) {
    config = { ...config, workers: parseNumber("workers", values.workers, true) };
  }
  if (values.bind !== undefined) {
    config = { ...config, bind: parseBind(values.bind, config.bind.host) };
  }
  if (values.timeout !== undefined) {
    config = { ...config, timeout: parseNumber("timeout", values.timeout) };
  }
  if (values["graceful-timeout"] !== undefined) {
    config = { ...config, gracefulTimeout: parseNumber("graceful-timeout", values["graceful-timeout"]) };
  }
  if (values.preload) {
    config = { ...config, preload: true };
  }
  if (values["max-respawns"] !== undefined) {
    config = { ...config, maxRespawns: parseNumber("max-respawns", values["max-respawns"], true) };
  }
  if (values["respawn-window"] !== undefined) {
    config = { ...config, respawnWindow: parseNumber("respawn-window", values["respawn-window"]) };
  }

  const target = positionals[0];
  if (!target) {
    throw new ConfigError("No application target given (expected module.js[:export])");
  }
  if (positionals.length > 1) {
    throw new ConfigError(`Unexpected arguments: ${positionals.slice(1).join(" ")}`);
  }

  return freezeConfig({ ...config, target });
}

function parseCli(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      "worker-class": { type: "string", short: "k" },
      config: { type: "string", short: "c" },
      workers: { type: "string", short: "w" },
      bind: { type: "string", short: "b" },
      timeout: { type: "string", short: "t" },
      "graceful-timeout": { type: "string" },
      preload: { type: "boolean" },
      "max-respawns": { type: "string" },
      "respawn-window": { type: "string" },
    },
  });
}

/** Validate and freeze a complete configuration */
export function freezeConfig(config: WorkerPoolConfig): WorkerPoolConfig {
  if (!Value.Check(WorkerPoolConfigSchema, config)) {
    const first = Value.Errors(WorkerPoolConfigSchema, config).First();
    throw new ConfigError(
      `Invalid server configuration: ${first ? `${first.path} ${first.message}` : "unknown error"}`,
    );
  }
  return Object.freeze({ ...config, bind: Object.freeze({ ...config.bind }) });
}

/** Decode the configuration a worker receives from its master */
export function parseWorkerConfig(raw: string | undefined): WorkerPoolConfig {
  if (!raw) throw new ConfigError("Worker started without FORKLIFT_WORKER_CONFIG");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`FORKLIFT_WORKER_CONFIG is not valid JSON: ${errorMessage(err)}`);
  }
  if (!Value.Check(WorkerPoolConfigSchema, data)) {
    throw new ConfigError("FORKLIFT_WORKER_CONFIG does not describe a worker pool");
  }
  return freezeConfig(data);
}
