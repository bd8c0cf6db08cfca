#!/usr/bin/env node
/**
 * Pre-fork application server.
 *
 * Usage: forklift-serve [-k fastify] [-c prefork.config.json] [-w 2] [-b 0.0.0.0:8632]
 *                       [--timeout 30] [--graceful-timeout 30] [--preload] module.js[:export]
 *
 * The same script runs as the master (cluster primary) and as every worker.
 */

import cluster from "node:cluster";
import { Arbiter, WORKER_CONFIG_ENV } from "../server/arbiter.js";
import { loadPoolConfig, parseWorkerConfig } from "../server/config.js";
import { ClusterForker } from "../server/forker.js";
import { PoolWorker, processChannel } from "../server/worker.js";
import type { WorkerPoolConfig } from "../types/index.js";
import { ExitCode } from "../lib/constants.js";
import { ConfigError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

async function runMaster(): Promise<number> {
  const config = await loadPoolConfig(process.argv.slice(2));
  const arbiter = new Arbiter(config, { forker: new ClusterForker() });
  arbiter.installSignalHandlers();
  return arbiter.run();
}

function runWorker(): void {
  let config: WorkerPoolConfig;
  try {
    config = parseWorkerConfig(process.env[WORKER_CONFIG_ENV]);
  } catch (err) {
    logger.fatal({ err }, "Worker received no usable configuration");
    process.exit(ExitCode.WORKER_BOOT_ERROR);
  }

  const worker = new PoolWorker(config, {
    workerId: cluster.worker?.id ?? 0,
    channel: processChannel,
    exit: (code) => process.exit(code),
  });

  // SIGTERM sent straight to a worker drains it like a shutdown message
  process.on("SIGTERM", () => {
    worker.shutdown().catch((err: unknown) => {
      logger.error({ err }, "Error while closing server");
      process.exit(ExitCode.FATAL);
    });
  });
  process.on("disconnect", () => process.exit(ExitCode.OK));

  worker.start();
}

if (cluster.isPrimary) {
  runMaster().then(
    (code) => process.exit(code),
    (err: unknown) => {
      if (err instanceof ConfigError) {
        logger.fatal(err.message);
      } else {
        logger.fatal({ err }, "Master failed");
      }
      process.exit(ExitCode.FATAL);
    },
  );
} else {
  runWorker();
}
