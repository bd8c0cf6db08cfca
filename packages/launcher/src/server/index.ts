/**
 * Pre-fork server module.
 *
 * The arbiter supervises processes; workers run the application. Neither
 * depends on the image builder or the entrypoint supervisor.
 */

export { Arbiter, ARBITER_SIGNALS, WORKER_CONFIG_ENV } from "./arbiter.js";
export { PoolWorker, processChannel, type WorkerChannel } from "./worker.js";
export { ClusterForker, type WorkerForker, type WorkerHandle } from "./forker.js";
export {
  createModuleLoader,
  computeSnapshot,
  resolveServer,
  parseTarget,
  isServerApp,
  type AppContext,
  type AppFactory,
  type ServerApp,
} from "./app-loader.js";
export { loadPoolConfig, parseWorkerConfig, parseBind, DEFAULT_POOL_CONFIG } from "./config.js";
