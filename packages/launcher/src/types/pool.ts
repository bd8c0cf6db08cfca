/**
 * Pre-fork server types: pool configuration and the master/worker IPC
 * protocol.
 */

/** Worker classes the arbiter knows how to run */
export type WorkerClass = "fastify";

export interface BindAddress {
  host: string;
  port: number;
}

/** Worker pool configuration. Read once at startup, frozen afterwards. */
export interface WorkerPoolConfig {
  readonly workerClass: WorkerClass;
  readonly workers: number;
  readonly bind: Readonly<BindAddress>;
  /** Seconds a worker may go without a heartbeat before it is killed */
  readonly timeout: number;
  /** Seconds workers get to finish in-flight requests on SIGTERM */
  readonly gracefulTimeout: number;
  /** Load the app once in the master before forking */
  readonly preload: boolean;
  /** Respawns tolerated inside respawnWindow (0 = unlimited) */
  readonly maxRespawns: number;
  /** Seconds */
  readonly respawnWindow: number;
  /** Application target, "path/to/module.js:exportName" */
  readonly target: string;
}

/** Messages sent by a worker to the master */
export type WorkerMessage =
  | { type: "booting" }
  | { type: "ready"; address: string }
  | { type: "heartbeat" };

/** Messages sent by the master to a worker */
export type MasterMessage =
  | { type: "init"; snapshot: unknown; preloaded: boolean }
  | { type: "shutdown" };

/** Lifecycle of a single worker as seen by the master */
export type WorkerState = "booting" | "ready" | "retiring" | "exited";

/** Info about one worker, for logging and inspection */
export interface WorkerInfo {
  id: number;
  pid?: number;
  state: WorkerState;
  lastHeartbeatAt: number;
  address?: string;
}
