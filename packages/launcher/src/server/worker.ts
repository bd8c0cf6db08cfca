/**
 * Pool worker: one server on one event loop.
 *
 * Handshake with the arbiter is booting → init → ready, then a heartbeat
 * every timeout/2. A blocked event loop stops the heartbeat, which is what
 * lets the arbiter detect a stuck worker.
 */

import type { MasterMessage, WorkerMessage, WorkerPoolConfig } from "../types/index.js";
import { ExitCode } from "../lib/constants.js";
import { deepFreeze } from "../lib/freeze.js";
import { logger as rootLogger, type Logger } from "../lib/logger.js";
import {
  computeSnapshot,
  createModuleLoader,
  resolveServer,
  type ModuleLoader,
  type ServerApp,
} from "./app-loader.js";
import { isMasterMessage } from "./protocol.js";

export interface WorkerChannel {
  send(message: WorkerMessage): void;
  onMessage(listener: (message: MasterMessage) => void): void;
}

/** IPC channel of a cluster worker */
export const processChannel: WorkerChannel = {
  send(message) {
    process.send?.(message);
  },
  onMessage(listener) {
    process.on("message", (message: unknown) => {
      if (isMasterMessage(message)) listener(message);
    });
  },
};

export interface PoolWorkerDeps {
  workerId: number;
  channel: WorkerChannel;
  exit: (code: number) => void;
  loader?: ModuleLoader;
  logger?: Logger;
}

export class PoolWorker {
  private readonly channel: WorkerChannel;
  private readonly exit: (code: number) => void;
  private readonly loader: ModuleLoader;
  private readonly log: Logger;
  private readonly workerId: number;

  private app: ServerApp | null = null;
  private heartbeat: ReturnType<typeof setInterval> | null = null;
  private booted = false;
  private closing = false;

  constructor(
    private readonly config: WorkerPoolConfig,
    deps: PoolWorkerDeps,
  ) {
    this.workerId = deps.workerId;
    this.channel = deps.channel;
    this.exit = deps.exit;
    this.loader = deps.loader ?? createModuleLoader();
    this.log = (deps.logger ?? rootLogger).child({ role: "worker", worker: deps.workerId });
  }

  get isHeartbeating(): boolean {
    return this.heartbeat !== null;
  }

  start(): void {
    this.channel.onMessage((message) => this.onMessage(message));
    this.channel.send({ type: "booting" });
  }

  private onMessage(message: MasterMessage): void {
    switch (message.type) {
      case "init":
        if (this.booted) return;
        this.booted = true;
        this.boot(message.snapshot, message.preloaded).catch((err: unknown) => {
          this.log.error({ err }, "Worker failed to boot");
          this.finish(ExitCode.WORKER_BOOT_ERROR);
        });
        break;
      case "shutdown":
        this.shutdown().catch((err: unknown) => {
          this.log.error({ err }, "Error while closing server");
          this.finish(ExitCode.FATAL);
        });
        break;
    }
  }

  private async boot(snapshot: unknown, preloaded: boolean): Promise<void> {
    const mod = await this.loader(this.config.target);
    const state = preloaded ? deepFreeze(snapshot) : await computeSnapshot(mod);
    const app = await resolveServer(mod, { snapshot: state, workerId: this.workerId });
    this.app = app;

    const address = await app.listen({ host: this.config.bind.host, port: this.config.bind.port });
    if (this.closing) return;

    this.startHeartbeat();
    this.channel.send({ type: "ready", address });
    this.log.info({ address, pid: process.pid }, "Worker listening");
  }

  private startHeartbeat(): void {
    const interval = Math.max(50, (this.config.timeout * 1000) / 2);
    this.heartbeat = setInterval(() => this.channel.send({ type: "heartbeat" }), interval);
  }

  private stopHeartbeat(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
  }

  /**
   * Stop accepting connections and wait for in-flight requests. Heartbeats
   * continue while draining; the arbiter's graceful timeout bounds the wait.
   */
  async shutdown(): Promise<void> {
    if (this.closing) return;
    this.closing = true;
    this.log.info("Worker draining");

    if (this.app) {
      await this.app.close();
    }
    this.finish(ExitCode.OK);
  }

  private finish(code: number): void {
    this.stopHeartbeat();
    this.exit(code);
  }
}
