/**
 * Arbiter: the pre-fork master process.
 *
 * Forks a fixed pool of workers, hands each one the preloaded snapshot by
 * value, watches their heartbeats, replaces the ones that die or go silent,
 * and drains the pool on SIGTERM.
 *
 * IMPORTANT: The arbiter never serves requests and never imports the web
 * framework. Workers own their servers; the arbiter only sees IPC messages
 * and process exits.
 */

import type { WorkerInfo, WorkerMessage, WorkerPoolConfig, WorkerState } from "../types/index.js";
import { ExitCode } from "../lib/constants.js";
import { logger as rootLogger, type Logger } from "../lib/logger.js";
import { computeSnapshot, createModuleLoader, type ModuleLoader } from "./app-loader.js";
import type { WorkerForker, WorkerHandle } from "./forker.js";

/** Environment variable carrying the frozen pool config into each worker */
export const WORKER_CONFIG_ENV = "FORKLIFT_WORKER_CONFIG";

/** Signals the arbiter acts on */
export const ARBITER_SIGNALS: NodeJS.Signals[] = ["SIGTERM", "SIGINT", "SIGQUIT", "SIGHUP"];

const MAX_CHECK_INTERVAL_MS = 1_000;

interface ManagedWorker {
  handle: WorkerHandle;
  state: WorkerState;
  lastHeartbeatAt: number;
  address?: string;
  timedOut: boolean;
}

export interface ArbiterDeps {
  forker: WorkerForker;
  loader?: ModuleLoader;
  logger?: Logger;
}

export class Arbiter {
  private readonly forker: WorkerForker;
  private readonly loader: ModuleLoader;
  private readonly log: Logger;

  private workers = new Map<number, ManagedWorker>();
  private snapshot: unknown = null;
  private preloaded = false;
  private stopping: "graceful" | "quick" | null = null;
  private respawns: number[] = [];
  /** Previous-generation workers still serving, oldest first, until a replacement is ready */
  private outgoing: ManagedWorker[] = [];

  private watchdog: ReturnType<typeof setInterval> | null = null;
  private timers = new Set<ReturnType<typeof setTimeout>>();

  private exitCode: number | null = null;
  private waiters: Array<(code: number) => void> = [];

  constructor(
    private readonly config: WorkerPoolConfig,
    deps: ArbiterDeps,
  ) {
    this.forker = deps.forker;
    this.loader = deps.loader ?? createModuleLoader();
    this.log = (deps.logger ?? rootLogger).child({ role: "master" });
  }

  /** Snapshot of the pool, for inspection */
  get workerInfo(): WorkerInfo[] {
    return Array.from(this.workers.values()).map((w) => ({
      id: w.handle.id,
      pid: w.handle.pid,
      state: w.state,
      lastHeartbeatAt: w.lastHeartbeatAt,
      address: w.address,
    }));
  }

  /** Exit code once the arbiter has halted, otherwise null */
  get result(): number | null {
    return this.exitCode;
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  /**
   * Preload (if configured) and fork the pool. A preload failure halts the
   * arbiter with APP_LOAD_ERROR before any worker exists.
   */
  async start(): Promise<void> {
    if (this.config.preload) {
      try {
        const mod = await this.loader(this.config.target);
        this.snapshot = await computeSnapshot(mod);
        this.preloaded = true;
      } catch (err) {
        this.log.fatal({ err, target: this.config.target }, "Failed to preload application");
        this.halt(ExitCode.APP_LOAD_ERROR);
        return;
      }
    }

    this.log.info(
      {
        workers: this.config.workers,
        workerClass: this.config.workerClass,
        bind: `${this.config.bind.host}:${this.config.bind.port}`,
        preload: this.config.preload,
      },
      "Starting arbiter",
    );

    for (let i = 0; i < this.config.workers; i++) {
      this.spawnWorker();
    }

    const interval = Math.min(MAX_CHECK_INTERVAL_MS, (this.config.timeout * 1000) / 2);
    this.watchdog = setInterval(() => this.murmur(), interval);
  }

  /** Resolves with the process exit code once the arbiter halts */
  wait(): Promise<number> {
    if (this.exitCode !== null) return Promise.resolve(this.exitCode);
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  async run(): Promise<number> {
    await this.start();
    return this.wait();
  }

  /** Route process signals to the arbiter. Returns an uninstaller. */
  installSignalHandlers(target: NodeJS.Process = process): () => void {
    const handlers = ARBITER_SIGNALS.map((signal) => {
      const handler = () => this.handleSignal(signal);
      target.on(signal, handler);
      return [signal, handler] as const;
    });
    return () => {
      for (const [signal, handler] of handlers) target.off(signal, handler);
    };
  }

  handleSignal(signal: NodeJS.Signals): void {
    this.log.info({ signal }, "Received signal");
    switch (signal) {
      case "SIGTERM":
        this.stop(true);
        break;
      case "SIGINT":
      case "SIGQUIT":
        this.stop(false);
        break;
      case "SIGHUP":
        this.reload();
        break;
      default:
        break;
    }
  }

  /**
   * Graceful: ask every worker to drain, kill whatever is left after
   * gracefulTimeout. Quick: interrupt every worker now.
   */
  stop(graceful: boolean): void {
    if (this.exitCode !== null) return;
    if (this.stopping === "quick" || (this.stopping === "graceful" && graceful)) return;
    this.stopping = graceful ? "graceful" : "quick";
    this.outgoing = [];
    this.clearWatchdog();

    if (this.workers.size === 0) {
      this.halt(ExitCode.OK);
      return;
    }

    if (graceful) {
      this.log.info({ workers: this.workers.size }, "Draining workers");
      for (const worker of this.workers.values()) this.retire(worker);
      this.schedule(this.config.gracefulTimeout * 1000, () => {
        if (this.workers.size === 0) return;
        this.log.warn({ workers: this.workers.size }, "Graceful timeout reached, killing workers");
        for (const worker of this.workers.values()) worker.handle.kill("SIGKILL");
      });
    } else {
      this.log.info({ workers: this.workers.size }, "Quick shutdown");
      for (const worker of this.workers.values()) worker.handle.kill("SIGINT");
    }
  }

  /**
   * Fork a fresh worker set. Each previous worker keeps serving until a new
   * one reports ready, so the shared listening socket always has a holder.
   */
  reload(): void {
    if (this.stopping || this.exitCode !== null) return;
    for (const worker of this.workers.values()) {
      if (worker.state !== "retiring" && !this.outgoing.includes(worker)) this.outgoing.push(worker);
    }
    this.log.info({ workers: this.config.workers, outgoing: this.outgoing.length }, "Reloading workers");

    for (let i = 0; i < this.config.workers; i++) {
      this.spawnWorker();
    }
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private spawnWorker(): void {
    const handle = this.forker.fork({ [WORKER_CONFIG_ENV]: JSON.stringify(this.config) });
    const worker: ManagedWorker = {
      handle,
      state: "booting",
      lastHeartbeatAt: Date.now(),
      timedOut: false,
    };
    this.workers.set(handle.id, worker);
    handle.onMessage((message) => this.onWorkerMessage(worker, message));
    handle.onExit((code, signal) => this.onWorkerExit(worker, code, signal));
    this.log.debug({ worker: handle.id, pid: handle.pid }, "Forked worker");
  }

  private retire(worker: ManagedWorker): void {
    worker.state = "retiring";
    worker.handle.send({ type: "shutdown" });
  }

  /** Retire the oldest outgoing worker, killing it if it outlives gracefulTimeout */
  private replaceOutgoing(): void {
    const worker = this.outgoing.shift();
    if (!worker) return;
    this.log.info({ worker: worker.handle.id, pid: worker.handle.pid }, "Retiring replaced worker");
    this.retire(worker);
    this.schedule(this.config.gracefulTimeout * 1000, () => {
      if (this.workers.get(worker.handle.id) === worker) worker.handle.kill("SIGKILL");
    });
  }

  private onWorkerMessage(worker: ManagedWorker, message: WorkerMessage): void {
    worker.lastHeartbeatAt = Date.now();

    switch (message.type) {
      case "booting":
        worker.handle.send({ type: "init", snapshot: this.snapshot, preloaded: this.preloaded });
        break;
      case "ready":
        worker.address = message.address;
        this.log.info({ worker: worker.handle.id, pid: worker.handle.pid, address: message.address }, "Worker ready");
        if (worker.state !== "booting") break;
        worker.state = "ready";
        if (!this.outgoing.includes(worker)) this.replaceOutgoing();
        break;
      case "heartbeat":
        break;
    }
  }

  /** Kill workers whose heartbeat is older than the timeout */
  private murmur(): void {
    const now = Date.now();
    const limit = this.config.timeout * 1000;

    for (const worker of this.workers.values()) {
      if (worker.timedOut) continue;
      if (now - worker.lastHeartbeatAt > limit) {
        this.log.error(
          { worker: worker.handle.id, pid: worker.handle.pid, silentMs: now - worker.lastHeartbeatAt },
          "Worker timeout, killing",
        );
        worker.timedOut = true;
        worker.handle.kill("SIGKILL");
      }
    }
  }

  private onWorkerExit(
    worker: ManagedWorker,
    code: number | null,
    signal: NodeJS.Signals | null,
  ): void {
    const id = worker.handle.id;
    if (this.workers.get(id) === worker) this.workers.delete(id);
    const previousState = worker.state;
    worker.state = "exited";

    if (this.exitCode !== null) return;

    if (this.stopping) {
      this.log.info({ worker: id, code, signal }, "Worker stopped");
      if (this.workers.size === 0) this.halt(ExitCode.OK);
      return;
    }

    if (previousState === "retiring") {
      this.log.info({ worker: id, code, signal }, "Retired worker exited");
      return;
    }

    const outgoing = this.outgoing.indexOf(worker);
    if (outgoing !== -1) {
      // already replaced by the new generation
      this.outgoing.splice(outgoing, 1);
      this.log.warn({ worker: id, code, signal }, "Outgoing worker exited before its replacement was ready");
      return;
    }

    if (code === ExitCode.WORKER_BOOT_ERROR && !worker.timedOut) {
      this.log.fatal({ worker: id }, "Worker failed to boot");
      this.halt(ExitCode.WORKER_BOOT_ERROR);
      return;
    }

    this.log.warn({ worker: id, code, signal, timedOut: worker.timedOut }, "Worker exited unexpectedly");

    if (!this.recordRespawn()) {
      this.log.fatal(
        { maxRespawns: this.config.maxRespawns, respawnWindow: this.config.respawnWindow },
        "Respawn limit exceeded",
      );
      this.halt(ExitCode.RESPAWN_LIMIT);
      return;
    }
    this.spawnWorker();
  }

  /** Returns false once the respawn budget is exhausted */
  private recordRespawn(): boolean {
    if (this.config.maxRespawns === 0) return true;
    const now = Date.now();
    const windowMs = this.config.respawnWindow * 1000;
    this.respawns = this.respawns.filter((at) => now - at < windowMs);
    this.respawns.push(now);
    return this.respawns.length <= this.config.maxRespawns;
  }

  private schedule(ms: number, fn: () => void): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      fn();
    }, ms);
    this.timers.add(timer);
  }

  private clearWatchdog(): void {
    if (this.watchdog) {
      clearInterval(this.watchdog);
      this.watchdog = null;
    }
  }

  private halt(code: number): void {
    if (this.exitCode !== null) return;
    this.exitCode = code;
    this.clearWatchdog();
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();

    for (const worker of this.workers.values()) worker.handle.kill("SIGKILL");

    this.log.info({ code }, "Arbiter halted");
    for (const resolve of this.waiters.splice(0)) resolve(code);
  }
}
