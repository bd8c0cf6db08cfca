/**
 * Process creation for the arbiter, behind an interface so the supervision
 * logic can be exercised without real processes.
 */

import cluster, { type Worker } from "node:cluster";
import { constants } from "node:os";
import type { MasterMessage, WorkerMessage } from "../types/index.js";
import { isWorkerMessage } from "./protocol.js";

export interface WorkerHandle {
  readonly id: number;
  readonly pid: number | undefined;
  send(message: MasterMessage): void;
  kill(signal: NodeJS.Signals): void;
  onMessage(listener: (message: WorkerMessage) => void): void;
  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
}

export interface WorkerForker {
  fork(env: Record<string, string>): WorkerHandle;
}

function toSignal(value: string | null | undefined): NodeJS.Signals | null {
  if (!value) return null;
  const known = Object.keys(constants.signals);
  const match = known.find((name): name is NodeJS.Signals => name === value);
  return match ?? null;
}

class ClusterWorkerHandle implements WorkerHandle {
  constructor(private readonly worker: Worker) {}

  get id(): number {
    return this.worker.id;
  }

  get pid(): number | undefined {
    return this.worker.process.pid;
  }

  send(message: MasterMessage): void {
    if (this.worker.isConnected()) this.worker.send(message);
  }

  kill(signal: NodeJS.Signals): void {
    if (!this.worker.isDead()) this.worker.process.kill(signal);
  }

  onMessage(listener: (message: WorkerMessage) => void): void {
    this.worker.on("message", (message: unknown) => {
      if (isWorkerMessage(message)) listener(message);
    });
  }

  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void {
    this.worker.on("exit", (code: number | null, signal: string | null) => {
      listener(code, toSignal(signal));
    });
  }
}

/** Forks workers with node:cluster, re-running the current script */
export class ClusterForker implements WorkerForker {
  fork(env: Record<string, string>): WorkerHandle {
    return new ClusterWorkerHandle(cluster.fork(env));
  }
}
