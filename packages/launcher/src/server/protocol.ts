import type { MasterMessage, WorkerMessage } from "../types/index.js";

function typeOf(value: unknown): unknown {
  return typeof value === "object" && value !== null && "type" in value ? value.type : undefined;
}

export function isWorkerMessage(value: unknown): value is WorkerMessage {
  const type = typeOf(value);
  if (type === "ready") {
    return typeof value === "object" && value !== null && "address" in value && typeof value.address === "string";
  }
  return type === "booting" || type === "heartbeat";
}

export function isMasterMessage(value: unknown): value is MasterMessage {
  const type = typeOf(value);
  if (type === "init") {
    return typeof value === "object" && value !== null && "snapshot" in value && "preloaded" in value;
  }
  return type === "shutdown";
}
