import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import type { MasterMessage, WorkerMessage, WorkerPoolConfig } from "../types/index.js";
import { ExitCode } from "../lib/constants.js";
import type { AppContext, LoadedModule, ModuleLoader, ServerApp } from "./app-loader.js";
import { PoolWorker, type WorkerChannel } from "./worker.js";

// ---------------------------------------------------------------------------
// Fakes
// ---------------------------------------------------------------------------

class FakeChannel implements WorkerChannel {
  readonly sent: WorkerMessage[] = [];
  private listeners: Array<(message: MasterMessage) => void> = [];

  send(message: WorkerMessage): void {
    this.sent.push(message);
  }

  onMessage(listener: (message: MasterMessage) => void): void {
    this.listeners.push(listener);
  }

  deliver(message: MasterMessage): void {
    for (const listener of this.listeners) listener(message);
  }

  count(type: WorkerMessage["type"]): number {
    return this.sent.filter((m) => m.type === type).length;
  }
}

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (err: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Let every pending promise callback run */
function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

// ---------------------------------------------------------------------------
// Test data
// ---------------------------------------------------------------------------

const config: WorkerPoolConfig = {
  workerClass: "fastify",
  workers: 2,
  bind: { host: "0.0.0.0", port: 8632 },
  timeout: 1,
  gracefulTimeout: 5,
  preload: false,
  maxRespawns: 0,
  respawnWindow: 60,
  target: "dist/main.js:app",
};

let channel: FakeChannel;
let exit: Mock<(code: number) => void>;
let server: { listen: Mock<ServerApp["listen"]>; close: Mock<ServerApp["close"]> };
let factory: Mock<(context: AppContext) => ServerApp>;
let preload: Mock<() => unknown>;

function makeWorker(loader?: ModuleLoader): PoolWorker {
  const load: ModuleLoader =
    loader ?? (async (target): Promise<LoadedModule> => ({ target, exported: factory, preload }));
  return new PoolWorker(config, { workerId: 7, channel, exit, loader: load });
}

beforeEach(() => {
  vi.useFakeTimers({ toFake: ["setInterval", "clearInterval"] });
  channel = new FakeChannel();
  exit = vi.fn<(code: number) => void>();
  server = {
    listen: vi.fn<ServerApp["listen"]>(async () => "http://0.0.0.0:8632"),
    close: vi.fn<ServerApp["close"]>(async () => undefined),
  };
  factory = vi.fn<(context: AppContext) => ServerApp>(() => server);
  preload = vi.fn<() => unknown>(() => ({ region: "eu" }));
});

afterEach(() => {
  vi.useRealTimers();
});

// ===========================================================================
// Boot
// ===========================================================================
describe("boot", () => {
  it("announces itself and waits for init", async () => {
    const worker = makeWorker();

    worker.start();
    await flush();

    expect(channel.sent).toEqual([{ type: "booting" }]);
    expect(factory).not.toHaveBeenCalled();
  });

  it("computes its own snapshot when the master did not preload", async () => {
    const worker = makeWorker();
    worker.start();

    channel.deliver({ type: "init", snapshot: null, preloaded: false });
    await flush();

    expect(preload).toHaveBeenCalledOnce();
    expect(factory).toHaveBeenCalledWith({ snapshot: { region: "eu" }, workerId: 7 });
    expect(server.listen).toHaveBeenCalledWith({ host: "0.0.0.0", port: 8632 });
    expect(channel.sent).toEqual([
      { type: "booting" },
      { type: "ready", address: "http://0.0.0.0:8632" },
    ]);
    expect(worker.isHeartbeating).toBe(true);
  });

  it("uses the master's snapshot, frozen, when it preloaded", async () => {
    const worker = makeWorker();
    worker.start();

    channel.deliver({ type: "init", snapshot: { region: "us" }, preloaded: true });
    await flush();

    expect(preload).not.toHaveBeenCalled();
    const [context] = factory.mock.calls[0];
    expect(context.snapshot).toEqual({ region: "us" });
    expect(Object.isFrozen(context.snapshot)).toBe(true);
  });

  it("ignores a second init", async () => {
    const worker = makeWorker();
    worker.start();

    channel.deliver({ type: "init", snapshot: null, preloaded: true });
    channel.deliver({ type: "init", snapshot: null, preloaded: true });
    await flush();

    expect(factory).toHaveBeenCalledOnce();
  });

  it("exits with WORKER_BOOT_ERROR when the app cannot be loaded", async () => {
    const worker = makeWorker(async () => {
      throw new Error("Cannot find module");
    });
    worker.start();

    channel.deliver({ type: "init", snapshot: null, preloaded: false });
    await flush();

    expect(exit).toHaveBeenCalledWith(ExitCode.WORKER_BOOT_ERROR);
    expect(channel.count("ready")).toBe(0);
  });

  it("exits with WORKER_BOOT_ERROR when the server cannot listen", async () => {
    server.listen.mockRejectedValueOnce(new Error("listen EADDRINUSE"));
    const worker = makeWorker();
    worker.start();

    channel.deliver({ type: "init", snapshot: null, preloaded: false });
    await flush();

    expect(exit).toHaveBeenCalledWith(3);
    expect(worker.isHeartbeating).toBe(false);
  });
});

// ===========================================================================
// Heartbeat
// ===========================================================================
describe("heartbeat", () => {
  it("beats every timeout/2 once ready", async () => {
    const worker = makeWorker();
    worker.start();
    channel.deliver({ type: "init", snapshot: null, preloaded: false });
    await flush();

    vi.advanceTimersByTime(499);
    expect(channel.count("heartbeat")).toBe(0);

    vi.advanceTimersByTime(1);
    expect(channel.count("heartbeat")).toBe(1);

    vi.advanceTimersByTime(1_000);
    expect(channel.count("heartbeat")).toBe(3);
  });
});

// ===========================================================================
// Shutdown
// ===========================================================================
describe("shutdown", () => {
  it("waits for the server to drain before exiting 0", async () => {
    const drained = deferred<undefined>();
    server.close.mockImplementationOnce(() => drained.promise);
    const worker = makeWorker();
    worker.start();
    channel.deliver({ type: "init", snapshot: null, preloaded: false });
    await flush();

    channel.deliver({ type: "shutdown" });
    await flush();

    expect(server.close).toHaveBeenCalledOnce();
    expect(exit).not.toHaveBeenCalled();
    vi.advanceTimersByTime(500);
    expect(channel.count("heartbeat")).toBe(1);

    drained.resolve(undefined);
    await flush();

    expect(exit).toHaveBeenCalledWith(ExitCode.OK);
    expect(worker.isHeartbeating).toBe(false);
  });

  it("drains once even when asked twice", async () => {
    const worker = makeWorker();
    worker.start();
    channel.deliver({ type: "init", snapshot: null, preloaded: false });
    await flush();

    channel.deliver({ type: "shutdown" });
    await worker.shutdown();
    await flush();

    expect(server.close).toHaveBeenCalledOnce();
    expect(exit).toHaveBeenCalledTimes(1);
  });

  it("exits 1 when the server fails to close", async () => {
    server.close.mockRejectedValueOnce(new Error("close failed"));
    const worker = makeWorker();
    worker.start();
    channel.deliver({ type: "init", snapshot: null, preloaded: false });
    await flush();

    channel.deliver({ type: "shutdown" });
    await flush();

    expect(exit).toHaveBeenCalledWith(ExitCode.FATAL);
  });

  it("exits 0 straight away when no server is running yet", async () => {
    const worker = makeWorker();
    worker.start();

    channel.deliver({ type: "shutdown" });
    await flush();

    expect(exit).toHaveBeenCalledWith(0);
    expect(server.close).not.toHaveBeenCalled();
  });
});
