/**
 * Container entrypoint: bridges container start to server start.
 *
 *   START → ACTIVATING_ENV → ENV_READY → EXEC_SERVER
 *                          ↘ ENV_MISSING → FATAL_EXIT
 *
 * EXEC_SERVER and FATAL_EXIT are terminal. Once EXEC_SERVER is reached the
 * launcher owns the process and the supervisor does nothing further.
 */

import type { EnvRecord, HandoffCommand, SupervisorState } from "../types/index.js";
import { readLockFile } from "../builder/lockfile.js";
import { verifyEnvironment } from "../builder/verify-environment.js";
import { ExitCode } from "../lib/constants.js";
import { EnvironmentActivationError, ErrorCode } from "../lib/errors.js";
import { logger as rootLogger, type Logger } from "../lib/logger.js";
import { activateEnvironment } from "./activate.js";
import { processLauncher, type Launcher } from "./handoff.js";

const TRANSITIONS: Record<SupervisorState, readonly SupervisorState[]> = {
  START: ["ACTIVATING_ENV"],
  ACTIVATING_ENV: ["ENV_READY", "ENV_MISSING"],
  ENV_READY: ["EXEC_SERVER"],
  ENV_MISSING: ["FATAL_EXIT"],
  EXEC_SERVER: [],
  FATAL_EXIT: [],
};

export const SERVER_COMMAND = "forklift-serve";

export interface SupervisorOptions {
  envPath: string;
  serverConfigPath: string;
  appTarget: string;
  /** Worker heartbeat timeout passed to the server, seconds */
  timeout: number;
  /** Also check installed versions against the environment's lock file */
  verify: boolean;
}

export interface SupervisorDeps {
  env?: EnvRecord;
  launcher?: Launcher;
  logger?: Logger;
}

export function loadSupervisorOptions(env: EnvRecord = process.env): SupervisorOptions {
  const timeout = Number.parseInt(env.FORKLIFT_TIMEOUT || "30", 10);
  return {
    envPath: env.FORKLIFT_ENV_PATH || "/opt/deps",
    serverConfigPath: env.FORKLIFT_SERVER_CONFIG || "prefork.config.json",
    appTarget: env.FORKLIFT_APP_TARGET || "dist/main.js:app",
    timeout: Number.isFinite(timeout) && timeout > 0 ? timeout : 30,
    verify: env.FORKLIFT_VERIFY_ENV === "1",
  };
}

/** The canonical server command line */
export function defaultServerCommand(options: SupervisorOptions): HandoffCommand {
  return {
    command: SERVER_COMMAND,
    args: [
      "-k",
      "fastify",
      "-c",
      options.serverConfigPath,
      "--preload",
      "--timeout",
      String(options.timeout),
      options.appTarget,
    ],
  };
}

export class Supervisor {
  private current: SupervisorState = "START";
  private readonly env: EnvRecord;
  private readonly launcher: Launcher;
  private readonly log: Logger;

  constructor(
    private readonly options: SupervisorOptions,
    deps: SupervisorDeps = {},
  ) {
    this.env = deps.env ?? process.env;
    this.launcher = deps.launcher ?? processLauncher;
    this.log = (deps.logger ?? rootLogger).child({ role: "supervisor" });
  }

  get state(): SupervisorState {
    return this.current;
  }

  private transition(next: SupervisorState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal supervisor transition ${this.current} → ${next}`);
    }
    this.current = next;
  }

  private async activate(): Promise<EnvRecord> {
    const env = activateEnvironment(this.options.envPath, this.env);
    if (this.options.verify) {
      const lock = await readLockFile(this.options.envPath);
      const mismatches = await verifyEnvironment(this.options.envPath, lock);
      if (mismatches.length > 0) {
        const summary = mismatches
          .map((m) => `${m.path}: expected ${m.expected}, found ${m.actual ?? "nothing"}`)
          .join("; ");
        throw new EnvironmentActivationError(
          `Dependency environment does not match its lock file: ${summary}`,
          ErrorCode.ENV_MISMATCH,
        );
      }
    }
    return env;
  }

  /**
   * Activate the environment, then hand off to `argv` when given, or to the
   * default server command. Resolves only with a failure exit code; a
   * successful handoff never returns.
   */
  async run(argv: string[]): Promise<number> {
    this.transition("ACTIVATING_ENV");

    let env: EnvRecord;
    try {
      env = await this.activate();
    } catch (err) {
      this.transition("ENV_MISSING");
      this.log.fatal({ err, envPath: this.options.envPath }, "Dependency environment activation failed");
      this.transition("FATAL_EXIT");
      return ExitCode.FATAL;
    }
    this.transition("ENV_READY");

    const [command, ...args] = argv;
    const handoff = command !== undefined ? { command, args } : defaultServerCommand(this.options);

    this.transition("EXEC_SERVER");
    this.log.info({ command: handoff.command, args: handoff.args }, "Handing off");
    return this.launcher.exec(handoff, env);
  }
}
