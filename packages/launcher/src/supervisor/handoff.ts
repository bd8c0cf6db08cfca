/**
 * Terminal handoff from the supervisor to the server process.
 *
 * Node.js cannot replace its own process image, so the handoff spawns the
 * command with inherited stdio, relays every signal the container runtime
 * sends, and mirrors the child's exit status. Nothing else runs in the
 * supervisor once the handoff starts.
 */

import { spawn } from "node:child_process";
import { constants } from "node:os";
import type { EnvRecord, HandoffCommand } from "../types/index.js";

export const FORWARDED_SIGNALS: NodeJS.Signals[] = [
  "SIGTERM",
  "SIGINT",
  "SIGHUP",
  "SIGQUIT",
  "SIGUSR1",
  "SIGUSR2",
];

/** Exit status a shell would report for a child killed by `signal` */
export function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + (constants.signals[signal] ?? 0);
}

export interface Launcher {
  /** Hand the process over to `command`. Never resolves. */
  exec(command: HandoffCommand, env: EnvRecord): Promise<never>;
}

export const processLauncher: Launcher = {
  exec({ command, args }, env) {
    return new Promise<never>(() => {
      const child = spawn(command, args, { stdio: "inherit", env: { ...env } });

      for (const signal of FORWARDED_SIGNALS) {
        process.on(signal, () => {
          child.kill(signal);
        });
      }

      child.on("error", (err) => {
        process.stderr.write(`Failed to start ${command}: ${err.message}\n`);
        process.exit(127);
      });

      child.on("exit", (code, signal) => {
        process.exit(signal ? signalExitCode(signal) : (code ?? 1));
      });
    });
  },
};
