import { existsSync, statSync } from "node:fs";
import { delimiter, join, resolve } from "node:path";
import type { EnvRecord } from "../types/index.js";
import { ENV_MARKER } from "../lib/constants.js";
import { EnvironmentActivationError } from "../lib/errors.js";

/** Hidden lock npm writes into node_modules after a successful install */
export const HIDDEN_LOCK = ".package-lock.json";

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

/**
 * Activate a dependency environment: put its executables first on PATH and
 * its packages on NODE_PATH.
 *
 * Pure with respect to `env`; returns a new frozen record. Activating an
 * already-activated record yields an equal record.
 *
 * Throws EnvironmentActivationError when the environment is missing or was
 * never completely installed. There is no fallback to system packages.
 */
export function activateEnvironment(envPath: string, env: EnvRecord): EnvRecord {
  const root = resolve(envPath);
  const modules = join(root, "node_modules");

  if (!isDirectory(root)) {
    throw new EnvironmentActivationError(`Dependency environment ${root} does not exist`);
  }
  if (!isDirectory(modules)) {
    throw new EnvironmentActivationError(`Dependency environment ${root} has no node_modules`);
  }
  if (!existsSync(join(modules, HIDDEN_LOCK))) {
    throw new EnvironmentActivationError(
      `Dependency environment ${root} is incomplete (missing node_modules/${HIDDEN_LOCK})`,
    );
  }

  const bin = join(modules, ".bin");
  const path = (env.PATH ?? "").split(delimiter).filter((p) => p.length > 0 && p !== bin);
  const nodePath = (env.NODE_PATH ?? "").split(delimiter).filter((p) => p.length > 0 && p !== modules);

  return Object.freeze({
    ...env,
    PATH: [bin, ...path].join(delimiter),
    NODE_PATH: [modules, ...nodePath].join(delimiter),
    [ENV_MARKER]: root,
  });
}
