/**
 * Manifest and lock file reading, plus the consistency rules that decide
 * whether a build may start at all.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { Value } from "@sinclair/typebox/value";
import type { TSchema, Static } from "@sinclair/typebox";
import type { BuildConfig, LockFile, PackageManifest } from "../types/index.js";
import { BuildError, ErrorCode, errorMessage } from "../lib/errors.js";
import { LockFileSchema, PackageManifestSchema } from "./schemas.js";

export const MANIFEST_FILE = "package.json";
export const LOCK_FILE = "package-lock.json";

const SUPPORTED_LOCKFILE_VERSIONS = [2, 3];

async function readJsonFile<T extends TSchema>(
  path: string,
  schema: T,
  code: ErrorCode,
): Promise<Static<T>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (err) {
    throw new BuildError(`Cannot read ${path}: ${errorMessage(err)}`, code);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new BuildError(`${path} is not valid JSON: ${errorMessage(err)}`, code);
  }

  if (!Value.Check(schema, data)) {
    const problems = [...Value.Errors(schema, data)].map(
      (e) => `${e.path || "/"}: ${e.message}`,
    );
    throw new BuildError(`${path} failed validation`, code, problems);
  }
  return data;
}

export function readManifest(dir: string): Promise<PackageManifest> {
  return readJsonFile(join(dir, MANIFEST_FILE), PackageManifestSchema, ErrorCode.MANIFEST_INVALID);
}

export function readLockFile(dir: string): Promise<LockFile> {
  return readJsonFile(join(dir, LOCK_FILE), LockFileSchema, ErrorCode.LOCKFILE_INVALID);
}

/** Split "npm@10.8.2+sha512.abc" into tool and version */
export function parsePackageManager(spec: string): { tool: string; version: string } {
  const at = spec.lastIndexOf("@");
  if (at <= 0) return { tool: spec, version: "" };
  const version = spec.slice(at + 1).split("+")[0];
  return { tool: spec.slice(0, at), version };
}

function diffRanges(
  field: "dependencies" | "devDependencies",
  wanted: Record<string, string>,
  locked: Record<string, string>,
): string[] {
  const problems: string[] = [];
  const names = new Set([...Object.keys(wanted), ...Object.keys(locked)]);

  for (const name of [...names].sort()) {
    const want = wanted[name];
    const have = locked[name];
    if (have === undefined) {
      problems.push(`${field}.${name}: "${want}" is in package.json but not in the lock file`);
    } else if (want === undefined) {
      problems.push(`${field}.${name}: "${have}" is in the lock file but not in package.json`);
    } else if (want !== have) {
      problems.push(`${field}.${name}: package.json wants "${want}", lock file records "${have}"`);
    }
  }
  return problems;
}

/**
 * Compare the manifest with its lock file and the build configuration.
 * An empty array means the lock file can be installed as-is; anything else
 * must abort the build.
 */
export function checkLockConsistency(
  manifest: PackageManifest,
  lock: LockFile,
  config: Pick<BuildConfig, "npmVersion" | "launcherPackage">,
): string[] {
  const problems: string[] = [];

  if (!SUPPORTED_LOCKFILE_VERSIONS.includes(lock.lockfileVersion)) {
    problems.push(
      `lockfileVersion ${lock.lockfileVersion} is not supported (expected ${SUPPORTED_LOCKFILE_VERSIONS.join(" or ")})`,
    );
  }

  const root = lock.packages[""];
  if (!root) {
    problems.push("lock file has no root package entry");
  } else {
    problems.push(
      ...diffRanges("dependencies", manifest.dependencies ?? {}, root.dependencies ?? {}),
      ...diffRanges("devDependencies", manifest.devDependencies ?? {}, root.devDependencies ?? {}),
    );
  }

  for (const name of Object.keys(manifest.dependencies ?? {}).sort()) {
    const entry = lock.packages[`node_modules/${name}`];
    if (!entry || (!entry.version && !entry.link)) {
      problems.push(`${name} is not resolved in the lock file`);
    }
  }

  if (!manifest.engines?.node) {
    problems.push("engines.node is not declared in package.json");
  }

  if (manifest.packageManager) {
    const { tool, version } = parsePackageManager(manifest.packageManager);
    if (tool !== "npm") {
      problems.push(`packageManager "${manifest.packageManager}" is not npm`);
    } else if (version !== config.npmVersion) {
      problems.push(
        `packageManager pins npm@${version} but the build installs npm@${config.npmVersion}`,
      );
    }
  }

  if (!manifest.dependencies?.[config.launcherPackage]) {
    problems.push(`${config.launcherPackage} must be listed in dependencies`);
  }

  return problems;
}
