import { readFile } from "node:fs/promises";
import { join } from "node:path";
import type { EnvironmentMismatch, LockFile } from "../types/index.js";

async function installedVersion(packageDir: string): Promise<string | null> {
  let raw: string;
  try {
    raw = await readFile(join(packageDir, "package.json"), "utf8");
  } catch (err) {
    if (typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed === "object" && parsed !== null && "version" in parsed) {
    return typeof parsed.version === "string" ? parsed.version : null;
  }
  return null;
}

/**
 * Compare an installed dependency environment against a lock file.
 *
 * Every runtime entry under node_modules/ must be installed at exactly the
 * locked version. Dev-only and linked entries are skipped (`npm ci
 * --omit=dev` does not install them), as are optional and dev-optional
 * entries that are absent (platform-specific binaries).
 */
export async function verifyEnvironment(
  envPath: string,
  lock: LockFile,
): Promise<EnvironmentMismatch[]> {
  const mismatches: EnvironmentMismatch[] = [];

  for (const [path, entry] of Object.entries(lock.packages)) {
    if (!path.startsWith("node_modules/")) continue;
    if (entry.dev || entry.link || !entry.version) continue;

    const actual = await installedVersion(join(envPath, path));
    if (actual === null && (entry.optional || entry.devOptional)) continue;
    if (actual !== entry.version) {
      mismatches.push({ path, expected: entry.version, actual });
    }
  }

  return mismatches.sort((a, b) => a.path.localeCompare(b.path));
}
