import type { BuildConfig } from "../types/index.js";
import { APP_GID, APP_UID, DEFAULT_PORT } from "../lib/constants.js";
import { ConfigError } from "../lib/errors.js";

export const DEFAULT_BUILD_CONFIG: BuildConfig = Object.freeze({
  baseImage: "node:20-bookworm-slim",
  npmVersion: "10.8.2",
  cacheDir: "/tmp/npm-cache",
  port: DEFAULT_PORT,
  envPath: "/opt/deps",
  workdir: "/app",
  uid: APP_UID,
  gid: APP_GID,
  imageName: "forklift-app",
  launcherPackage: "@forklift/launcher",
  serverConfigPath: "prefork.config.json",
  appTarget: "dist/main.js:app",
});

const IMAGE_NAME_PATTERN = /^[a-z0-9]+(?:[._-][a-z0-9]+)*(?:\/[a-z0-9]+(?:[._-][a-z0-9]+)*)*$/;
const ABSOLUTE_PATH_PATTERN = /^\/[A-Za-z0-9._/-]*$/;
const VERSION_PATTERN = /^\d+\.\d+\.\d+$/;

function parseIntStrict(name: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}

/** Check the values that end up verbatim in the generated Dockerfile */
function validate(config: BuildConfig): void {
  if (!IMAGE_NAME_PATTERN.test(config.imageName)) {
    throw new ConfigError(`Invalid image name "${config.imageName}"`);
  }
  if (!VERSION_PATTERN.test(config.npmVersion)) {
    throw new ConfigError(`npm version must be exact (x.y.z), got "${config.npmVersion}"`);
  }
  for (const [key, path] of [
    ["envPath", config.envPath],
    ["workdir", config.workdir],
    ["cacheDir", config.cacheDir],
  ] as const) {
    if (!ABSOLUTE_PATH_PATTERN.test(path) || path === "/") {
      throw new ConfigError(`${key} must be an absolute path below /, got "${path}"`);
    }
  }
  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    throw new ConfigError(`port must be between 1 and 65535, got ${config.port}`);
  }
  if (/\s/.test(config.baseImage) || config.baseImage.length === 0) {
    throw new ConfigError(`Invalid base image "${config.baseImage}"`);
  }
}

/**
 * Resolve the build configuration once: defaults, then FORKLIFT_* environment
 * variables, then explicit overrides (CLI flags). The result is frozen and is
 * the only input the Dockerfile generator sees.
 */
export function loadBuildConfig(
  overrides: Partial<BuildConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): BuildConfig {
  const fromEnv: Partial<{ -readonly [K in keyof BuildConfig]: BuildConfig[K] }> = {};
  if (env.FORKLIFT_BASE_IMAGE) fromEnv.baseImage = env.FORKLIFT_BASE_IMAGE;
  if (env.FORKLIFT_NPM_VERSION) fromEnv.npmVersion = env.FORKLIFT_NPM_VERSION;
  if (env.FORKLIFT_CACHE_DIR) fromEnv.cacheDir = env.FORKLIFT_CACHE_DIR;
  if (env.FORKLIFT_PORT) fromEnv.port = parseIntStrict("FORKLIFT_PORT", env.FORKLIFT_PORT);
  if (env.FORKLIFT_IMAGE_NAME) fromEnv.imageName = env.FORKLIFT_IMAGE_NAME;
  if (env.FORKLIFT_APP_TARGET) fromEnv.appTarget = env.FORKLIFT_APP_TARGET;

  const config: BuildConfig = {
    ...DEFAULT_BUILD_CONFIG,
    ...fromEnv,
    ...overrides,
  };
  validate(config);
  return Object.freeze(config);
}
