/**
 * Builder Module
 *
 * Turns a manifest + lock file + application source into a minimal runtime
 * image. Communicates with Docker via dockerode.
 *
 * IMPORTANT: This module must NOT import from the supervisor or the
 * pre-fork server. The image it produces starts the supervisor; the
 * builder itself never runs it.
 */

export { ImageBuilder, imageTag, lockHash, parseBuildStream } from "./image-builder.js";
export { loadBuildConfig, DEFAULT_BUILD_CONFIG } from "./build-config.js";
export { generateDockerfile, generateEntrypointScript } from "./dockerfile.js";
export { checkLockConsistency, readLockFile, readManifest } from "./lockfile.js";
export { verifyEnvironment } from "./verify-environment.js";
