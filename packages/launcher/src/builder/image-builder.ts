/**
 * Docker-based image builder.
 *
 * Turns an application directory (package.json, package-lock.json and the
 * source) into a runtime image using dockerode. The build either produces a
 * tagged image or fails with no image carrying the tag.
 */

import Docker from "dockerode";
import { createHash } from "node:crypto";
import { chmod, cp, mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import * as tar from "tar-fs";
import type {
  BuildConfig,
  BuildImageOptions,
  BuildResult,
  IImageBuilder,
  LockFile,
  ManagedImage,
  PackageManifest,
} from "../types/index.js";
import { LOCK_HASH_LABEL, MANAGED_LABEL, MANAGED_VALUE } from "../lib/constants.js";
import { BuildError, ErrorCode } from "../lib/errors.js";
import { logger as rootLogger, type Logger } from "../lib/logger.js";
import {
  CONTEXT_APP_DIR,
  CONTEXT_LAUNCH_DIR,
  ENTRYPOINT_SCRIPT,
  generateDockerfile,
  generateEntrypointScript,
} from "./dockerfile.js";
import {
  LOCK_FILE,
  MANIFEST_FILE,
  checkLockConsistency,
  readLockFile,
  readManifest,
} from "./lockfile.js";

/** Entries never copied into the build context */
const CONTEXT_EXCLUDES = new Set(["node_modules", ".git"]);

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function sha256(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

/** Short hash of the lock file contents, stored as an image label */
export function lockHash(lock: LockFile): string {
  return sha256(JSON.stringify(lock)).slice(0, 12);
}

/**
 * Deterministic image tag: any change to the lock file, the manifest version
 * or the build configuration yields a new tag.
 */
export function imageTag(
  config: BuildConfig,
  manifest: PackageManifest,
  lock: LockFile,
): { name: string; tag: string; full: string } {
  const tag = sha256(
    JSON.stringify({
      lock: lockHash(lock),
      version: manifest.version ?? null,
      config,
    }),
  ).slice(0, 12);
  return { name: config.imageName, tag, full: `${config.imageName}:${tag}` };
}

/**
 * Parse a Docker build output stream. Each chunk holds newline-separated
 * JSON objects with a `stream` or `error` field (or both).
 */
export function parseBuildStream(
  stream: NodeJS.ReadableStream,
  onLog?: (line: string) => void,
): Promise<{ log: string[]; error?: string }> {
  return new Promise((resolve, reject) => {
    const log: string[] = [];
    let error: string | undefined;
    let pending = "";

    const emit = (line: string) => {
      log.push(line);
      onLog?.(line);
    };

    const handle = (raw: string) => {
      if (!raw.trim()) return;
      let obj: { stream?: string; error?: string; errorDetail?: { message?: string } };
      try {
        obj = JSON.parse(raw);
      } catch {
        // Non-JSON line, keep as-is
        emit(raw.trim());
        return;
      }
      const text = obj.stream?.trimEnd();
      if (text) emit(text);
      const message = obj.errorDetail?.message ?? obj.error;
      if (message) {
        error = message;
        emit(`ERROR: ${message}`);
      }
    };

    stream.on("data", (chunk: Buffer | string) => {
      const lines = (pending + chunk.toString()).split("\n");
      pending = lines.pop() ?? "";
      lines.forEach(handle);
    });

    stream.on("end", () => {
      handle(pending);
      resolve({ log, error });
    });
    stream.on("error", (err: Error) => reject(err));
  });
}

function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "statusCode" in err &&
    err.statusCode === 404
  );
}

// ---------------------------------------------------------------------------
// ImageBuilder
// ---------------------------------------------------------------------------

export class ImageBuilder implements IImageBuilder {
  private docker: Docker;
  private log: Logger;

  constructor(
    private readonly config: BuildConfig,
    options?: { socketPath?: string; logger?: Logger },
  ) {
    this.docker = new Docker({
      socketPath: options?.socketPath || "/var/run/docker.sock",
    });
    this.log = (options?.logger ?? rootLogger).child({ role: "builder" });
  }

  /**
   * Read and cross-check package.json and package-lock.json. Throws a
   * BuildError listing every problem; Docker is never contacted when this
   * fails.
   */
  async validate(sourceDir: string): Promise<{ manifest: PackageManifest; lock: LockFile }> {
    const [manifest, lock] = await Promise.all([
      readManifest(sourceDir),
      readLockFile(sourceDir),
    ]);
    const problems = checkLockConsistency(manifest, lock, this.config);
    if (problems.length > 0) {
      throw new BuildError(
        `${LOCK_FILE} is inconsistent with ${MANIFEST_FILE}`,
        ErrorCode.LOCKFILE_MISMATCH,
        problems,
      );
    }
    return { manifest, lock };
  }

  /** Lay out the build context: Dockerfile, manifest, lock, app/, launch/ */
  async prepareContext(
    sourceDir: string,
    contextDir: string,
    lock: LockFile,
  ): Promise<void> {
    await cp(sourceDir, join(contextDir, CONTEXT_APP_DIR), {
      recursive: true,
      filter: (src) => !CONTEXT_EXCLUDES.has(basename(src)),
    });
    await cp(join(sourceDir, MANIFEST_FILE), join(contextDir, MANIFEST_FILE));
    await cp(join(sourceDir, LOCK_FILE), join(contextDir, LOCK_FILE));

    const launchDir = join(contextDir, CONTEXT_LAUNCH_DIR);
    await mkdir(launchDir, { recursive: true });
    const script = join(launchDir, ENTRYPOINT_SCRIPT);
    await writeFile(script, generateEntrypointScript(this.config));
    // COPY keeps the mode; the umask must not strip the exec bit
    await chmod(script, 0o755);

    await writeFile(join(contextDir, "Dockerfile"), generateDockerfile(this.config, lockHash(lock)));
  }

  async buildImage(options: BuildImageOptions): Promise<BuildResult> {
    const { sourceDir, onLog } = options;
    const { manifest, lock } = await this.validate(sourceDir);
    const { name, tag, full } = imageTag(this.config, manifest, lock);
    let contextDir: string | undefined;

    try {
      contextDir = await mkdtemp(join(tmpdir(), "forklift-build-"));
      await this.prepareContext(sourceDir, contextDir, lock);

      this.log.info({ image: full }, "Building image");
      const stream = await this.docker.buildImage(tar.pack(contextDir), {
        t: full,
        labels: {
          [MANAGED_LABEL]: MANAGED_VALUE,
          [LOCK_HASH_LABEL]: lockHash(lock),
        },
        rm: true,
        forcerm: true,
      });

      const { log, error } = await parseBuildStream(stream, onLog);

      if (error) {
        this.log.error({ image: full, error }, "Image build failed");
        await this.discardImage(full);
      } else {
        this.log.info({ image: full }, "Image built");
      }

      return {
        success: !error,
        imageName: name,
        imageTag: tag,
        buildLog: log,
        error,
      };
    } finally {
      if (contextDir) {
        await rm(contextDir, { recursive: true, force: true });
      }
    }
  }

  /** Remove an image by reference, if it exists */
  private async discardImage(reference: string): Promise<void> {
    try {
      await this.docker.getImage(reference).remove({ force: true });
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
  }

  async listManagedImages(): Promise<ManagedImage[]> {
    const images = await this.docker.listImages({
      filters: { label: [`${MANAGED_LABEL}=${MANAGED_VALUE}`] },
    });
    return images.map((img) => ({
      id: img.Id,
      tags: img.RepoTags ?? [],
      lockHash: img.Labels?.[LOCK_HASH_LABEL],
      createdAt: new Date(img.Created * 1000),
    }));
  }

  async cleanupAll(): Promise<number> {
    const images = await this.listManagedImages();
    for (const img of images) {
      await this.discardImage(img.id);
    }
    return images.length;
  }
}
