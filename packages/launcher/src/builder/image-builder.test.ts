import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Readable } from "node:stream";
import { existsSync, readFileSync, statSync } from "node:fs";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { LockFile, PackageManifest } from "../types/index.js";

// ---------------------------------------------------------------------------
// Mock dockerode and tar-fs: define mocks at module scope for vi.mock()
// ---------------------------------------------------------------------------

function fakeBuildStream(lines: { stream?: string; error?: string }[]) {
  const data = lines.map((l: unknown) => JSON.stringify(l)).join("\n") + "\n";
  return Readable.from([Buffer.from(data)]);
}

const mockImageRemove = vi.fn().mockResolvedValue(undefined);
const mockGetImage = vi.fn().mockReturnValue({ remove: mockImageRemove });
const mockListImages = vi.fn().mockResolvedValue([]);
const mockBuildImage = vi.fn().mockImplementation(() =>
  Promise.resolve(
    fakeBuildStream([
      { stream: "Step 1/20 : FROM node:20-bookworm-slim AS toolchain\n" },
      { stream: "Successfully built abc123\n" },
    ]),
  ),
);

/** What the build context looked like when it was packed */
interface PackedContext {
  dir: string;
  dockerfile: string;
  entrypoint: string;
  entrypointMode: number;
  hasAppSource: boolean;
  hasNodeModules: boolean;
  hasGit: boolean;
  hasLock: boolean;
}
const packed: PackedContext[] = [];

vi.mock("dockerode", () => {
  const DockerMock = function (this: Record<string, unknown>) {
    this.buildImage = mockBuildImage;
    this.listImages = mockListImages;
    this.getImage = mockGetImage;
  } as unknown as { new (): unknown };
  return { default: DockerMock };
});

vi.mock("tar-fs", () => ({
  pack: vi.fn().mockImplementation((dir: string) => {
    const entrypoint = join(dir, "launch", "docker-entrypoint.sh");
    packed.push({
      dir,
      dockerfile: readFileSync(join(dir, "Dockerfile"), "utf8"),
      entrypoint: readFileSync(entrypoint, "utf8"),
      entrypointMode: statSync(entrypoint).mode & 0o777,
      hasAppSource: existsSync(join(dir, "app", "src", "main.js")),
      hasNodeModules: existsSync(join(dir, "app", "node_modules")),
      hasGit: existsSync(join(dir, "app", ".git")),
      hasLock: existsSync(join(dir, "package-lock.json")),
    });
    return Readable.from([Buffer.from("fake-tar")]);
  }),
}));

// ---------------------------------------------------------------------------
import { BuildError, ErrorCode } from "../lib/errors.js";
import { DEFAULT_BUILD_CONFIG } from "./build-config.js";
import { ImageBuilder, imageTag, lockHash, parseBuildStream } from "./image-builder.js";

// ---------------------------------------------------------------------------
// Test data
// ---------------------------------------------------------------------------

const manifest: PackageManifest = {
  name: "demo-api",
  version: "1.0.0",
  dependencies: { "@forklift/launcher": "0.1.0", fastify: "^5.1.0" },
  engines: { node: ">=20" },
  packageManager: "npm@10.8.2",
};

const lock: LockFile = {
  name: "demo-api",
  version: "1.0.0",
  lockfileVersion: 3,
  packages: {
    "": {
      name: "demo-api",
      version: "1.0.0",
      dependencies: { "@forklift/launcher": "0.1.0", fastify: "^5.1.0" },
      engines: { node: ">=20" },
    },
    "node_modules/@forklift/launcher": { version: "0.1.0" },
    "node_modules/fastify": { version: "5.1.0" },
  },
};

async function makeSourceDir(
  files: { manifest?: PackageManifest; lock?: LockFile } = {},
): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "test-source-"));
  await writeFile(join(dir, "package.json"), JSON.stringify(files.manifest ?? manifest));
  await writeFile(join(dir, "package-lock.json"), JSON.stringify(files.lock ?? lock));
  await mkdir(join(dir, "src"));
  await writeFile(join(dir, "src", "main.js"), "export const app = null;\n");
  await mkdir(join(dir, "node_modules", "fastify"), { recursive: true });
  await mkdir(join(dir, ".git"));
  return dir;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

let builder: ImageBuilder;
let sourceDir: string;

beforeEach(async () => {
  vi.clearAllMocks();
  packed.length = 0;
  builder = new ImageBuilder(DEFAULT_BUILD_CONFIG);
  sourceDir = await makeSourceDir();
});

afterEach(async () => {
  await rm(sourceDir, { recursive: true, force: true });
});

// ===========================================================================
// buildImage
// ===========================================================================
describe("buildImage", () => {
  it("builds and tags an image from a consistent source directory", async () => {
    const result = await builder.buildImage({ sourceDir });
    const { tag } = imageTag(DEFAULT_BUILD_CONFIG, manifest, lock);

    expect(result.success).toBe(true);
    expect(result.imageName).toBe("forklift-app");
    expect(result.imageTag).toBe(tag);
    expect(result.imageTag).toMatch(/^[0-9a-f]{12}$/);
    expect(result.buildLog).toEqual([
      "Step 1/20 : FROM node:20-bookworm-slim AS toolchain",
      "Successfully built abc123",
    ]);
    expect(result.error).toBeUndefined();

    expect(mockBuildImage).toHaveBeenCalledOnce();
    const [, opts] = mockBuildImage.mock.calls[0];
    expect(opts.t).toBe(`forklift-app:${tag}`);
    expect(opts.labels).toEqual({
      "managed-by": "forklift",
      "forklift.lock-hash": lockHash(lock),
    });
    expect(mockGetImage).not.toHaveBeenCalled();
  });

  it("lays out the build context without node_modules or .git", async () => {
    await builder.buildImage({ sourceDir });

    expect(packed).toHaveLength(1);
    const [ctx] = packed;
    expect(ctx.hasAppSource).toBe(true);
    expect(ctx.hasLock).toBe(true);
    expect(ctx.hasNodeModules).toBe(false);
    expect(ctx.hasGit).toBe(false);
    expect(ctx.entrypointMode).toBe(0o755);
    expect(ctx.entrypoint).toContain(
      'exec node /opt/deps/node_modules/@forklift/launcher/dist/scripts/entrypoint.js "$@"',
    );
    expect(ctx.dockerfile).toContain(`LABEL forklift.lock-hash=${lockHash(lock)}`);
  });

  it("removes the temporary build context afterwards", async () => {
    await builder.buildImage({ sourceDir });

    expect(packed).toHaveLength(1);
    expect(existsSync(packed[0].dir)).toBe(false);
  });

  it("streams build output to onLog", async () => {
    const onLog = vi.fn();
    await builder.buildImage({ sourceDir, onLog });

    expect(onLog).toHaveBeenCalledTimes(2);
    expect(onLog).toHaveBeenLastCalledWith("Successfully built abc123");
  });

  it("reports a failed build and removes the tagged image", async () => {
    mockBuildImage.mockImplementationOnce(() =>
      Promise.resolve(
        fakeBuildStream([
          { stream: "Step 5/20 : RUN /opt/toolchain/bin/npm ci --omit=dev\n" },
          { error: "The command '/bin/sh -c npm ci' returned a non-zero code: 1" },
        ]),
      ),
    );

    const result = await builder.buildImage({ sourceDir });
    const { full } = imageTag(DEFAULT_BUILD_CONFIG, manifest, lock);

    expect(result.success).toBe(false);
    expect(result.error).toBe("The command '/bin/sh -c npm ci' returned a non-zero code: 1");
    expect(result.buildLog).toContain(
      "ERROR: The command '/bin/sh -c npm ci' returned a non-zero code: 1",
    );
    expect(mockGetImage).toHaveBeenCalledWith(full);
    expect(mockImageRemove).toHaveBeenCalledWith({ force: true });
  });

  it("treats a missing partial image as already removed", async () => {
    mockBuildImage.mockImplementationOnce(() =>
      Promise.resolve(fakeBuildStream([{ error: "build failed" }])),
    );
    mockImageRemove.mockRejectedValueOnce(
      Object.assign(new Error("no such image"), { statusCode: 404 }),
    );

    const result = await builder.buildImage({ sourceDir });

    expect(result.success).toBe(false);
    expect(result.error).toBe("build failed");
  });

  it("rejects an inconsistent lock file without contacting Docker", async () => {
    const stale = await makeSourceDir({
      manifest: { ...manifest, dependencies: { ...manifest.dependencies, pino: "^9.5.0" } },
    });

    try {
      const err = await builder.buildImage({ sourceDir: stale }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(BuildError);
      expect(err).toMatchObject({
        code: ErrorCode.LOCKFILE_MISMATCH,
        problems: [
          'dependencies.pino: "^9.5.0" is in package.json but not in the lock file',
          "pino is not resolved in the lock file",
        ],
      });
      expect(mockBuildImage).not.toHaveBeenCalled();
      expect(packed).toHaveLength(0);
    } finally {
      await rm(stale, { recursive: true, force: true });
    }
  });

  it("rejects a source directory without a lock file", async () => {
    await rm(join(sourceDir, "package-lock.json"));

    await expect(builder.buildImage({ sourceDir })).rejects.toMatchObject({
      code: ErrorCode.LOCKFILE_INVALID,
    });
    expect(mockBuildImage).not.toHaveBeenCalled();
  });
});

// ===========================================================================
// imageTag
// ===========================================================================
describe("imageTag", () => {
  it("is stable for the same inputs", () => {
    expect(imageTag(DEFAULT_BUILD_CONFIG, manifest, lock)).toEqual(
      imageTag(DEFAULT_BUILD_CONFIG, manifest, lock),
    );
  });

  it("changes when a locked version changes", () => {
    const bumped: LockFile = {
      ...lock,
      packages: { ...lock.packages, "node_modules/fastify": { version: "5.1.1" } },
    };
    expect(imageTag(DEFAULT_BUILD_CONFIG, manifest, bumped).tag).not.toBe(
      imageTag(DEFAULT_BUILD_CONFIG, manifest, lock).tag,
    );
  });

  it("changes when the build configuration changes", () => {
    const other = { ...DEFAULT_BUILD_CONFIG, npmVersion: "10.9.0" };
    expect(imageTag(other, manifest, lock).tag).not.toBe(
      imageTag(DEFAULT_BUILD_CONFIG, manifest, lock).tag,
    );
  });
});

// ===========================================================================
// parseBuildStream
// ===========================================================================
describe("parseBuildStream", () => {
  it("reassembles JSON lines split across chunks", async () => {
    const stream = Readable.from([
      Buffer.from('{"stream":"Step 1/2 : FR'),
      Buffer.from('OM node:20\\n"}\n{"stream":"done\\n"}'),
    ]);

    const { log, error } = await parseBuildStream(stream);

    expect(log).toEqual(["Step 1/2 : FROM node:20", "done"]);
    expect(error).toBeUndefined();
  });

  it("prefers errorDetail.message over error", async () => {
    const stream = Readable.from([
      Buffer.from(
        JSON.stringify({ error: "short", errorDetail: { message: "detailed failure" } }) + "\n",
      ),
    ]);

    const { log, error } = await parseBuildStream(stream);

    expect(error).toBe("detailed failure");
    expect(log).toEqual(["ERROR: detailed failure"]);
  });

  it("keeps non-JSON lines verbatim", async () => {
    const stream = Readable.from([Buffer.from("plain text\n")]);

    const { log } = await parseBuildStream(stream);

    expect(log).toEqual(["plain text"]);
  });
});

// ===========================================================================
// listManagedImages / cleanupAll
// ===========================================================================
describe("listManagedImages", () => {
  it("filters by the managed label and maps image info", async () => {
    mockListImages.mockResolvedValueOnce([
      {
        Id: "sha256:aaa",
        RepoTags: ["forklift-app:0123456789ab"],
        Labels: { "managed-by": "forklift", "forklift.lock-hash": "feedfacecafe" },
        Created: 1735689600,
      },
      { Id: "sha256:bbb", RepoTags: null, Labels: null, Created: 0 },
    ]);

    const images = await builder.listManagedImages();

    expect(mockListImages).toHaveBeenCalledWith({
      filters: { label: ["managed-by=forklift"] },
    });
    expect(images).toEqual([
      {
        id: "sha256:aaa",
        tags: ["forklift-app:0123456789ab"],
        lockHash: "feedfacecafe",
        createdAt: new Date("2025-01-01T00:00:00.000Z"),
      },
      { id: "sha256:bbb", tags: [], lockHash: undefined, createdAt: new Date(0) },
    ]);
  });
});

describe("cleanupAll", () => {
  it("removes every managed image and returns the count", async () => {
    mockListImages.mockResolvedValueOnce([
      { Id: "sha256:aaa", RepoTags: [], Labels: {}, Created: 0 },
      { Id: "sha256:bbb", RepoTags: [], Labels: {}, Created: 0 },
    ]);

    const removed = await builder.cleanupAll();

    expect(removed).toBe(2);
    expect(mockGetImage).toHaveBeenCalledWith("sha256:aaa");
    expect(mockGetImage).toHaveBeenCalledWith("sha256:bbb");
    expect(mockImageRemove).toHaveBeenCalledTimes(2);
  });
});
