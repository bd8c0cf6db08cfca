/**
 * Image builder types: the contract between the build CLI and the
 * dockerode-backed builder.
 *
 * IMPORTANT: Nothing here may depend on Docker itself. The builder could be
 * swapped for a BuildKit or remote implementation behind IImageBuilder.
 */

/** Immutable build-time configuration, resolved once per build */
export interface BuildConfig {
  /** Base runtime image used by every stage, e.g. "node:20-bookworm-slim" */
  readonly baseImage: string;
  /** npm release installed as the dependency-management tool */
  readonly npmVersion: string;
  /** npm cache directory inside the install stage (removed before commit) */
  readonly cacheDir: string;
  /** Port the application listens on */
  readonly port: number;
  /** Where the dependency environment lives in the image */
  readonly envPath: string;
  /** Application working directory in the image */
  readonly workdir: string;
  /** Numeric owner of every copied file */
  readonly uid: number;
  readonly gid: number;
  /** Image repository name, e.g. "forklift-app" */
  readonly imageName: string;
  /** Package providing the entrypoint and the pre-fork server */
  readonly launcherPackage: string;
  /** Server tuning file, relative to workdir */
  readonly serverConfigPath: string;
  /** Application target handed to the pre-fork server, "module.js:export" */
  readonly appTarget: string;
}

/** The subset of package.json the builder cares about */
export interface PackageManifest {
  name: string;
  version?: string;
  dependencies?: Record<string, string>;
  devDependencies?: Record<string, string>;
  engines?: Record<string, string>;
  /** Build-system declaration, e.g. "npm@10.8.2" */
  packageManager?: string;
}

/** One entry of package-lock.json's `packages` map */
export interface LockEntry {
  name?: string;
  version?: string;
  resolved?: string;
  integrity?: string;
  dev?: boolean;
  optional?: boolean;
  devOptional?: boolean;
  link?: boolean;
  dependencies?: Record<string, string>;
  devDependencies?: Record<string, string>;
  /** Older packages published engines as an array */
  engines?: Record<string, string> | string[];
}

/** package-lock.json (lockfileVersion 2 or 3) */
export interface LockFile {
  name?: string;
  version?: string;
  lockfileVersion: number;
  packages: Record<string, LockEntry>;
}

/** Options for building an image */
export interface BuildImageOptions {
  /** Directory containing package.json, package-lock.json and the app source */
  sourceDir: string;
  /** Streamed build output, line by line */
  onLog?: (line: string) => void;
}

/** Result of an image build */
export interface BuildResult {
  success: boolean;
  imageName: string;
  imageTag: string;
  buildLog: string[];
  error?: string;
}

/** A package whose installed version differs from the lock file */
export interface EnvironmentMismatch {
  /** Lock key, e.g. "node_modules/fastify" */
  path: string;
  expected: string;
  /** Installed version, or null when the package is missing */
  actual: string | null;
}

/** Image info for listing/cleanup */
export interface ManagedImage {
  id: string;
  tags: string[];
  lockHash?: string;
  createdAt: Date;
}

/** The builder's public interface */
export interface IImageBuilder {
  /** Validate, assemble the context and build the runtime image */
  buildImage(options: BuildImageOptions): Promise<BuildResult>;

  /** List images produced by this builder */
  listManagedImages(): Promise<ManagedImage[]>;

  /** Remove every image produced by this builder */
  cleanupAll(): Promise<number>;
}
