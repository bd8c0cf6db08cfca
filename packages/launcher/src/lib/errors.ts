export enum ErrorCode {
  // Build errors
  MANIFEST_INVALID = "MANIFEST_INVALID",
  LOCKFILE_INVALID = "LOCKFILE_INVALID",
  LOCKFILE_MISMATCH = "LOCKFILE_MISMATCH",
  BUILD_FAILED = "BUILD_FAILED",

  // Runtime errors
  ENV_MISSING = "ENV_MISSING",
  ENV_MISMATCH = "ENV_MISMATCH",
  CONFIG_INVALID = "CONFIG_INVALID",
  APP_LOAD_FAILED = "APP_LOAD_FAILED",
}

export class ForkliftError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
  ) {
    super(message);
    this.name = "ForkliftError";
  }
}

export class BuildError extends ForkliftError {
  constructor(
    message: string,
    code: ErrorCode,
    public readonly problems: string[] = [],
  ) {
    super(message, code);
    this.name = "BuildError";
  }
}

export class EnvironmentActivationError extends ForkliftError {
  constructor(message: string, code: ErrorCode = ErrorCode.ENV_MISSING) {
    super(message, code);
    this.name = "EnvironmentActivationError";
  }
}

export class ConfigError extends ForkliftError {
  constructor(message: string) {
    super(message, ErrorCode.CONFIG_INVALID);
    this.name = "ConfigError";
  }
}

export class AppLoadError extends ForkliftError {
  constructor(
    message: string,
    public readonly target: string,
    options?: { cause?: unknown },
  ) {
    super(message, ErrorCode.APP_LOAD_FAILED);
    this.name = "AppLoadError";
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

/** Render an unknown thrown value for logs */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
