/**
 * Label applied to every image the builder produces. Used for listing and
 * cleanup:
 *   docker image ls --filter label=managed-by=forklift
 */
export const MANAGED_LABEL = "managed-by";
export const MANAGED_VALUE = "forklift";
export const LOCK_HASH_LABEL = "forklift.lock-hash";

/** Default application port inside the container */
export const DEFAULT_PORT = 8632;

/** Fixed numeric owner of the application tree */
export const APP_UID = 10000;
export const APP_GID = 10001;

/** Environment variable marking an activated dependency environment */
export const ENV_MARKER = "FORKLIFT_ENV";

/** Exit codes of the arbiter and its workers */
export const ExitCode = {
  OK: 0,
  FATAL: 1,
  WORKER_BOOT_ERROR: 3,
  APP_LOAD_ERROR: 4,
  RESPAWN_LIMIT: 5,
} as const;
