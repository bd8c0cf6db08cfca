/**
 * Dockerfile and launch-script generation.
 *
 * Three stages:
 * - toolchain: pinned npm + tini, nothing else is consumed downstream
 * - install:   `npm ci` from the lock file into the dependency environment
 * - runtime:   fresh base image with the environment, the app and the
 *              launch script, owned by the fixed numeric uid/gid
 *
 * Every value comes from the frozen BuildConfig; no ARG/ENV is threaded
 * between stages.
 */

import type { BuildConfig } from "../types/index.js";
import { LOCK_HASH_LABEL, MANAGED_LABEL, MANAGED_VALUE } from "../lib/constants.js";
import { LOCK_FILE, MANIFEST_FILE } from "./lockfile.js";

export const TOOLCHAIN_DIR = "/opt/toolchain";
export const LAUNCH_DIR = "/opt/launch";
export const ENTRYPOINT_SCRIPT = "docker-entrypoint.sh";

/** Build context layout */
export const CONTEXT_APP_DIR = "app";
export const CONTEXT_LAUNCH_DIR = "launch";

function banner(title: string): string[] {
  const rule = "#".repeat(79);
  return [rule, `# ${title}`, rule];
}

/** Path of the launcher's compiled entrypoint inside the environment */
export function entrypointModulePath(config: BuildConfig): string {
  return `${config.envPath}/node_modules/${config.launcherPackage}/dist/scripts/entrypoint.js`;
}

export function generateDockerfile(config: BuildConfig, lockHash: string): string {
  const owner = `${config.uid}:${config.gid}`;
  const npm = `${TOOLCHAIN_DIR}/bin/npm`;

  const lines: string[] = [
    ...banner("TOOLCHAIN - dependency-management tool and process launcher"),
    `FROM ${config.baseImage} AS toolchain`,
    "RUN apt-get update \\",
    "  && apt-get install -y --no-install-recommends tini \\",
    "  && rm -rf /var/lib/apt/lists/*",
    `RUN npm install --global --prefix ${TOOLCHAIN_DIR} npm@${config.npmVersion} \\`,
    "  && npm cache clean --force",
    "",
    ...banner("INSTALL - resolve the lock file into the dependency environment"),
    `FROM ${config.baseImage} AS install`,
    `COPY --from=toolchain ${TOOLCHAIN_DIR} ${TOOLCHAIN_DIR}`,
    `WORKDIR ${config.envPath}`,
    `COPY ${MANIFEST_FILE} ${LOCK_FILE} ./`,
    `RUN ${npm} ci --omit=dev --no-audit --no-fund --cache ${config.cacheDir} \\`,
    `  && rm -rf ${config.cacheDir}`,
    "",
    ...banner("RUNTIME - dependency environment, application and launch scripts only"),
    `FROM ${config.baseImage} AS runtime`,
    "",
    `LABEL ${MANAGED_LABEL}=${MANAGED_VALUE}`,
    `LABEL ${LOCK_HASH_LABEL}=${lockHash}`,
    "",
    "ENV NODE_ENV=production",
    `ENV FORKLIFT_ENV_PATH=${config.envPath}`,
    `ENV FORKLIFT_SERVER_CONFIG=${config.serverConfigPath}`,
    `ENV FORKLIFT_APP_TARGET=${config.appTarget}`,
    `ENV PORT=${config.port}`,
    "",
    "COPY --from=toolchain /usr/bin/tini /usr/bin/tini",
    `COPY --from=install --chown=${owner} ${config.envPath} ${config.envPath}`,
    `COPY --chown=${owner} ${CONTEXT_LAUNCH_DIR}/ ${LAUNCH_DIR}/`,
    "",
    // the base image's package managers stay out of the runtime
    "RUN rm -rf /usr/local/lib/node_modules/npm /usr/local/lib/node_modules/corepack \\",
    "  && rm -f /usr/local/bin/npm /usr/local/bin/npx /usr/local/bin/corepack \\",
    "  /usr/local/bin/yarn /usr/local/bin/yarnpkg /usr/local/bin/pnpm /usr/local/bin/pnpx",
    "",
    `WORKDIR ${config.workdir}`,
    `COPY --chown=${owner} ${CONTEXT_APP_DIR}/ ${config.workdir}/`,
    // ESM resolution walks up from the importing file and ignores NODE_PATH
    `RUN ln -s ${config.envPath}/node_modules ${config.workdir}/node_modules \\`,
    `  && chown -h ${owner} ${config.workdir}/node_modules`,
    "",
    `USER ${owner}`,
    `EXPOSE ${config.port}`,
    "",
    "HEALTHCHECK --interval=10s --timeout=3s --start-period=10s --retries=3 \\",
    `  CMD node -e "fetch('http://127.0.0.1:${config.port}/').then((r) => process.exit(r.ok ? 0 : 1), () => process.exit(1))"`,
    "",
    `ENTRYPOINT ["/usr/bin/tini", "--", "${LAUNCH_DIR}/${ENTRYPOINT_SCRIPT}"]`,
    "",
  ];

  return lines.join("\n");
}

/**
 * The shell entrypoint baked into the image. It only locates the launcher
 * inside the dependency environment; activation happens in the launcher.
 */
export function generateEntrypointScript(config: BuildConfig): string {
  return [
    "#!/bin/sh",
    "",
    "set -e",
    "",
    `exec node ${entrypointModulePath(config)} "$@"`,
    "",
  ].join("\n");
}
