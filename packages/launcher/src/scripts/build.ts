#!/usr/bin/env node
/**
 * Build the runtime image for an application directory.
 *
 * Usage: forklift-build [dir] [--name forklift-app] [--port 8632] [--npm 10.8.2] [--base node:20-bookworm-slim]
 */

import { resolve } from "node:path";
import { parseArgs } from "node:util";
import type { BuildConfig } from "../types/index.js";
import { ImageBuilder } from "../builder/image-builder.js";
import { loadBuildConfig } from "../builder/build-config.js";
import { BuildError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      name: { type: "string" },
      port: { type: "string" },
      npm: { type: "string" },
      base: { type: "string" },
      target: { type: "string" },
    },
  });

  const overrides: { -readonly [K in keyof BuildConfig]?: BuildConfig[K] } = {};
  if (values.name) overrides.imageName = values.name;
  if (values.port) overrides.port = Number.parseInt(values.port, 10);
  if (values.npm) overrides.npmVersion = values.npm;
  if (values.base) overrides.baseImage = values.base;
  if (values.target) overrides.appTarget = values.target;

  const config = loadBuildConfig(overrides);
  const builder = new ImageBuilder(config);
  const sourceDir = resolve(positionals[0] ?? ".");

  const result = await builder.buildImage({
    sourceDir,
    onLog: (line) => process.stdout.write(`${line}\n`),
  });

  if (!result.success) {
    logger.error({ error: result.error }, "Build failed, no image was produced");
    return 1;
  }
  logger.info({ image: `${result.imageName}:${result.imageTag}` }, "Build complete");
  return 0;
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    if (err instanceof BuildError) {
      logger.error({ code: err.code, problems: err.problems }, err.message);
    } else {
      logger.error({ err }, "Build failed");
    }
    process.exit(1);
  },
);
