#!/usr/bin/env node
/**
 * Cleanup script: removes every image the builder produced.
 *
 * Usage: npm run docker:cleanup
 */

import { ImageBuilder } from "../builder/image-builder.js";
import { loadBuildConfig } from "../builder/build-config.js";
import { logger } from "../lib/logger.js";

async function main() {
  logger.info("Cleaning up forklift images...");

  const builder = new ImageBuilder(loadBuildConfig());
  const removed = await builder.cleanupAll();

  logger.info({ images: removed }, "Cleanup complete");
}

main().catch((err: unknown) => {
  logger.error({ err }, "Cleanup failed");
  process.exit(1);
});
