#!/usr/bin/env node
/**
 * Container entrypoint. Activates the dependency environment, then hands
 * off to the arguments given, or to the pre-fork server by default.
 */

import { Supervisor, loadSupervisorOptions } from "../supervisor/supervisor.js";
import { logger } from "../lib/logger.js";

const supervisor = new Supervisor(loadSupervisorOptions());

supervisor.run(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    logger.fatal({ err }, "Entrypoint failed");
    process.exit(1);
  },
);
