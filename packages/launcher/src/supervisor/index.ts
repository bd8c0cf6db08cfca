export { activateEnvironment, HIDDEN_LOCK } from "./activate.js";
export { processLauncher, signalExitCode, FORWARDED_SIGNALS, type Launcher } from "./handoff.js";
export {
  Supervisor,
  defaultServerCommand,
  loadSupervisorOptions,
  type SupervisorOptions,
} from "./supervisor.js";
