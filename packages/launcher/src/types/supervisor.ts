/** States of the container entrypoint */
export type SupervisorState =
  | "START"
  | "ACTIVATING_ENV"
  | "ENV_READY"
  | "ENV_MISSING"
  | "EXEC_SERVER"
  | "FATAL_EXIT";

/** Process environment as an immutable record */
export type EnvRecord = Readonly<Record<string, string | undefined>>;

/** A command the supervisor hands control to */
export interface HandoffCommand {
  command: string;
  args: string[];
}
