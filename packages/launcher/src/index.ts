export * from "./builder/index.js";
export * from "./supervisor/index.js";
export * from "./server/index.js";
export * from "./lib/errors.js";
export { ExitCode } from "./lib/constants.js";
export type * from "./types/index.js";
