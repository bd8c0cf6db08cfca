export type * from "./build.js";
export type * from "./pool.js";
export type * from "./supervisor.js";
