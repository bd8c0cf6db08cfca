/**
 * Application loading for the pre-fork server.
 *
 * A target is "path/to/module.js[:export]" (export defaults to "app"),
 * resolved against the working directory. The export is either a server
 * (anything with listen/close, e.g. a Fastify instance) or a factory
 * returning one. A module may also export `preload()`, whose JSON-safe
 * result becomes the read-only snapshot every worker receives.
 */

import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { AppLoadError, errorMessage } from "../lib/errors.js";
import { deepFreeze } from "../lib/freeze.js";

/** What a worker needs from the application server */
export interface ServerApp {
  listen(options: { port: number; host: string }): Promise<string>;
  close(): Promise<unknown>;
}

export interface AppContext {
  /** Read-only state produced by the module's preload() */
  snapshot: unknown;
  workerId: number;
}

export type AppFactory = (context: AppContext) => ServerApp | Promise<ServerApp>;

export interface LoadedModule {
  target: string;
  exported: unknown;
  preload?: () => unknown;
}

export type Importer = (specifier: string) => Promise<unknown>;

export type ModuleLoader = (target: string) => Promise<LoadedModule>;

const defaultImporter: Importer = (specifier) => import(specifier);

export function parseTarget(target: string): { modulePath: string; exportName: string } {
  const colon = target.lastIndexOf(":");
  const modulePath = colon >= 0 ? target.slice(0, colon) : target;
  const exportName = colon >= 0 ? target.slice(colon + 1) : "app";

  if (!modulePath || !exportName) {
    throw new AppLoadError(`Invalid application target "${target}"`, target);
  }
  return { modulePath, exportName };
}

export function isServerApp(value: unknown): value is ServerApp {
  return (
    typeof value === "object" &&
    value !== null &&
    "listen" in value &&
    typeof value.listen === "function" &&
    "close" in value &&
    typeof value.close === "function"
  );
}

export function createModuleLoader(
  options: { cwd?: string; importer?: Importer } = {},
): ModuleLoader {
  const cwd = options.cwd ?? process.cwd();
  const importer = options.importer ?? defaultImporter;

  return async (target) => {
    const { modulePath, exportName } = parseTarget(target);
    const href = pathToFileURL(resolve(cwd, modulePath)).href;

    let mod: unknown;
    try {
      mod = await importer(href);
    } catch (err) {
      throw new AppLoadError(`Failed to import ${modulePath}: ${errorMessage(err)}`, target, {
        cause: err,
      });
    }

    if (typeof mod !== "object" || mod === null || !(exportName in mod)) {
      throw new AppLoadError(`Module ${modulePath} has no export "${exportName}"`, target);
    }

    const exported: unknown = Reflect.get(mod, exportName);
    const preload: unknown = Reflect.get(mod, "preload");
    return {
      target,
      exported,
      preload: typeof preload === "function" ? () => preload() : undefined,
    };
  };
}

/**
 * Run the module's preload() and turn the result into an immutable,
 * by-value snapshot. Values that cannot cross the IPC channel as JSON are
 * dropped the same way JSON.stringify drops them.
 */
export async function computeSnapshot(mod: LoadedModule): Promise<unknown> {
  if (!mod.preload) return null;
  let value: unknown;
  try {
    value = await mod.preload();
  } catch (err) {
    throw new AppLoadError(`preload() failed: ${errorMessage(err)}`, mod.target, { cause: err });
  }
  const json: string | undefined = JSON.stringify(value ?? null);
  return deepFreeze(json === undefined ? null : JSON.parse(json));
}

/** Obtain the server instance for one worker */
export async function resolveServer(mod: LoadedModule, context: AppContext): Promise<ServerApp> {
  if (isServerApp(mod.exported)) return mod.exported;

  if (typeof mod.exported === "function") {
    let created: unknown;
    try {
      created = await mod.exported(context);
    } catch (err) {
      throw new AppLoadError(`Application factory failed: ${errorMessage(err)}`, mod.target, {
        cause: err,
      });
    }
    if (isServerApp(created)) return created;
  }

  throw new AppLoadError(
    `${mod.target} is neither a server nor a factory returning one`,
    mod.target,
  );
}
