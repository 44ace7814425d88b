/**
 * Synchronous module resolution for import instructions.
 */

import { createRequire } from "module";
import * as path from "path";
import { ImportFailure } from "./errors";

/**
 * Loads a module by specifier, or throws.
 */
export type ModuleResolver = (specifier: string) => unknown;

// Module objects the resolvers handed out, so they can be hashed by name
// rather than by content.
const moduleNames = new WeakMap<object, string>();

export function registerModule(module: unknown, specifier: string): void {
  if ((typeof module === "object" || typeof module === "function") && module !== null && !moduleNames.has(module)) {
    moduleNames.set(module, specifier);
  }
}

export function moduleNameOf(value: unknown): string | undefined {
  if ((typeof value === "object" || typeof value === "function") && value !== null) {
    return moduleNames.get(value);
  }
  return undefined;
}

/**
 * Resolve modules the way `require` would from `fromFile`.
 *
 * `fromFile` defaults to a file in the working directory.
 */
export function createNodeResolver(fromFile?: string): ModuleResolver {
  const base = fromFile && path.isAbsolute(fromFile) ? fromFile : path.join(process.cwd(), "index.js");
  const load = createRequire(base);
  return (specifier) => {
    let module: unknown;
    try {
      module = load(specifier);
    } catch (error) {
      throw new ImportFailure(specifier, error);
    }
    registerModule(module, specifier);
    return module;
  };
}

/**
 * Resolve from a fixed table, e.g. in tests.
 */
export function createTableResolver(modules: Readonly<Record<string, unknown>>): ModuleResolver {
  return (specifier) => {
    if (!Object.hasOwn(modules, specifier)) throw new ImportFailure(specifier);
    const module = modules[specifier];
    registerModule(module, specifier);
    return module;
  };
}
