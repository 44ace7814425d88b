#!/usr/bin/env node
/**
 * callable-refs: print the references, fingerprint or instruction stream of
 * a function exported by a CommonJS module.
 *
 * Usage:
 *   callable-refs <module> <export> [options]
 *   callable-refs --help
 */

import { createRequire } from "module";
import * as path from "path";
import { Callable, Namespace, describeCallable, describeMethod } from "./callable";
import { CliOptions, parseArgs, printHelp } from "./cli-args";
import { disassemble } from "./code/instruction";
import { consoleSink } from "./diagnostics";
import { CodeCompileError, ContractViolation } from "./errors";
import { CodeFingerprinter } from "./fingerprint/fingerprinter";
import { createNodeResolver } from "./modules";
import { renderReferences, renderReferencesJson } from "./report";
import { getReferencedObjects } from "./walker";

function formatError(error: unknown, filePath: string): string {
  if (error instanceof ContractViolation) {
    return `${filePath}: Cannot describe callable: ${error.message}`;
  }

  if (error instanceof CodeCompileError) {
    return `${filePath}: Compile error at ${error.from}-${error.to}: ${error.message}`;
  }

  if (error instanceof Error) {
    return `${filePath}: ${error.message}`;
  }

  return `${filePath}: Unknown error: ${String(error)}`;
}

function isNamespace(value: unknown): value is Namespace {
  return (typeof value === "object" || typeof value === "function") && value !== null;
}

// The exports object itself, so later writes to it are seen
function loadModule(modulePath: string): Namespace {
  const load = createRequire(path.join(process.cwd(), "index.js"));
  const loaded: unknown = load(modulePath);
  if (!isNamespace(loaded)) {
    throw new Error(`Module did not export an object`);
  }
  return loaded;
}

function describeTarget(exports: Namespace, options: CliOptions, fileName: string): Callable {
  if (!Object.hasOwn(exports, options.exportName)) {
    throw new Error(`Module has no export named "${options.exportName}"`);
  }
  const target = exports[options.exportName];
  if (options.method === null) {
    return describeCallable(target, { globals: exports, fileName });
  }
  if ((typeof target !== "object" && typeof target !== "function") || target === null) {
    throw new Error(`Export "${options.exportName}" has no methods`);
  }
  return describeMethod(target, options.method, { globals: exports, fileName });
}

function main(): void {
  const parsed = parseArgs(process.argv.slice(2));

  if (parsed.kind === "help") {
    printHelp();
    return;
  }
  if (parsed.kind === "error") {
    console.error(`Error: ${parsed.message}`);
    printHelp();
    process.exit(1);
  }

  const options = parsed.options;
  const modulePath = path.resolve(options.modulePath);

  let output: string;
  try {
    const callable = describeTarget(loadModule(modulePath), options, modulePath);
    const walkOptions = { sink: consoleSink, resolveModule: createNodeResolver(modulePath) };

    if (options.mode === "disassemble") {
      output = disassemble(callable.code.instructions);
    } else if (options.mode === "fingerprint") {
      output = new CodeFingerprinter(walkOptions).fingerprint(callable);
    } else {
      const references = getReferencedObjects(callable, walkOptions);
      output = options.json
        ? renderReferencesJson(references)
        : renderReferences(references, { color: process.stdout.isTTY });
    }
  } catch (err) {
    console.error(formatError(err, options.modulePath));
    process.exit(1);
  }

  process.stdout.write(output + "\n");
}

main();
