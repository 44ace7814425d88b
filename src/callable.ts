/**
 * Callables: a compiled function together with the bindings it runs against.
 */

import { CodeObject, compileFunction } from "./code/compile";
import { ContractViolation } from "./errors";

/**
 * An enclosing module scope, shared by reference.
 */
export type Namespace = Readonly<Record<string, unknown>>;

export interface Callable {
  readonly code: CodeObject;
  /** The enclosing module scope. Never copied. */
  readonly globals: Namespace;
  /** Captured values, one per `code.freeNames` entry and in the same order. */
  readonly closure: readonly unknown[];
  /** Present for bound methods. */
  readonly bound?: { readonly receiver: unknown };
}

export interface DescribeOptions {
  /** Module-level bindings the function can see. Defaults to an empty scope. */
  globals?: Namespace;
  /** Values the function captures from enclosing function scopes. */
  enclosing?: Readonly<Record<string, unknown>>;
  fileName?: string;
  firstLine?: number;
}

const emptyNamespace: Namespace = Object.freeze({});

/**
 * Describe a live function or class.
 *
 * JavaScript does not expose a function's closure, so names it captures from
 * enclosing function scopes are supplied through `options.enclosing`; every
 * other free name resolves through `options.globals`.
 *
 * @throws ContractViolation if `fn` has no retrievable source (native and
 * bound functions)
 */
export function describeCallable(fn: unknown, options: DescribeOptions = {}): Callable {
  const code = compileCallable(fn, options);
  const enclosing = options.enclosing ?? {};
  return {
    code,
    globals: options.globals ?? emptyNamespace,
    closure: code.freeNames.map((name) => enclosing[name]),
  };
}

/**
 * Describe `receiver[key]` as a method bound to `receiver`.
 */
export function describeMethod(receiver: object, key: string, options: DescribeOptions = {}): Callable {
  const method: unknown = Reflect.get(receiver, key);
  if (typeof method !== "function") {
    throw new ContractViolation(`Property "${key}" is not a method`, key);
  }
  return { ...describeCallable(method, options), bound: { receiver } };
}

function compileCallable(fn: unknown, options: DescribeOptions): CodeObject {
  if (typeof fn !== "function") {
    throw new ContractViolation(`Expected a function, got ${fn === null ? "null" : typeof fn}`);
  }
  const source = Function.prototype.toString.call(fn);
  if (/\{\s*\[native code\]\s*\}\s*$/.test(source)) {
    throw new ContractViolation(`Function ${fn.name || "<anonymous>"} has no source to compile`, fn.name);
  }
  return compileFunction(source, {
    name: fn.name,
    fileName: options.fileName,
    firstLine: options.firstLine,
    enclosingNames: Object.keys(options.enclosing ?? {}),
  });
}
