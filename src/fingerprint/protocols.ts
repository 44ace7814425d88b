/**
 * Tokenize protocols: how each kind of referenced value turns into hash input.
 */

import { moduleNameOf } from "../modules";
import { constructorName, describeValue } from "../util/values";

export interface TokenizeContext {
  /** Tokenize a nested value. */
  tokenize(value: unknown): string;
  /** Fingerprint a function or class in the current module scope. */
  fingerprintFunction(fn: Function): string;
}

export interface TokenizeProtocol {
  readonly name: string;
  supports(value: unknown): boolean;
  tokenize(value: unknown, context: TokenizeContext): string;
}

/**
 * Define a protocol for the values `guard` accepts.
 */
export function defineProtocol<T>(
  name: string,
  guard: (value: unknown) => value is T,
  tokenize: (value: T, context: TokenizeContext) => string
): TokenizeProtocol {
  return {
    name,
    supports: guard,
    tokenize(value, context) {
      if (!guard(value)) {
        throw new TypeError(`The ${name} protocol cannot tokenize ${describeValue(value)}`);
      }
      return tokenize(value, context);
    },
  };
}

// ============================================================================
// Built-in Protocols
// ============================================================================

type Primitive = string | number | boolean | bigint | symbol | null | undefined;

function isPrimitive(value: unknown): value is Primitive {
  return value === null || (typeof value !== "object" && typeof value !== "function");
}

export const primitiveProtocol = defineProtocol("primitive", isPrimitive, (value) => {
  switch (typeof value) {
    case "string":
      return `str:${JSON.stringify(value)}`;
    case "number":
      return `num:${Object.is(value, -0) ? "-0" : String(value)}`;
    case "bigint":
      return `big:${value}`;
    case "boolean":
      return `bool:${value}`;
    case "symbol": {
      const key = Symbol.keyFor(value);
      return key !== undefined ? `sym:for:${key}` : `sym:${value.description ?? ""}`;
    }
    case "undefined":
      return "undefined";
    default:
      return "null";
  }
});

export const moduleProtocol = defineProtocol(
  "module",
  (value: unknown): value is object => moduleNameOf(value) !== undefined,
  (value) => `module:${moduleNameOf(value)}`
);

export const functionProtocol = defineProtocol(
  "function",
  (value: unknown): value is Function => typeof value === "function",
  (value, context) => `fn:${context.fingerprintFunction(value)}`
);

export const arrayProtocol = defineProtocol(
  "array",
  (value: unknown): value is unknown[] => Array.isArray(value),
  (value, context) => `[${value.map((item) => context.tokenize(item)).join(",")}]`
);

export const dateProtocol = defineProtocol(
  "date",
  (value: unknown): value is Date => value instanceof Date,
  (value) => `date:${Number.isNaN(value.getTime()) ? "invalid" : value.toISOString()}`
);

export const regExpProtocol = defineProtocol(
  "regexp",
  (value: unknown): value is RegExp => value instanceof RegExp,
  (value) => `re:${value.source}/${value.flags}`
);

export const mapProtocol = defineProtocol(
  "map",
  (value: unknown): value is Map<unknown, unknown> => value instanceof Map,
  (value, context) => {
    const entries = [...value.entries()].map(([key, item]) => `${context.tokenize(key)}=>${context.tokenize(item)}`);
    return `map{${entries.join(",")}}`;
  }
);

export const setProtocol = defineProtocol(
  "set",
  (value: unknown): value is Set<unknown> => value instanceof Set,
  (value, context) => `set{${[...value].map((item) => context.tokenize(item)).join(",")}}`
);

/**
 * Any other object: constructor name and own enumerable properties by key.
 */
export const objectProtocol = defineProtocol(
  "object",
  (value: unknown): value is object => typeof value === "object" && value !== null,
  (value, context) => {
    const fields = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${context.tokenize(Reflect.get(value, key))}`);
    return `obj:${constructorName(value) ?? "null"}{${fields.join(",")}}`;
  }
);

/**
 * Consulted in order; the first protocol that supports a value wins.
 */
export const defaultProtocols: readonly TokenizeProtocol[] = [
  primitiveProtocol,
  moduleProtocol,
  functionProtocol,
  arrayProtocol,
  dateProtocol,
  regExpProtocol,
  mapProtocol,
  setProtocol,
  objectProtocol,
];
