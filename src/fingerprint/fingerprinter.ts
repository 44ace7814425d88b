/**
 * Behavior fingerprints for callables.
 *
 * A fingerprint covers the callable's instruction stream, the code of every
 * nested function, and a token for each value the code references. Referenced
 * functions and classes are fingerprinted in turn, so a change anywhere in the
 * reachable code changes the result.
 */

import { Hash, createHash } from "crypto";
import { Callable, DescribeOptions, Namespace, describeCallable } from "../callable";
import { CodeObject } from "../code/compile";
import { operandToString } from "../code/instruction";
import { CodeContext, buildContext } from "../context";
import { consoleSink, unknownOrigin, unresolvedReference } from "../diagnostics";
import { CodeCompileError, ContractViolation, describeError } from "../errors";
import { SymbolicValue, partialName } from "../symbolic";
import { WalkOptions, extractReferences } from "../walker";
import { TokenizeContext, TokenizeProtocol, defaultProtocols } from "./protocols";

export type Fingerprint = `sha256:${string}`;

export interface FingerprintOptions extends WalkOptions {
  /** Tried before the built-in protocols. */
  protocols?: readonly TokenizeProtocol[];
}

const SEPARATOR = "\0";

export class CodeFingerprinter {
  private readonly protocols: readonly TokenizeProtocol[];
  // Per module scope, since a function's references resolve through it
  private readonly memo = new WeakMap<Namespace, Map<Function, string>>();
  private readonly inProgress = new Set<Function>();
  private readonly tokenizing = new Set<object>();
  // One per function being fingerprinted; set when its hash took a back-reference
  private readonly frames: { backReference: boolean }[] = [];

  constructor(private readonly options: FingerprintOptions = {}) {
    this.protocols = [...(options.protocols ?? []), ...defaultProtocols];
  }

  fingerprint(callable: Callable): Fingerprint {
    const hash = createHash("sha256");
    if (callable.bound) hash.update(`bound${SEPARATOR}`);
    this.hashCode(hash, callable.code, buildContext(callable));
    return `sha256:${hash.digest("hex")}`;
  }

  /**
   * Token for any runtime value, as referenced from code in `globals`.
   */
  tokenize(value: unknown, globals: Namespace): string {
    const isObject = (typeof value === "object" || typeof value === "function") && value !== null;
    if (isObject && this.tokenizing.has(value)) return this.backReference("<cycle>");

    const protocol = this.protocols.find((candidate) => candidate.supports(value));
    if (!protocol) return `opaque:${typeof value}`;

    const context: TokenizeContext = {
      tokenize: (nested) => this.tokenize(nested, globals),
      fingerprintFunction: (fn) => this.fingerprintFunction(fn, globals),
    };
    if (!isObject) return protocol.tokenize(value, context);
    this.tokenizing.add(value);
    try {
      return protocol.tokenize(value, context);
    } finally {
      this.tokenizing.delete(value);
    }
  }

  private fingerprintFunction(fn: Function, globals: Namespace): string {
    let cache = this.memo.get(globals);
    if (!cache) {
      cache = new Map();
      this.memo.set(globals, cache);
    }
    const cached = cache.get(fn);
    if (cached !== undefined) return cached;
    if (this.inProgress.has(fn)) return this.backReference(`recursive:${fn.name}`);

    const frame = { backReference: false };
    this.inProgress.add(fn);
    this.frames.push(frame);
    try {
      const result = this.describeAndFingerprint(fn, globals);
      // A result holding a back-reference depends on where the walk started
      if (!frame.backReference) cache.set(fn, result);
      return result;
    } finally {
      this.frames.pop();
      this.inProgress.delete(fn);
      if (frame.backReference) this.markBackReference();
    }
  }

  private backReference(token: string): string {
    this.markBackReference();
    return token;
  }

  private markBackReference(): void {
    const top = this.frames[this.frames.length - 1];
    if (top) top.backReference = true;
  }

  private describeAndFingerprint(fn: Function, globals: Namespace): string {
    let callable: Callable;
    try {
      callable = describeCallable(fn, { globals });
    } catch (error) {
      if (error instanceof ContractViolation || error instanceof CodeCompileError) {
        return `native:${fn.name}`;
      }
      throw error;
    }
    return this.fingerprint(callable);
  }

  private hashCode(hash: Hash, code: CodeObject, context: CodeContext): void {
    hash.update(`code${SEPARATOR}`);
    for (const instruction of code.instructions) {
      // Line numbers are left out: moving code doesn't change behavior
      hash.update(`${instruction.kind} ${operandToString(instruction.operand)}${SEPARATOR}`);
    }

    const origin = { name: code.name, fileName: code.fileName };
    const references = extractReferences(code.instructions, context, { ...this.options, origin });
    for (const reference of references) {
      const token =
        reference.tag === "partial" ? `name:${reference.name}` : this.tokenizeReference(reference.value, context);
      hash.update(token + SEPARATOR);
    }

    for (const child of code.children) {
      this.hashCode(hash, child, nestedContext(context, child));
    }
    hash.update(`end${SEPARATOR}`);
  }

  private tokenizeReference(value: unknown, context: CodeContext): string {
    try {
      return this.tokenize(value, context.globalBindings);
    } catch (error) {
      // Same treatment as an unresolvable reference
      const sink = this.options.sink ?? consoleSink;
      const origin = this.options.origin ?? unknownOrigin;
      sink.report(unresolvedReference(describeError(error), { line: undefined, origin }));
      return "unhashable";
    }
  }
}

/**
 * Context for a nested function: its own cells are internal captures, and the
 * names it captures resolve to whatever the parent bound them to.
 */
function nestedContext(parent: CodeContext, child: CodeObject): CodeContext {
  const cells = new Map<string, SymbolicValue>();
  for (const name of child.cellNames) cells.set(name, partialName(name));
  for (const name of child.freeNames) {
    cells.set(name, parent.cellBindings.get(name) ?? partialName(name));
  }
  return { globalBindings: parent.globalBindings, cellBindings: cells, localBindings: new Map() };
}

/**
 * Fingerprint a live function or class.
 */
export function fingerprintFunction(fn: unknown, options: DescribeOptions & FingerprintOptions = {}): Fingerprint {
  const { globals, enclosing, fileName, firstLine, ...fingerprintOptions } = options;
  const callable = describeCallable(fn, { globals, enclosing, fileName, firstLine });
  return new CodeFingerprinter(fingerprintOptions).fingerprint(callable);
}
