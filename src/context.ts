/**
 * Binding snapshot a reference walk runs against.
 */

import type { Callable, Namespace } from "./callable";
import { ContractViolation } from "./errors";
import { SymbolicValue, concrete, partialName } from "./symbolic";

export interface CodeContext {
  /** The callable's module scope, by reference. */
  readonly globalBindings: Namespace;
  /**
   * Captured variables: internal captures map to their own name, external
   * captures to the captured value.
   */
  readonly cellBindings: ReadonlyMap<string, SymbolicValue>;
  /** Seed for the walk's local table: the receiver of a bound method. */
  readonly localBindings: ReadonlyMap<string, SymbolicValue>;
}

/**
 * Name the receiver is bound under.
 */
export const RECEIVER = "this";

/**
 * Build the context for one callable.
 *
 * @throws ContractViolation if the external capture names and the closure
 * cells don't pair up one to one
 */
export function buildContext(callable: Callable): CodeContext {
  const { code, closure } = callable;
  const cells = new Map<string, SymbolicValue>();

  for (const name of code.cellNames) {
    if (cells.has(name)) {
      throw new ContractViolation(`Capture "${name}" is declared twice in ${code.name}`, code.name);
    }
    // No value exists yet for a cell this callable itself defines
    cells.set(name, partialName(name));
  }

  if (code.freeNames.length !== closure.length) {
    throw new ContractViolation(
      `${code.name} captures ${code.freeNames.length} variable(s) but its closure holds ${closure.length}`,
      code.name
    );
  }
  code.freeNames.forEach((name, i) => {
    if (cells.has(name)) {
      throw new ContractViolation(`Capture "${name}" is declared twice in ${code.name}`, code.name);
    }
    cells.set(name, concrete(closure[i]));
  });

  const locals = new Map<string, SymbolicValue>();
  if (callable.bound) locals.set(RECEIVER, concrete(callable.bound.receiver));

  return { globalBindings: callable.globals, cellBindings: cells, localBindings: locals };
}
