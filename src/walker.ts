/**
 * Reference walker.
 *
 * Attribute access compiles to a name load followed by separate attribute
 * loads, with nothing tying them together. The walker replays the instruction
 * stream with a single symbolic register standing in for the top of the
 * evaluation stack, so that `a.b.c` comes out as the object at that path when
 * `a` is known, or as the string "a.b.c" when it isn't.
 *
 * The walk is a fold: each instruction maps one state to the next, and no
 * state outlives the call.
 */

import type { Callable } from "./callable";
import type { Instruction } from "./code/instruction";
import { CodeContext, buildContext } from "./context";
import {
  CodeOrigin,
  DiagnosticSink,
  consoleSink,
  unknownOrigin,
  unresolvedImport,
  unresolvedReference,
} from "./diagnostics";
import { ResolutionFailure, describeError } from "./errors";
import { ModuleResolver, createNodeResolver } from "./modules";
import {
  Reference,
  ReferenceList,
  SymbolicValue,
  chainName,
  concrete,
  empty,
  isReference,
  partialName,
} from "./symbolic";
import { describeValue } from "./util/values";

export interface WalkOptions {
  /** Where failed lookups are reported. Defaults to the console. */
  sink?: DiagnosticSink;
  /** Loads modules for import instructions. Defaults to Node's resolution. */
  resolveModule?: ModuleResolver;
  /** Callable identity used in diagnostics. */
  origin?: CodeOrigin;
}

interface WalkEnv {
  context: CodeContext;
  sink: DiagnosticSink;
  resolveModule: ModuleResolver;
  origin: CodeOrigin;
}

interface WalkState {
  readonly top: SymbolicValue;
  readonly line: number | undefined;
  /** Committed references; appended to, never rewritten. */
  readonly output: Reference[];
  /** Private local table, seeded from the context. */
  readonly locals: Map<string, SymbolicValue>;
}

/**
 * Collect the objects and names an instruction stream references, in the
 * order it commits them.
 *
 * Never throws for an unresolvable reference: the failure is reported to the
 * sink and the reference is dropped.
 */
export function extractReferences(
  instructions: Iterable<Instruction>,
  context: CodeContext,
  options: WalkOptions = {}
): ReferenceList {
  const origin = options.origin ?? unknownOrigin;
  const env: WalkEnv = {
    context,
    sink: options.sink ?? consoleSink,
    resolveModule: options.resolveModule ?? createNodeResolver(origin.fileName),
    origin,
  };
  const initial: WalkState = {
    top: empty,
    line: undefined,
    output: [],
    locals: new Map(context.localBindings),
  };

  const final = Array.from(instructions).reduce((state, instruction) => step(state, instruction, env), initial);
  return commit(final).output;
}

/**
 * Build a callable's context and walk its instructions.
 *
 * @throws ContractViolation if the callable's captures and closure disagree
 */
export function getReferencedObjects(callable: Callable, options: WalkOptions = {}): ReferenceList {
  const context = buildContext(callable);
  return extractReferences(callable.code.instructions, context, {
    ...options,
    origin: options.origin ?? { name: callable.code.name, fileName: callable.code.fileName },
  });
}

// ============================================================================
// Steps
// ============================================================================

function step(state: WalkState, instruction: Instruction, env: WalkEnv): WalkState {
  const line = instruction.sourceLine ?? state.line;
  const current = line === state.line ? state : { ...state, line };
  try {
    return dispatch(current, instruction, env);
  } catch (error) {
    env.sink.report(unresolvedReference(describeError(error), { line, origin: env.origin }));
    return { ...current, top: empty };
  }
}

function dispatch(state: WalkState, instruction: Instruction, env: WalkEnv): WalkState {
  switch (instruction.kind) {
    case "loadGlobal": {
      const name = nameOperand(instruction);
      const globals = env.context.globalBindings;
      return load(state, Object.hasOwn(globals, name) ? concrete(globals[name]) : partialName(name));
    }

    case "loadDeref":
    case "loadClosure": {
      const name = nameOperand(instruction);
      const value = env.context.cellBindings.get(name);
      if (value === undefined) {
        throw new ResolutionFailure(`No captured variable named "${name}"`, name);
      }
      return load(state, value);
    }

    case "importName":
      return load(state, importModule(nameOperand(instruction), state.line, env));

    case "loadAttr":
    case "loadMethod":
    case "importFrom":
      return loadAttribute(state, nameOperand(instruction));

    case "deleteLocal":
      if (state.top.tag === "empty") return state;
      state.locals.delete(nameOperand(instruction));
      return { ...state, top: empty };

    case "storeLocal":
      if (state.top.tag === "empty") return state;
      state.locals.set(nameOperand(instruction), state.top);
      return { ...state, top: empty };

    case "loadLocal": {
      const value = state.locals.get(nameOperand(instruction));
      return value === undefined ? commit(state) : load(state, value);
    }

    // Everything else consumes whatever value was pending.
    case "loadConst":
    case "loadSubscript":
    case "storeDeref":
    case "storeGlobal":
    case "storeAttr":
    case "storeSubscript":
    case "storeDefault":
    case "deleteAttr":
    case "call":
    case "callMethod":
    case "construct":
    case "return":
    case "binaryOp":
    case "unaryOp":
    case "pop":
    case "dup":
    case "unpack":
    case "branch":
    case "jump":
    case "getIterator":
    case "enterTry":
    case "throw":
    case "await":
    case "yield":
    case "buildArray":
    case "buildObject":
    case "buildTemplate":
    case "buildClosure":
    case "makeFunction":
    case "makeClass":
    case "evaluate":
      return commit(state);
  }
}

/**
 * Move a pending value to the output and clear the register.
 */
function commit(state: WalkState): WalkState {
  if (!isReference(state.top)) return state;
  state.output.push(state.top);
  return { ...state, top: empty };
}

function load(state: WalkState, value: SymbolicValue): WalkState {
  return { ...commit(state), top: value };
}

function loadAttribute(state: WalkState, attribute: string): WalkState {
  const top = state.top;
  switch (top.tag) {
    case "empty":
      // Receiver unknown: keep the bare name.
      state.output.push(partialName(attribute));
      return state;
    case "partial":
      return { ...state, top: partialName(chainName(top.name, attribute)) };
    case "concrete":
      return { ...state, top: concrete(getAttribute(top.value, attribute)) };
  }
}

function getAttribute(value: unknown, attribute: string): unknown {
  if (value === null || value === undefined) {
    throw new ResolutionFailure(`Cannot read "${attribute}" of ${String(value)}`, attribute);
  }
  const holder: object = Object(value);
  if (!(attribute in holder)) {
    throw new ResolutionFailure(`${describeValue(value)} has no attribute "${attribute}"`, attribute);
  }
  return Reflect.get(holder, attribute);
}

function importModule(name: string, line: number | undefined, env: WalkEnv): SymbolicValue {
  try {
    return concrete(env.resolveModule(name));
  } catch (error) {
    env.sink.report(unresolvedImport(describeError(error), { line, origin: env.origin }));
    return partialName(name);
  }
}

function nameOperand(instruction: Instruction): string {
  const operand = instruction.operand;
  if (typeof operand !== "string") {
    throw new ResolutionFailure(`${instruction.kind} needs a name operand`);
  }
  return operand;
}
