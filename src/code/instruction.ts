/**
 * Instruction stream for compiled callables.
 *
 * A callable's body is lowered to a flat sequence of stack-machine steps.
 * The stream is only ever read statically: nothing here executes it.
 */

// ============================================================================
// Instruction Kinds
// ============================================================================

/**
 * Every kind of step the compiler can emit.
 *
 * The reference walker gives special meaning to the name-loading, attribute,
 * import and local-variable kinds; the rest only mark the point where a
 * pending value is consumed.
 */
export type InstructionKind =
  // Name loads
  | "loadGlobal"
  | "loadDeref"
  | "loadClosure"
  | "loadLocal"
  | "loadConst"
  // Attribute chains and imports
  | "loadAttr"
  | "loadMethod"
  | "importName"
  | "importFrom"
  | "loadSubscript"
  // Stores and deletes
  | "storeLocal"
  | "storeDeref"
  | "storeGlobal"
  | "storeAttr"
  | "storeSubscript"
  | "storeDefault"
  | "deleteLocal"
  | "deleteAttr"
  // Calls
  | "call"
  | "callMethod"
  | "construct"
  | "return"
  // Operators
  | "binaryOp"
  | "unaryOp"
  | "pop"
  | "dup"
  | "unpack"
  // Control flow
  | "branch"
  | "jump"
  | "getIterator"
  | "enterTry"
  | "throw"
  | "await"
  | "yield"
  // Builders
  | "buildArray"
  | "buildObject"
  | "buildTemplate"
  | "buildClosure"
  | "makeFunction"
  | "makeClass"
  // Any expression form without a dedicated kind
  | "evaluate";

export type Operand = string | number | boolean | null | undefined;

export interface Instruction {
  readonly kind: InstructionKind;
  readonly operand?: Operand;
  /** Set on the first instruction of each source line. */
  readonly sourceLine?: number;
}

// ============================================================================
// Constructors
// ============================================================================

export function instr(kind: InstructionKind, operand?: Operand, sourceLine?: number): Instruction {
  const result: { kind: InstructionKind; operand?: Operand; sourceLine?: number } = { kind };
  if (operand !== undefined) result.operand = operand;
  if (sourceLine !== undefined) result.sourceLine = sourceLine;
  return result;
}

export const loadGlobal = (name: string, line?: number) => instr("loadGlobal", name, line);
export const loadDeref = (name: string, line?: number) => instr("loadDeref", name, line);
export const loadClosure = (name: string, line?: number) => instr("loadClosure", name, line);
export const loadLocal = (name: string, line?: number) => instr("loadLocal", name, line);
export const loadConst = (value: Operand, line?: number) => instr("loadConst", value, line);
export const loadAttr = (name: string, line?: number) => instr("loadAttr", name, line);
export const loadMethod = (name: string, line?: number) => instr("loadMethod", name, line);
export const importName = (name: string, line?: number) => instr("importName", name, line);
export const importFrom = (name: string, line?: number) => instr("importFrom", name, line);
export const storeLocal = (name: string, line?: number) => instr("storeLocal", name, line);
export const deleteLocal = (name: string, line?: number) => instr("deleteLocal", name, line);

// ============================================================================
// Printing
// ============================================================================

/**
 * Render an instruction the way a disassembler would, e.g. `12 loadAttr "x"`.
 */
export function instructionToString(instruction: Instruction): string {
  const line = instruction.sourceLine !== undefined ? String(instruction.sourceLine).padStart(4) : "    ";
  if (!("operand" in instruction)) {
    return `${line} ${instruction.kind}`;
  }
  return `${line} ${instruction.kind} ${operandToString(instruction.operand)}`;
}

export function operandToString(operand: Operand): string {
  if (typeof operand === "string") return JSON.stringify(operand);
  if (operand === undefined) return "undefined";
  return String(operand);
}

/**
 * Disassemble a whole stream, one instruction per line.
 */
export function disassemble(instructions: readonly Instruction[]): string {
  return instructions.map(instructionToString).join("\n");
}
