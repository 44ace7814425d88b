/**
 * Reference extraction for behavior-based cache fingerprints.
 */

// Callables and their binding context
export type { Callable, DescribeOptions, Namespace } from "./callable";
export { describeCallable, describeMethod } from "./callable";
export type { CodeContext } from "./context";
export { RECEIVER, buildContext } from "./context";

// Compilation
export type { CodeObject, CompileOptions } from "./code/compile";
export { compileFunction } from "./code/compile";
export type { Instruction, InstructionKind, Operand } from "./code/instruction";
export { disassemble, instr, instructionToString, operandToString } from "./code/instruction";

// Symbolic values
export type { Concrete, Empty, PartialName, Reference, ReferenceList, SymbolicValue } from "./symbolic";
export { concrete, empty, partialName, referenceToString, referenceValues } from "./symbolic";

// Walking
export type { WalkOptions } from "./walker";
export { extractReferences, getReferencedObjects } from "./walker";
export type { ModuleResolver } from "./modules";
export { createNodeResolver, createTableResolver, moduleNameOf, registerModule } from "./modules";

// Diagnostics and errors
export type { CodeOrigin, DiagnosticSink, ReferenceDiagnostic } from "./diagnostics";
export { CollectingSink, consoleSink, formatDiagnostic, silentSink } from "./diagnostics";
export { CodeCompileError, ContractViolation, ImportFailure, ResolutionFailure } from "./errors";

// Fingerprints
export type { Fingerprint, FingerprintOptions } from "./fingerprint/fingerprinter";
export { CodeFingerprinter, fingerprintFunction } from "./fingerprint/fingerprinter";
export type { TokenizeContext, TokenizeProtocol } from "./fingerprint/protocols";
export { defaultProtocols, defineProtocol } from "./fingerprint/protocols";

export type { ReferenceRecord, RenderOptions } from "./report";
export { renderReferences, renderReferencesJson, toRecords } from "./report";
