/**
 * Non-fatal diagnostics raised while extracting references.
 *
 * A failed lookup never aborts a walk; it becomes a diagnostic delivered to a
 * sink, and the reference silently drops out of the fingerprint.
 */

import { oneline } from "./util/oneline";

export type DiagnosticSeverity = "warning" | "info";

export type DiagnosticCode = "unresolved-reference" | "unresolved-import";

export interface ReferenceDiagnostic {
  code: DiagnosticCode;
  severity: DiagnosticSeverity;
  /** Name of the callable being walked. */
  callable: string;
  fileName: string;
  /** Last source line seen before the failure, if any instruction carried one. */
  line: number | undefined;
  message: string;
}

export interface DiagnosticSink {
  report(diagnostic: ReferenceDiagnostic): void;
}

/**
 * Identity of the callable a walk belongs to.
 */
export interface CodeOrigin {
  name: string;
  fileName: string;
}

export const unknownOrigin: CodeOrigin = { name: "<unknown>", fileName: "<unknown>" };

type DiagnosticOpts = { line: number | undefined; origin: CodeOrigin };

export function unresolvedReference(failure: string, { line, origin }: DiagnosticOpts): ReferenceDiagnostic {
  return {
    code: "unresolved-reference",
    severity: "warning",
    callable: origin.name,
    fileName: origin.fileName,
    line,
    message: failure,
  };
}

export function unresolvedImport(failure: string, { line, origin }: DiagnosticOpts): ReferenceDiagnostic {
  return {
    code: "unresolved-import",
    severity: "info",
    callable: origin.name,
    fileName: origin.fileName,
    line,
    message: failure,
  };
}

/**
 * Full explanation of a diagnostic for people reading logs.
 */
export function formatDiagnostic(diagnostic: ReferenceDiagnostic): string {
  const where = `${diagnostic.fileName}${diagnostic.line !== undefined ? `:${diagnostic.line}` : ""}`;
  if (diagnostic.code === "unresolved-import") {
    return `${where}: ${diagnostic.callable}: ${diagnostic.message}; hashing the module by name`;
  }
  return (
    oneline(`
      Found a code reference in ${where} that cannot be hashed when hashing
      ${diagnostic.callable}. The reference is ignored, so changes to it
      won't invalidate the cache.
    `) +
    "\n" +
    diagnostic.message
  );
}

// ============================================================================
// Sinks
// ============================================================================

/**
 * Writes warnings to the console; info diagnostics are dropped.
 */
export const consoleSink: DiagnosticSink = {
  report(diagnostic) {
    if (diagnostic.severity === "warning") console.warn(formatDiagnostic(diagnostic));
  },
};

/**
 * Discards everything.
 */
export const silentSink: DiagnosticSink = {
  report() {},
};

/**
 * Keeps every diagnostic in memory, for tests and tools that inspect them.
 */
export class CollectingSink implements DiagnosticSink {
  readonly diagnostics: ReferenceDiagnostic[] = [];

  report(diagnostic: ReferenceDiagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  warnings(): ReferenceDiagnostic[] {
    return this.diagnostics.filter((diagnostic) => diagnostic.severity === "warning");
  }
}
