/**
 * Error types.
 *
 * Only `ContractViolation` and `CodeCompileError` ever reach a caller of the
 * extraction engine; the others are thrown and caught inside the walk.
 */

/**
 * A callable does not satisfy the input contract: its capture names don't
 * line up with its closure cells, or it has no source to compile.
 */
export class ContractViolation extends Error {
  constructor(message: string, public callable?: string) {
    super(message);
    this.name = "ContractViolation";
  }
}

/**
 * A single name or attribute lookup failed during a walk.
 */
export class ResolutionFailure extends Error {
  constructor(message: string, public reference?: string) {
    super(message);
    this.name = "ResolutionFailure";
  }
}

/**
 * A module resolver could not load a module.
 */
export class ImportFailure extends Error {
  constructor(public moduleName: string, cause?: unknown) {
    super(`Cannot import module "${moduleName}"${cause instanceof Error ? `: ${cause.message}` : ""}`);
    this.name = "ImportFailure";
  }
}

/**
 * Source text could not be parsed as a function, method or class.
 */
export class CodeCompileError extends Error {
  constructor(
    message: string,
    public from: number,
    public to: number,
    public nodeType?: string
  ) {
    super(message);
    this.name = "CodeCompileError";
  }
}

/**
 * Describe any thrown value in one line.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
