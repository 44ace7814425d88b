/**
 * Command-line argument handling for callable-refs.
 */

export type OutputMode = "references" | "fingerprint" | "disassemble";

export interface CliOptions {
  modulePath: string;
  exportName: string;
  method: string | null;
  mode: OutputMode;
  json: boolean;
}

export type ParsedArgs = { kind: "run"; options: CliOptions } | { kind: "help" } | { kind: "error"; message: string };

export const HELP_TEXT = `
callable-refs - list what a function references

Usage:
  callable-refs <module> <export> [options]

Options:
  --method <name>    Describe <export>.<name> bound to <export>
  --fingerprint      Print the behavior fingerprint instead of references
  --disassemble      Print the compiled instruction stream
  --json             Print references as JSON
  -h, --help         Show this help

Examples:
  callable-refs ./lib/pricing.js computeTotal
  callable-refs ./lib/cart.js cart --method checkout --json
  callable-refs ./lib/pricing.js computeTotal --fingerprint
`;

export function printHelp(): void {
  console.log(HELP_TEXT);
}

export function parseArgs(args: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  let method: string | null = null;
  let mode: OutputMode = "references";
  let json = false;

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      return { kind: "help" };
    } else if (arg === "--method") {
      i++;
      if (i >= args.length) {
        return { kind: "error", message: "--method requires a property name" };
      }
      method = args[i];
    } else if (arg === "--fingerprint" || arg === "--disassemble") {
      const next: OutputMode = arg === "--fingerprint" ? "fingerprint" : "disassemble";
      if (mode !== "references" && mode !== next) {
        return { kind: "error", message: "--fingerprint and --disassemble cannot be combined" };
      }
      mode = next;
    } else if (arg === "--json") {
      json = true;
    } else if (arg.startsWith("-")) {
      return { kind: "error", message: `Unknown option: ${arg}` };
    } else {
      positional.push(arg);
    }
    i++;
  }

  if (positional.length < 2) {
    return { kind: "error", message: "Expected a module path and an export name" };
  }
  if (positional.length > 2) {
    return { kind: "error", message: `Unexpected argument: ${positional[2]}` };
  }

  return {
    kind: "run",
    options: { modulePath: positional[0], exportName: positional[1], method, mode, json },
  };
}
