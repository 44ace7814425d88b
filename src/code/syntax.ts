/**
 * Lezer tree helpers shared by scope analysis and lowering.
 */

import { parser } from "@lezer/javascript";
import type { SyntaxNode, Tree } from "@lezer/common";

// Function sources from transpiled or hand-written TypeScript may still carry
// annotations, so parse with the TS dialect.
const tsParser = parser.configure({ dialect: "ts" });

export function parseSource(source: string): Tree {
  return tsParser.parse(source);
}

/**
 * Check whether a tree contains any error node.
 */
export function hasSyntaxError(tree: Tree): boolean {
  const cursor = tree.cursor();
  do {
    if (cursor.type.isError) return true;
  } while (cursor.next());
  return false;
}

// ============================================================================
// Node Access
// ============================================================================

export function getText(node: SyntaxNode, source: string): string {
  return source.slice(node.from, node.to);
}

const SKIPPED = new Set([
  "LineComment",
  "BlockComment",
  "TypeAnnotation",
  "TypeParamList",
  "TypeArgList",
  "TypePredicate",
  "Decorator",
]);

/**
 * Direct children, without comments and type-only syntax.
 */
export function childNodes(node: SyntaxNode): SyntaxNode[] {
  const children: SyntaxNode[] = [];
  for (let child = node.firstChild; child; child = child.nextSibling) {
    if (!SKIPPED.has(child.type.name)) children.push(child);
  }
  return children;
}

// Keywords that stand for a value in expression position.
const VALUE_KEYWORDS = new Set(["this", "null", "super", "import"]);

/**
 * Syntax tree node types are capitalized; keywords and punctuation are not.
 */
export function isSyntaxNode(node: SyntaxNode): boolean {
  const name = node.type.name;
  if (VALUE_KEYWORDS.has(name)) return true;
  return /^[A-Z]/.test(name) && !node.type.isError;
}

/**
 * Children that carry structure: no keywords, punctuation, comments or types.
 */
export function operands(node: SyntaxNode): SyntaxNode[] {
  return childNodes(node).filter(isSyntaxNode);
}

export function getChild(node: SyntaxNode, name: string): SyntaxNode | null {
  for (let child = node.firstChild; child; child = child.nextSibling) {
    if (child.type.name === name) return child;
  }
  return null;
}

export function hasChild(node: SyntaxNode, name: string): boolean {
  return getChild(node, name) !== null;
}

/**
 * Find a keyword or punctuation child by its exact source text.
 */
export function hasToken(node: SyntaxNode, source: string, text: string): boolean {
  for (let child = node.firstChild; child; child = child.nextSibling) {
    if (!isSyntaxNode(child) && getText(child, source) === text) return true;
  }
  return false;
}

// ============================================================================
// Node Classification
// ============================================================================

const FUNCTION_NODES = new Set(["FunctionDeclaration", "FunctionExpression", "ArrowFunction", "MethodDeclaration"]);

/**
 * Nodes that open a new function scope.
 *
 * Object-literal methods are `Property` nodes with a parameter list; class
 * bodies get their own scope so field initializers don't leak into the
 * surrounding function.
 */
export function isScopeNode(node: SyntaxNode): boolean {
  const name = node.type.name;
  if (FUNCTION_NODES.has(name)) return true;
  if (name === "Property") return hasChild(node, "ParamList");
  return name === "ClassBody";
}

export function isFunctionNode(node: SyntaxNode): boolean {
  return FUNCTION_NODES.has(node.type.name) || (node.type.name === "Property" && hasChild(node, "ParamList"));
}

// ============================================================================
// Line Tracking
// ============================================================================

/**
 * Maps source offsets to 1-based line numbers.
 */
export class LineIndex {
  private starts: number[] = [0];

  constructor(source: string, private firstLine = 1) {
    for (let i = 0; i < source.length; i++) {
      if (source.charCodeAt(i) === 10) this.starts.push(i + 1);
    }
  }

  lineAt(offset: number): number {
    let lo = 0;
    let hi = this.starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.starts[mid] <= offset) lo = mid;
      else hi = mid - 1;
    }
    return lo + this.firstLine;
  }
}

/**
 * Unquote a string literal's source text.
 */
export function stringValue(text: string): string {
  const quote = text[0];
  if ((quote === '"' || quote === "'") && text.endsWith(quote) && text.length >= 2) {
    const body = text.slice(1, -1);
    if (quote === '"') {
      try {
        const parsed: unknown = JSON.parse(text);
        if (typeof parsed === "string") return parsed;
      } catch {
        return body;
      }
    }
    return body.replace(/\\(.)/g, "$1");
  }
  return text;
}
