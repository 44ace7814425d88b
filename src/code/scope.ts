/**
 * Scope analysis over a Lezer tree.
 *
 * Works out, for a function and every function nested in it, which names it
 * declares, which it uses, which of its own locals are captured by nested
 * closures and which names it reads from an enclosing scope. All bindings are
 * function scoped: `let`, `const`, `var`, function and class declarations and
 * catch parameters bind in the nearest enclosing function.
 */

import type { SyntaxNode } from "@lezer/common";
import { childNodes, getText, isScopeNode, operands } from "./syntax";

// ============================================================================
// Scope
// ============================================================================

export interface Scope {
  readonly node: SyntaxNode;
  readonly name: string;
  /** Parameters and declarations, in declaration order. */
  readonly declared: readonly string[];
  /** Names read or written here or in a nested scope, first use first. */
  readonly uses: readonly string[];
  /** Declared names that some nested scope captures. */
  readonly cells: readonly string[];
  /** Used names this scope does not declare. */
  readonly free: readonly string[];
  readonly children: readonly Scope[];
}

/**
 * Look up the scope opened by a nested function or class body node.
 */
export function childScope(scope: Scope, node: SyntaxNode): Scope | undefined {
  return scope.children.find((child) => child.node.from === node.from && child.node.to === node.to);
}

/**
 * Analyse a scope node and everything nested in it.
 *
 * `isRoot` marks the function being compiled: its own name is left unbound so
 * that a self reference resolves through the module scope.
 */
export function analyzeScope(node: SyntaxNode, source: string, fallbackName: string, isRoot = true): Scope {
  const builder = new ScopeBuilder(node, source);
  builder.declareHeader(isRoot);
  builder.visitBody();
  return builder.finish(scopeName(node, source) ?? fallbackName);
}

/**
 * The declared name of a function, method or class node, if it has one.
 */
export function scopeName(node: SyntaxNode, source: string): string | null {
  if (node.type.name === "ArrowFunction") return null;
  const target = node.type.name === "ClassBody" && node.parent ? node.parent : node;
  for (const child of childNodes(target)) {
    const name = child.type.name;
    if (name === "VariableDefinition" || name === "PropertyDefinition" || name === "PrivatePropertyDefinition") {
      return getText(child, source);
    }
    if (name === "ParamList" || name === "Block" || name === "ClassBody") break;
  }
  return null;
}

class ScopeBuilder {
  private declared = new OrderedSet();
  private uses = new OrderedSet();
  private children: Scope[] = [];

  constructor(private node: SyntaxNode, private source: string) {}

  /**
   * Bind the names the scope node introduces before its body: parameters, and
   * for nested named function expressions their own name.
   */
  declareHeader(isRoot: boolean): void {
    const kind = this.node.type.name;
    for (const child of childNodes(this.node)) {
      const name = child.type.name;
      if (name === "ParamList") {
        this.visit(child);
      } else if (name === "VariableDefinition") {
        if (kind === "ArrowFunction") {
          // Single parameter without parentheses
          this.declared.add(getText(child, this.source));
        } else if (kind === "FunctionExpression" && !isRoot) {
          this.declared.add(getText(child, this.source));
        }
      }
    }
  }

  visitBody(): void {
    const kind = this.node.type.name;
    for (const child of childNodes(this.node)) {
      const name = child.type.name;
      if (name === "ParamList" || name === "VariableDefinition") continue;
      // Method keys, computed or not, belong to the enclosing scope
      if ((kind === "Property" || kind === "MethodDeclaration") && name !== "Block") continue;
      this.visit(child);
    }
  }

  private visit(node: SyntaxNode): void {
    const name = node.type.name;

    if (isScopeNode(node)) {
      if (name === "FunctionDeclaration") {
        const own = scopeName(node, this.source);
        if (own) this.declared.add(own);
      }
      if (name === "Property" || name === "MethodDeclaration") {
        // Computed keys are evaluated in the enclosing scope
        this.visitComputedKey(node);
      }
      const nested = analyzeScope(node, this.source, "<anonymous>", false);
      this.children.push(nested);
      for (const used of nested.free) this.uses.add(used);
      return;
    }

    switch (name) {
      case "ClassDeclaration":
      case "ClassExpression": {
        for (const child of childNodes(node)) {
          if (child.type.name === "VariableDefinition") {
            if (name === "ClassDeclaration") this.declared.add(getText(child, this.source));
          } else {
            this.visit(child);
          }
        }
        return;
      }
      case "VariableDefinition":
        this.declared.add(getText(node, this.source));
        return;
      case "VariableName":
        this.uses.add(getText(node, this.source));
        return;
      case "Property": {
        // Shorthand `{ a }` reads `a`
        const parts = operands(node);
        if (parts.length === 1 && parts[0].type.name === "PropertyDefinition" && !hasSpread(node, this.source)) {
          this.uses.add(getText(parts[0], this.source));
          return;
        }
        break;
      }
      case "PatternProperty": {
        // Shorthand `{ a } = value` binds `a`
        const parts = operands(node);
        if (parts[0]?.type.name === "PropertyName" && !parts.some((part) => PATTERN_TARGETS.has(part.type.name))) {
          this.declared.add(getText(parts[0], this.source));
        }
        break;
      }
      case "PropertyName":
      case "PropertyDefinition":
      case "PrivatePropertyDefinition":
      case "Label":
        return;
    }

    for (const child of childNodes(node)) this.visit(child);
  }

  private visitComputedKey(node: SyntaxNode): void {
    let inKey = false;
    for (const child of childNodes(node)) {
      const text = getText(child, this.source);
      if (text === "[") inKey = true;
      else if (text === "]") return;
      else if (inKey) this.visit(child);
      else if (child.type.name === "ParamList") return;
    }
  }

  finish(name: string): Scope {
    const declared = this.declared.values();
    const declaredSet = new Set(declared);
    const captured = new OrderedSet();
    for (const child of this.children) {
      for (const used of child.free) {
        if (declaredSet.has(used)) captured.add(used);
      }
    }
    const uses = this.uses.values();
    return {
      node: this.node,
      name,
      declared,
      uses,
      cells: captured.values(),
      free: uses.filter((used) => !declaredSet.has(used)),
      children: this.children,
    };
  }
}

const PATTERN_TARGETS = new Set(["VariableDefinition", "ObjectPattern", "ArrayPattern"]);

function hasSpread(node: SyntaxNode, source: string): boolean {
  for (const child of childNodes(node)) {
    if (getText(child, source) === "...") return true;
  }
  return false;
}

/**
 * Insertion-ordered set of names.
 */
class OrderedSet {
  private seen = new Set<string>();
  private order: string[] = [];

  add(value: string): void {
    if (this.seen.has(value)) return;
    this.seen.add(value);
    this.order.push(value);
  }

  values(): string[] {
    return [...this.order];
  }
}
