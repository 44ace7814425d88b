/**
 * Function source to instruction stream.
 *
 * Parses the text `Function.prototype.toString` gives for a function, method
 * or class and lowers its body to a stack-machine instruction stream. Nested
 * functions are compiled into child code objects; the parent only records the
 * closure it builds for them.
 *
 * Usage:
 *   const code = compileFunction("function f() { return g(1); }");
 *   disassemble(code.instructions);
 */

import type { SyntaxNode, Tree } from "@lezer/common";
import { CodeCompileError } from "../errors";
import { Instruction, InstructionKind, Operand, instr } from "./instruction";
import { Scope, analyzeScope, childScope } from "./scope";
import {
  LineIndex,
  childNodes,
  getChild,
  getText,
  hasSyntaxError,
  hasToken,
  isFunctionNode,
  isSyntaxNode,
  operands,
  parseSource,
  stringValue,
} from "./syntax";

// ============================================================================
// Code Objects
// ============================================================================

export interface CodeObject {
  readonly name: string;
  readonly fileName: string;
  readonly firstLine: number;
  readonly instructions: readonly Instruction[];
  /** Parameters and declarations. */
  readonly localNames: readonly string[];
  /** Locals captured by nested closures (internal captures). */
  readonly cellNames: readonly string[];
  /** Names captured from an enclosing function scope (external captures). */
  readonly freeNames: readonly string[];
  /** Free names resolved through the module scope. */
  readonly globalNames: readonly string[];
  /** Nested functions and class bodies, in source order. */
  readonly children: readonly CodeObject[];
}

export interface CompileOptions {
  /** Used when the source itself names nothing, e.g. an arrow function. */
  name?: string;
  fileName?: string;
  /** Line number of the first source line. Defaults to 1. */
  firstLine?: number;
  /** Names the function captures from an enclosing function scope. */
  enclosingNames?: Iterable<string>;
}

/**
 * Compile a function, arrow function, method or class from its source text.
 *
 * @throws CodeCompileError if the source is none of those
 */
export function compileFunction(source: string, options: CompileOptions = {}): CodeObject {
  const { text, root } = locateRoot(source);
  const state: CompileState = {
    source: text,
    lines: new LineIndex(text, options.firstLine ?? 1),
    fileName: options.fileName ?? "<unknown>",
    firstLine: options.firstLine ?? 1,
  };
  const scope = analyzeScope(root, text, options.name || "<anonymous>");
  return compileScope(scope, state, new Set(options.enclosingNames ?? []));
}

// ============================================================================
// Locating the Function Node
// ============================================================================

interface Wrapper {
  prefix: string;
  suffix: string;
  /** Node names to descend through below the parenthesized expression. */
  path: string[];
  accept: (node: SyntaxNode) => boolean;
}

const ROOT_KINDS = new Set(["FunctionExpression", "ArrowFunction", "ClassExpression"]);

const WRAPPERS: Wrapper[] = [
  // function f() {}, () => {}, class C {}
  { prefix: "(", suffix: ")", path: [], accept: (node) => ROOT_KINDS.has(node.type.name) },
  // method() {}, async method() {}, get x() {}
  { prefix: "({", suffix: "})", path: ["ObjectExpression"], accept: isFunctionNode },
  // static method() {}, #privateMethod() {}
  { prefix: "(class {", suffix: "})", path: ["ClassExpression", "ClassBody"], accept: isFunctionNode },
];

function locateRoot(source: string): { text: string; root: SyntaxNode } {
  const trimmed = source.trim();
  for (const wrapper of WRAPPERS) {
    const text = wrapper.prefix + trimmed + wrapper.suffix;
    const tree = parseSource(text);
    if (hasSyntaxError(tree)) continue;
    const root = findWrapped(tree, wrapper);
    if (root) return { text, root };
  }
  throw new CodeCompileError("Source is not a function, method or class", 0, source.length);
}

function findWrapped(tree: Tree, wrapper: Wrapper): SyntaxNode | null {
  const statement = getChild(tree.topNode, "ExpressionStatement");
  const paren = statement ? getChild(statement, "ParenthesizedExpression") : null;
  if (!paren) return null;
  let node: SyntaxNode | null = paren;
  for (const step of wrapper.path) {
    node = node ? getChild(node, step) : null;
  }
  if (!node) return null;
  const candidates = operands(node);
  if (candidates.length !== 1 || !wrapper.accept(candidates[0])) return null;
  return candidates[0];
}

// ============================================================================
// Scope Compilation
// ============================================================================

interface CompileState {
  source: string;
  lines: LineIndex;
  fileName: string;
  firstLine: number;
}

type NameKind = "cell" | "local" | "free" | "global";

function compileScope(scope: Scope, state: CompileState, capturable: ReadonlySet<string>): CodeObject {
  const freeNames = scope.free.filter((name) => capturable.has(name));
  const freeSet = new Set(freeNames);
  const lowering = new Lowering(scope, state, {
    cells: new Set(scope.cells),
    locals: new Set(scope.declared),
    free: freeSet,
  });
  lowering.lowerBody();

  return {
    name: scope.name,
    fileName: state.fileName,
    firstLine: state.firstLine,
    instructions: lowering.instructions,
    localNames: scope.declared,
    cellNames: scope.cells,
    freeNames,
    globalNames: scope.free.filter((name) => !freeSet.has(name)),
    children: lowering.children,
  };
}

const PATTERN_NODES = new Set(["VariableDefinition", "ObjectPattern", "ArrayPattern"]);

// Operator tokens are capitalized node types but never operands.
const OPERATOR_NODES = new Set([
  "Equals",
  "ArithOp",
  "LogicOp",
  "BitOp",
  "CompareOp",
  "UpdateOp",
  "Arrow",
  "ArrowOp",
  "Spread",
  "Star",
]);

const CONSTANT_NAMES = new Set(["undefined", "NaN", "Infinity"]);

function valueOperands(node: SyntaxNode): SyntaxNode[] {
  return operands(node).filter((child) => !OPERATOR_NODES.has(child.type.name));
}

function isStatement(node: SyntaxNode): boolean {
  const name = node.type.name;
  return name === "Block" || name.endsWith("Statement") || name.endsWith("Declaration");
}

interface Binding {
  /** Property read from the source object, for object patterns. */
  key: string | null;
  name: string;
  init: SyntaxNode | null;
}

class Lowering {
  readonly instructions: Instruction[] = [];
  readonly children: CodeObject[] = [];
  private lastLine: number | undefined;

  constructor(
    private scope: Scope,
    private state: CompileState,
    private names: { cells: ReadonlySet<string>; locals: ReadonlySet<string>; free: ReadonlySet<string> }
  ) {}

  // --------------------------------------------------------------------------
  // Emission
  // --------------------------------------------------------------------------

  private emit(kind: InstructionKind, operand: Operand, node: SyntaxNode): void {
    const line = this.state.lines.lineAt(node.from);
    const startsLine = line !== this.lastLine;
    this.lastLine = line;
    this.instructions.push(instr(kind, operand, startsLine ? line : undefined));
  }

  private text(node: SyntaxNode): string {
    return getText(node, this.state.source);
  }

  private resolve(name: string): NameKind {
    if (this.names.cells.has(name)) return "cell";
    if (this.names.locals.has(name)) return "local";
    if (this.names.free.has(name)) return "free";
    return "global";
  }

  private loadName(name: string, node: SyntaxNode): void {
    switch (this.resolve(name)) {
      case "cell":
      case "free":
        return this.emit("loadDeref", name, node);
      case "local":
        return this.emit("loadLocal", name, node);
      case "global":
        if (CONSTANT_NAMES.has(name)) return this.emit("loadConst", name === "undefined" ? undefined : name, node);
        return this.emit("loadGlobal", name, node);
    }
  }

  private storeName(name: string, node: SyntaxNode): void {
    switch (this.resolve(name)) {
      case "cell":
      case "free":
        return this.emit("storeDeref", name, node);
      case "local":
        return this.emit("storeLocal", name, node);
      case "global":
        return this.emit("storeGlobal", name, node);
    }
  }

  // --------------------------------------------------------------------------
  // Bodies
  // --------------------------------------------------------------------------

  lowerBody(): void {
    const node = this.scope.node;
    switch (node.type.name) {
      case "ClassBody":
        this.lowerClassMembers(node);
        return;
      case "ClassExpression":
        this.lowerClass(node);
        this.emit("return", undefined, node);
        return;
    }

    const params = getChild(node, "ParamList");
    if (params) this.lowerParamDefaults(params);

    const body = getChild(node, "Block");
    if (body) {
      this.lowerStatements(body);
      const last = this.instructions[this.instructions.length - 1];
      if (last?.kind !== "return") {
        this.emit("loadConst", undefined, body.lastChild ?? body);
        this.emit("return", undefined, body.lastChild ?? body);
      }
      return;
    }

    // Arrow function with an expression body
    const parts = valueOperands(node).filter((child) => child.type.name !== "ParamList" && child.type.name !== "VariableDefinition");
    const expression = parts[parts.length - 1];
    if (!expression) {
      throw new CodeCompileError("Function has no body", node.from, node.to, node.type.name);
    }
    this.lowerExpr(expression);
    this.emit("return", undefined, expression);
  }

  private lowerParamDefaults(params: SyntaxNode): void {
    for (const { target, init } of pairTargets(params)) {
      if (!init) continue;
      this.lowerExpr(init);
      for (const binding of patternBindings(target, this.state.source)) {
        this.emit("storeDefault", binding.name, init);
      }
    }
  }

  private lowerClassMembers(body: SyntaxNode): void {
    for (const member of operands(body)) {
      switch (member.type.name) {
        case "MethodDeclaration":
          this.makeFunction(member);
          this.emit("storeAttr", this.memberName(member), member);
          break;
        case "PropertyDeclaration": {
          const init = pairTargets(member, true)[0]?.init;
          if (init) {
            this.lowerExpr(init);
            this.emit("storeAttr", this.memberName(member), member);
          }
          break;
        }
        default:
          this.lowerAny(member);
      }
    }
  }

  private memberName(member: SyntaxNode): string {
    const key = getChild(member, "PropertyDefinition") ?? getChild(member, "PrivatePropertyDefinition");
    return key ? this.text(key) : "<computed>";
  }

  // --------------------------------------------------------------------------
  // Statements
  // --------------------------------------------------------------------------

  private lowerStatements(block: SyntaxNode): void {
    for (const statement of operands(block)) this.lowerStatement(statement);
  }

  private lowerAny(node: SyntaxNode): void {
    if (isStatement(node)) this.lowerStatement(node);
    else this.lowerExpr(node);
  }

  private lowerStatement(node: SyntaxNode): void {
    const parts = valueOperands(node);

    switch (node.type.name) {
      case "Block":
        this.lowerStatements(node);
        return;

      case "ExpressionStatement":
        for (const part of parts) this.lowerEffect(part);
        return;

      case "VariableDeclaration":
        for (const { target, init } of pairTargets(node)) {
          if (init) this.assign(target, init);
        }
        return;

      case "ReturnStatement":
        if (parts.length > 0) this.lowerExpr(parts[0]);
        else this.emit("loadConst", undefined, node);
        this.emit("return", undefined, node);
        return;

      case "IfStatement": {
        const [test, consequent, alternate] = parts;
        this.lowerExpr(test);
        this.emit("branch", "if", test);
        if (consequent) this.lowerStatement(consequent);
        if (alternate) {
          this.emit("jump", "else", alternate);
          this.lowerStatement(alternate);
        }
        return;
      }

      case "WhileStatement": {
        const [test, body] = parts;
        this.lowerExpr(test);
        this.emit("branch", "while", test);
        if (body) this.lowerStatement(body);
        this.emit("jump", "loop", node);
        return;
      }

      case "DoStatement": {
        const [body, test] = parts;
        this.lowerStatement(body);
        if (test) {
          this.lowerExpr(test);
          this.emit("branch", "do", test);
        }
        return;
      }

      case "ForStatement":
        this.lowerFor(node, parts);
        return;

      case "TryStatement":
        this.emit("enterTry", undefined, node);
        for (const part of parts) {
          if (part.type.name === "CatchClause") this.lowerCatch(part);
          else this.lowerStatements(part.type.name === "FinallyClause" ? getChild(part, "Block") ?? part : part);
        }
        return;

      case "ThrowStatement":
        this.lowerExpr(parts[0]);
        this.emit("throw", undefined, node);
        return;

      case "SwitchStatement": {
        const [discriminant, body] = parts;
        this.lowerExpr(discriminant);
        if (body) {
          for (const item of operands(body)) {
            if (item.type.name === "CaseLabel") {
              for (const value of valueOperands(item)) this.lowerExpr(value);
              this.emit("branch", "case", item);
            } else if (item.type.name !== "DefaultLabel") {
              this.lowerStatement(item);
            }
          }
        }
        this.emit("pop", undefined, node);
        return;
      }

      case "LabeledStatement": {
        const body = parts[parts.length - 1];
        if (body) this.lowerStatement(body);
        return;
      }

      case "BreakStatement":
      case "ContinueStatement":
        this.emit("jump", node.type.name === "BreakStatement" ? "break" : "continue", node);
        return;

      case "FunctionDeclaration":
        this.makeFunction(node);
        this.storeName(this.scopeName(node), node);
        return;

      case "ClassDeclaration":
        this.lowerClass(node);
        this.storeName(this.scopeName(node), node);
        return;

      case "DebuggerStatement":
      case "TypeAliasDeclaration":
      case "InterfaceDeclaration":
      case "AmbientDeclaration":
        return;
    }

    if (isStatement(node)) {
      for (const part of parts) this.lowerAny(part);
      return;
    }
    this.lowerExpr(node);
    this.emit("pop", undefined, node);
  }

  private lowerFor(node: SyntaxNode, parts: SyntaxNode[]): void {
    const spec = parts.find((part) => part.type.name.startsWith("For"));
    const body = parts[parts.length - 1];

    if (spec && (spec.type.name === "ForOfSpec" || spec.type.name === "ForInSpec")) {
      const specParts = valueOperands(spec);
      const iterable = specParts[specParts.length - 1];
      const target = specParts[0];
      this.lowerExpr(iterable);
      this.emit("getIterator", spec.type.name === "ForOfSpec" ? "of" : "in", spec);
      if (target && specParts.length > 1) this.storeTarget(target);
    } else if (spec) {
      for (const part of valueOperands(spec)) {
        if (part.type.name === "VariableDeclaration") {
          this.lowerStatement(part);
        } else {
          this.lowerEffect(part);
        }
      }
    }

    if (body && !body.type.name.startsWith("For")) this.lowerStatement(body);
    this.emit("jump", "loop", node);
  }

  private lowerCatch(clause: SyntaxNode): void {
    for (const part of valueOperands(clause)) {
      if (PATTERN_NODES.has(part.type.name)) this.storeTarget(part);
      else if (part.type.name === "Block") this.lowerStatements(part);
    }
  }

  /**
   * Bind a target to whatever the previous instruction produced.
   */
  private storeTarget(target: SyntaxNode): void {
    if (target.type.name === "VariableName") {
      this.storeName(this.text(target), target);
      return;
    }
    if (target.type.name === "MemberExpression") {
      this.assign(target, null);
      return;
    }
    for (const binding of patternBindings(target, this.state.source)) {
      this.storeName(binding.name, target);
    }
  }

  // --------------------------------------------------------------------------
  // Assignment
  // --------------------------------------------------------------------------

  /**
   * Evaluate `value` (when given) and store it into `target`.
   */
  private assign(target: SyntaxNode, value: SyntaxNode | null): void {
    const name = target.type.name;

    if (name === "VariableDefinition" || name === "VariableName") {
      if (value) this.lowerExpr(value);
      this.storeName(this.text(target), target);
      return;
    }

    if (name === "MemberExpression") {
      if (value) this.lowerExpr(value);
      const member = this.splitMember(target);
      this.lowerExpr(member.object);
      if (member.index) {
        this.lowerExpr(member.index);
        this.emit("storeSubscript", undefined, target);
      } else {
        this.emit("storeAttr", member.property, target);
      }
      return;
    }

    this.destructure(target, value);
  }

  private destructure(pattern: SyntaxNode, value: SyntaxNode | null): void {
    const bindings = patternBindings(pattern, this.state.source);
    const moduleName = value ? this.importSpecifier(value) : null;

    if (moduleName !== null && pattern.type.name === "ObjectPattern" && value) {
      this.emit("importName", moduleName, value);
      for (const binding of bindings) {
        if (binding.key === null) continue;
        this.emit("importFrom", binding.key, pattern);
        this.storeName(binding.name, pattern);
      }
      this.emit("pop", undefined, pattern);
      return;
    }

    if (value) this.lowerExpr(value);
    this.emit("unpack", bindings.length, pattern);
    for (const binding of bindings) {
      if (binding.init) {
        this.lowerExpr(binding.init);
        this.emit("storeDefault", binding.name, binding.init);
      } else {
        this.storeName(binding.name, pattern);
      }
    }
  }

  // --------------------------------------------------------------------------
  // Expressions
  // --------------------------------------------------------------------------

  private lowerExpr(node: SyntaxNode): void {
    const name = node.type.name;
    const text = this.text(node);

    switch (name) {
      case "Number": {
        const value = Number(text.replace(/_/g, ""));
        this.emit("loadConst", Number.isNaN(value) ? text : value, node);
        return;
      }
      case "String":
        this.emit("loadConst", stringValue(text), node);
        return;
      case "BooleanLiteral":
        this.emit("loadConst", text === "true", node);
        return;
      case "null":
        this.emit("loadConst", null, node);
        return;
      case "RegExp":
        this.emit("loadConst", text, node);
        return;
      case "TemplateString":
        this.lowerTemplate(node);
        return;
      case "VariableName":
        this.loadName(text, node);
        return;
      case "this":
        this.emit("loadLocal", "this", node);
        return;
      case "ParenthesizedExpression": {
        const inner = valueOperands(node);
        for (let i = 0; i < inner.length; i++) {
          this.lowerExpr(inner[i]);
          if (i < inner.length - 1) this.emit("pop", undefined, inner[i]);
        }
        return;
      }
      case "SequenceExpression": {
        const items = valueOperands(node);
        items.forEach((item, i) => {
          this.lowerExpr(item);
          if (i < items.length - 1) this.emit("pop", undefined, item);
        });
        return;
      }
      case "MemberExpression": {
        const member = this.splitMember(node);
        this.lowerExpr(member.object);
        if (member.index) {
          this.lowerExpr(member.index);
          this.emit("loadSubscript", undefined, node);
        } else {
          this.emit("loadAttr", member.property, node);
        }
        return;
      }
      case "CallExpression":
        this.lowerCall(node);
        return;
      case "NewExpression": {
        const [callee] = valueOperands(node);
        this.lowerExpr(callee);
        const argc = this.lowerArgs(getChild(node, "ArgList"));
        this.emit("construct", argc, node);
        return;
      }
      case "TaggedTemplateExpression": {
        const [tag, template] = valueOperands(node);
        this.lowerExpr(tag);
        if (template) this.lowerExpr(template);
        this.emit("call", 1, node);
        return;
      }
      case "UnaryExpression":
      case "PostfixExpression":
        this.lowerUnary(node);
        return;
      case "AwaitExpression":
      case "YieldExpression": {
        const [argument] = valueOperands(node);
        if (argument) this.lowerExpr(argument);
        else this.emit("loadConst", undefined, node);
        this.emit(name === "AwaitExpression" ? "await" : "yield", undefined, node);
        return;
      }
      case "BinaryExpression":
        this.lowerBinary(node);
        return;
      case "ConditionalExpression": {
        const [test, consequent, alternate] = valueOperands(node);
        this.lowerExpr(test);
        this.emit("branch", "?", test);
        this.lowerExpr(consequent);
        this.emit("jump", ":", alternate ?? node);
        if (alternate) this.lowerExpr(alternate);
        return;
      }
      case "AssignmentExpression":
        this.lowerAssignment(node, true);
        return;
      case "ArrayExpression": {
        const items = valueOperands(node);
        for (const item of items) this.lowerExpr(item);
        this.emit("buildArray", items.length, node);
        return;
      }
      case "ObjectExpression": {
        const properties = operands(node).filter((child) => child.type.name === "Property");
        for (const property of properties) this.lowerProperty(property);
        this.emit("buildObject", properties.length, node);
        return;
      }
      case "ArrowFunction":
      case "FunctionExpression":
        this.makeFunction(node);
        return;
      case "ClassExpression":
        this.lowerClass(node);
        return;
    }

    // Anything else: evaluate the parts in order, then consume them.
    for (const part of valueOperands(node)) this.lowerAny(part);
    this.emit("evaluate", name, node);
  }

  private lowerTemplate(node: SyntaxNode): void {
    const parts: SyntaxNode[] = [];
    for (const child of operands(node)) {
      if (child.type.name === "Interpolation") {
        parts.push(...valueOperands(child).filter((part) => !part.type.name.startsWith("Interpolation")));
      }
    }
    if (parts.length === 0) {
      this.emit("loadConst", this.text(node).slice(1, -1), node);
      return;
    }
    for (const part of parts) this.lowerExpr(part);
    this.emit("buildTemplate", parts.length, node);
  }

  private lowerCall(node: SyntaxNode): void {
    const moduleName = this.importSpecifier(node);
    if (moduleName !== null) {
      this.emit("importName", moduleName, node);
      return;
    }

    const [callee] = valueOperands(node);
    const args = getChild(node, "ArgList");
    if (callee.type.name === "MemberExpression") {
      const member = this.splitMember(callee);
      if (!member.index) {
        this.lowerExpr(member.object);
        this.emit("loadMethod", member.property, callee);
        const argc = this.lowerArgs(args);
        this.emit("callMethod", argc, node);
        return;
      }
    }
    this.lowerExpr(callee);
    const argc = this.lowerArgs(args);
    this.emit("call", argc, node);
  }

  private lowerArgs(args: SyntaxNode | null): number {
    if (!args) return 0;
    const values = valueOperands(args);
    for (const value of values) this.lowerExpr(value);
    return values.length;
  }

  /**
   * `require("m")` and `import("m")` with a literal module name.
   */
  private importSpecifier(node: SyntaxNode): string | null {
    if (node.type.name !== "CallExpression") return null;
    const [callee] = valueOperands(node);
    if (!callee) return null;
    const isImport = callee.type.name === "import";
    const isRequire =
      callee.type.name === "VariableName" && this.text(callee) === "require" && this.resolve("require") === "global";
    if (!isImport && !isRequire) return null;

    const args = valueOperands(getChild(node, "ArgList") ?? node);
    if (args.length !== 1 || args[0].type.name !== "String") return null;
    return stringValue(this.text(args[0]));
  }

  private lowerUnary(node: SyntaxNode): void {
    const [argument] = valueOperands(node);
    const operator = this.unaryOperator(node);

    if (operator === "delete" && argument) {
      if (argument.type.name === "VariableName" && this.resolve(this.text(argument)) === "local") {
        this.emit("deleteLocal", this.text(argument), node);
        return;
      }
      if (argument.type.name === "MemberExpression") {
        const member = this.splitMember(argument);
        this.lowerExpr(member.object);
        if (member.index) {
          this.lowerExpr(member.index);
          this.emit("unaryOp", "delete", node);
        } else {
          this.emit("deleteAttr", member.property, node);
        }
        return;
      }
    }

    if (argument) this.lowerExpr(argument);
    this.emit("unaryOp", operator, node);
    if ((operator === "++" || operator === "--") && argument) {
      if (argument.type.name === "VariableName") this.storeName(this.text(argument), argument);
    }
  }

  private unaryOperator(node: SyntaxNode): string {
    for (const child of childNodes(node)) {
      if (!isSyntaxNode(child) || OPERATOR_NODES.has(child.type.name)) return this.text(child);
    }
    return node.type.name;
  }

  private lowerBinary(node: SyntaxNode): void {
    const [left, right] = valueOperands(node);
    let operator = "?";
    for (const child of childNodes(node)) {
      if (!isSyntaxNode(child) || OPERATOR_NODES.has(child.type.name)) {
        operator = this.text(child);
        break;
      }
    }

    this.lowerExpr(left);
    if (operator === "&&" || operator === "||" || operator === "??") {
      this.emit("branch", operator, node);
      if (right) this.lowerExpr(right);
      return;
    }
    if (right) this.lowerExpr(right);
    this.emit("binaryOp", operator, node);
  }

  /**
   * Lower an expression whose value is discarded.
   */
  private lowerEffect(node: SyntaxNode): void {
    if (node.type.name === "AssignmentExpression") this.lowerAssignment(node, false);
    else this.lowerExpr(node);
    this.emit("pop", undefined, node);
  }

  /**
   * With `asValue`, the assigned value is duplicated before the store, so it
   * stays on the stack as the expression's result.
   */
  private lowerAssignment(node: SyntaxNode, asValue: boolean): void {
    const parts = valueOperands(node);
    const target = parts[0];
    const value = parts[parts.length - 1];
    const update = getChild(node, "UpdateOp");

    if (!update) {
      if (asValue) {
        this.lowerExpr(value);
        this.emit("dup", undefined, node);
        this.assign(target, null);
      } else {
        this.assign(target, value);
      }
      return;
    }

    const operator = this.text(update);
    if (target.type.name === "MemberExpression") {
      const member = this.splitMember(target);
      if (!member.index) {
        this.lowerExpr(member.object);
        this.emit("loadAttr", member.property, target);
        this.lowerExpr(value);
        this.emit("binaryOp", operator, node);
        this.lowerExpr(member.object);
        this.emit("storeAttr", member.property, target);
        return;
      }
    }
    this.lowerExpr(target);
    this.lowerExpr(value);
    this.emit("binaryOp", operator, node);
    this.storeTarget(target);
  }

  private lowerProperty(property: SyntaxNode): void {
    if (isFunctionNode(property)) {
      this.makeFunction(property);
      return;
    }

    const parts = valueOperands(property);
    if (hasToken(property, this.state.source, "...")) {
      for (const part of parts) this.lowerExpr(part);
      return;
    }

    const [key, value] = parts;
    if (!key) return;
    if (hasToken(property, this.state.source, "[")) {
      this.lowerExpr(key);
    } else if (key.type.name === "PropertyDefinition") {
      this.emit("loadConst", this.text(key), key);
      if (!value) {
        // Shorthand `{ a }`
        this.loadName(this.text(key), key);
        return;
      }
    } else {
      this.lowerExpr(key);
    }
    if (value) this.lowerExpr(value);
  }

  private splitMember(node: SyntaxNode): { object: SyntaxNode; property: string; index: SyntaxNode | null } {
    const parts = valueOperands(node);
    const object = parts[0];
    if (hasToken(node, this.state.source, "[")) {
      return { object, property: "", index: parts[1] ?? null };
    }
    const last = parts[parts.length - 1];
    return { object, property: parts.length > 1 ? this.text(last) : "", index: null };
  }

  // --------------------------------------------------------------------------
  // Nested Functions and Classes
  // --------------------------------------------------------------------------

  private scopeName(node: SyntaxNode): string {
    const definition = getChild(node, "VariableDefinition");
    return definition ? this.text(definition) : "<anonymous>";
  }

  private compileNested(node: SyntaxNode): CodeObject {
    const nested = childScope(this.scope, node);
    if (!nested) {
      throw new CodeCompileError("No scope recorded for nested function", node.from, node.to, node.type.name);
    }
    const capturable = new Set([...this.names.cells, ...this.names.free]);
    const code = compileScope(nested, this.state, capturable);
    this.children.push(code);
    return code;
  }

  /**
   * Build the closure cells a nested scope captures from this one.
   */
  private buildClosure(code: CodeObject, node: SyntaxNode): void {
    for (const name of code.freeNames) this.emit("loadClosure", name, node);
    if (code.freeNames.length > 0) this.emit("buildClosure", code.freeNames.length, node);
  }

  private makeFunction(node: SyntaxNode): void {
    const code = this.compileNested(node);
    this.buildClosure(code, node);
    this.emit("makeFunction", code.name, node);
  }

  private lowerClass(node: SyntaxNode): void {
    let inHeritage = false;
    let body: SyntaxNode | null = null;
    for (const child of childNodes(node)) {
      if (child.type.name === "ClassBody") {
        body = child;
      } else if (this.text(child) === "extends") {
        inHeritage = true;
      } else if (inHeritage && isSyntaxNode(child)) {
        this.lowerExpr(child);
        this.emit("evaluate", "extends", child);
        inHeritage = false;
      }
    }
    if (!body) return;
    const code = this.compileNested(body);
    this.buildClosure(code, body);
    this.emit("makeClass", code.name, node);
  }
}

// ============================================================================
// Patterns
// ============================================================================

/**
 * Split a declarator list, parameter list or array pattern into targets and
 * their initializers.
 *
 * With `keyed`, property keys count as targets too (class fields).
 */
function pairTargets(node: SyntaxNode, keyed = false): { target: SyntaxNode; init: SyntaxNode | null }[] {
  const pairs: { target: SyntaxNode; init: SyntaxNode | null }[] = [];
  let expectInit = false;
  for (const child of childNodes(node)) {
    const name = child.type.name;
    if (name === "Equals") {
      expectInit = true;
    } else if (expectInit && isSyntaxNode(child)) {
      const last = pairs[pairs.length - 1];
      if (last) last.init = child;
      expectInit = false;
    } else if (PATTERN_NODES.has(name) || (keyed && (name === "PropertyDefinition" || name === "PrivatePropertyDefinition"))) {
      pairs.push({ target: child, init: null });
    }
  }
  return pairs;
}

const KEY_NODES = new Set(["PropertyName", "PropertyDefinition", "String", "Number"]);

/**
 * Flatten a binding pattern into the names it binds.
 */
function patternBindings(pattern: SyntaxNode, source: string): Binding[] {
  switch (pattern.type.name) {
    case "VariableDefinition":
    case "VariableName":
      return [{ key: null, name: getText(pattern, source), init: null }];

    case "ArrayPattern":
      return pairTargets(pattern).flatMap(({ target, init }) =>
        target.type.name === "VariableDefinition"
          ? [{ key: null, name: getText(target, source), init }]
          : patternBindings(target, source)
      );

    case "ObjectPattern":
      return operands(pattern).flatMap((property) => {
        if (property.type.name === "VariableDefinition") {
          // Rest element `...rest`
          return [{ key: null, name: getText(property, source), init: null }];
        }
        return property.type.name === "PatternProperty" ? propertyBindings(property, source) : [];
      });
  }
  return [];
}

function propertyBindings(property: SyntaxNode, source: string): Binding[] {
  const parts = operands(property).filter((child) => !OPERATOR_NODES.has(child.type.name));
  const keyNode = parts[0] && KEY_NODES.has(parts[0].type.name) ? parts[0] : null;
  const key = keyNode ? keyText(keyNode, source) : null;
  const init = pairTargets(property)[0]?.init ?? defaultAfterEquals(property);
  const targets = parts.filter((child) => PATTERN_NODES.has(child.type.name));

  if (hasToken(property, source, "...")) {
    return targets.flatMap((target) => patternBindings(target, source));
  }
  if (targets.length === 0) {
    return key === null ? [] : [{ key, name: key, init }];
  }
  const [target] = targets;
  if (target.type.name === "VariableDefinition") {
    const name = getText(target, source);
    return [{ key: key ?? name, name, init }];
  }
  return patternBindings(target, source);
}

function defaultAfterEquals(node: SyntaxNode): SyntaxNode | null {
  const equals = getChild(node, "Equals");
  let next = equals?.nextSibling ?? null;
  while (next && !isSyntaxNode(next)) next = next.nextSibling;
  return next;
}

function keyText(node: SyntaxNode, source: string): string {
  const text = getText(node, source);
  return node.type.name === "String" ? stringValue(text) : text;
}
