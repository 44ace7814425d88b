/**
 * Tests for building a callable's binding context.
 */
import { describe, it, expect } from "vitest";

import { Callable, CodeObject, ContractViolation, buildContext, concrete, partialName } from "../src/index";

function code(parts: Partial<CodeObject> = {}): CodeObject {
  return {
    name: "fn",
    fileName: "/srv/app.js",
    firstLine: 1,
    instructions: [],
    localNames: [],
    cellNames: [],
    freeNames: [],
    globalNames: [],
    children: [],
    ...parts,
  };
}

describe("buildContext", () => {
  it("shares the module scope without copying it", () => {
    const globals = { a: 1 };
    const context = buildContext({ code: code(), globals, closure: [] });
    expect(context.globalBindings).toBe(globals);
  });

  it("binds internal captures to their own names", () => {
    const context = buildContext({ code: code({ cellNames: ["x", "y"] }), globals: {}, closure: [] });
    expect([...context.cellBindings]).toEqual([
      ["x", partialName("x")],
      ["y", partialName("y")],
    ]);
  });

  it("pairs external captures with closure values in order", () => {
    const context = buildContext({ code: code({ freeNames: ["first", "second"] }), globals: {}, closure: [1, "two"] });
    expect(context.cellBindings.get("first")).toEqual(concrete(1));
    expect(context.cellBindings.get("second")).toEqual(concrete("two"));
  });

  it("rejects a closure shorter than the capture list", () => {
    const callable: Callable = { code: code({ freeNames: ["a", "b"] }), globals: {}, closure: [1] };
    expect(() => buildContext(callable)).toThrow(ContractViolation);
    expect(() => buildContext(callable)).toThrow("fn captures 2 variable(s) but its closure holds 1");
  });

  it("rejects a closure longer than the capture list", () => {
    const callable: Callable = { code: code(), globals: {}, closure: [1] };
    expect(() => buildContext(callable)).toThrow(ContractViolation);
  });

  it("rejects a name that is both an internal and an external capture", () => {
    const callable: Callable = { code: code({ cellNames: ["x"], freeNames: ["x"] }), globals: {}, closure: [0] };
    expect(() => buildContext(callable)).toThrow('Capture "x" is declared twice in fn');
  });

  it("starts with no locals for a plain function", () => {
    expect(buildContext({ code: code(), globals: {}, closure: [] }).localBindings.size).toBe(0);
  });

  it("binds the receiver of a bound method as this", () => {
    const receiver = { id: 1 };
    const context = buildContext({ code: code(), globals: {}, closure: [], bound: { receiver } });
    expect([...context.localBindings]).toEqual([["this", concrete(receiver)]]);
  });

  it("gives equal contexts for equal input", () => {
    const callable: Callable = { code: code({ cellNames: ["c"], freeNames: ["f"] }), globals: {}, closure: [3] };
    expect(buildContext(callable)).toEqual(buildContext(callable));
  });
});
