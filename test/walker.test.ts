/**
 * Tests for the reference walker, driven by hand-built instruction streams.
 */
import { describe, it, expect } from "vitest";

import {
  CodeContext,
  CollectingSink,
  Instruction,
  concrete,
  createTableResolver,
  extractReferences,
  instr,
  partialName,
  referenceValues,
} from "../src/index";
import {
  deleteLocal,
  importFrom,
  importName,
  loadAttr,
  loadConst,
  loadDeref,
  loadGlobal,
  loadLocal,
  loadMethod,
  storeLocal,
} from "../src/code/instruction";

function context(parts: Partial<CodeContext> = {}): CodeContext {
  return {
    globalBindings: parts.globalBindings ?? {},
    cellBindings: parts.cellBindings ?? new Map(),
    localBindings: parts.localBindings ?? new Map(),
  };
}

function walk(instructions: Instruction[], ctx: CodeContext = context(), sink = new CollectingSink()) {
  return extractReferences(instructions, ctx, { sink, resolveModule: createTableResolver({}) });
}

describe("empty and literal streams", () => {
  it("returns nothing for a stream that only returns a literal", () => {
    expect(walk([loadConst(1), instr("return")])).toEqual([]);
  });

  it("returns nothing for an empty stream", () => {
    expect(walk([])).toEqual([]);
  });
});

describe("global loads", () => {
  it("resolves a bound global to its value", () => {
    const refs = walk([loadGlobal("answer"), instr("return")], context({ globalBindings: { answer: 42 } }));
    expect(refs).toEqual([concrete(42)]);
    expect(referenceValues(refs)).toEqual([42]);
  });

  it("keeps an unbound global as its name", () => {
    const refs = walk([loadGlobal("g"), instr("call", 0), instr("return")]);
    expect(refs).toEqual([partialName("g")]);
  });

  it("resolves a global bound to undefined as a value", () => {
    const refs = walk([loadGlobal("nothing")], context({ globalBindings: { nothing: undefined } }));
    expect(refs).toEqual([concrete(undefined)]);
  });

  it("does not resolve names inherited from Object.prototype", () => {
    expect(walk([loadGlobal("toString")])).toEqual([partialName("toString")]);
  });

  it("reads globals by reference, not from a snapshot", () => {
    const globals: Record<string, unknown> = {};
    const ctx = context({ globalBindings: globals });
    globals.late = "bound later";
    expect(walk([loadGlobal("late")], ctx)).toEqual([concrete("bound later")]);
  });
});

describe("captured variables", () => {
  it("yields the captured value of an external capture", () => {
    const ctx = context({ cellBindings: new Map([["captured", concrete("42")]]) });
    expect(referenceValues(walk([loadDeref("captured"), instr("return")], ctx))).toEqual(["42"]);
  });

  it("yields the name of an internal capture", () => {
    const ctx = context({ cellBindings: new Map([["cellVal", partialName("cellVal")]]) });
    const refs = walk([instr("loadClosure", "cellVal"), instr("buildClosure", 1), instr("makeFunction", "inner")], ctx);
    expect(refs).toEqual([partialName("cellVal")]);
  });

  it("reports a capture with no binding and drops it", () => {
    const sink = new CollectingSink();
    const refs = walk([loadDeref("missing"), instr("return")], context(), sink);
    expect(refs).toEqual([]);
    expect(sink.diagnostics).toHaveLength(1);
    expect(sink.diagnostics[0].message).toBe('ResolutionFailure: No captured variable named "missing"');
  });
});

describe("attribute chains", () => {
  const config = { db: { host: "localhost" } };

  it("follows attributes of a concrete value", () => {
    const refs = walk([loadGlobal("config"), loadAttr("db"), loadAttr("host"), instr("return")], context({ globalBindings: { config } }));
    expect(refs).toEqual([concrete("localhost")]);
  });

  it("joins attributes of an unresolved name into a dotted path", () => {
    const refs = walk([loadGlobal("a"), loadAttr("b"), loadAttr("c"), instr("return")]);
    expect(refs).toEqual([partialName("a.b.c")]);
  });

  it("emits a bare attribute name when nothing is pending", () => {
    const refs = walk([loadConst(1), loadAttr("toFixed"), instr("return")]);
    expect(refs).toEqual([partialName("toFixed")]);
  });

  it("treats method loads like attribute loads", () => {
    const helper = { run() {} };
    const refs = walk(
      [loadGlobal("helper"), loadMethod("run"), instr("callMethod", 0), instr("pop")],
      context({ globalBindings: { helper } })
    );
    expect(refs).toEqual([concrete(helper.run)]);
  });

  it("resolves attributes of primitives through their wrappers", () => {
    const refs = walk([loadGlobal("label"), loadAttr("length")], context({ globalBindings: { label: "abc" } }));
    expect(refs).toEqual([concrete(3)]);
  });
});

describe("locals", () => {
  it("tracks a stored value through a later load", () => {
    class MyClass {
      logVal() {}
    }
    const refs = walk(
      [
        loadGlobal("MyClass"),
        instr("construct", 0),
        storeLocal("myClass"),
        loadLocal("myClass"),
        loadMethod("logVal"),
        instr("callMethod", 0),
        instr("pop"),
      ],
      context({ globalBindings: { MyClass } })
    );
    expect(referenceValues(refs)).toEqual([MyClass, "logVal"]);
  });

  it("keeps the attribute on the receiver when the local is bound", () => {
    const service = { start() {} };
    const refs = walk(
      [loadGlobal("service"), storeLocal("s"), loadLocal("s"), loadMethod("start"), instr("callMethod", 0)],
      context({ globalBindings: { service } })
    );
    expect(refs).toEqual([concrete(service.start)]);
  });

  it("ignores a store when nothing is pending", () => {
    const refs = walk([loadConst(1), storeLocal("x"), loadLocal("x"), loadAttr("y")]);
    expect(refs).toEqual([partialName("y")]);
  });

  it("forgets a deleted local", () => {
    const refs = walk([
      loadGlobal("a"),
      storeLocal("x"),
      loadGlobal("b"),
      deleteLocal("x"),
      loadLocal("x"),
      loadAttr("y"),
    ]);
    expect(refs).toEqual([partialName("y")]);
  });

  it("resolves the receiver of a bound method", () => {
    const receiver = { value: 7 };
    const ctx = context({ localBindings: new Map([["this", concrete(receiver)]]) });
    expect(walk([loadLocal("this"), loadAttr("value"), instr("return")], ctx)).toEqual([concrete(7)]);
  });

  it("does not write to the context's local table", () => {
    const localBindings = new Map([["this", concrete({})]]);
    walk([loadGlobal("a"), storeLocal("tmp"), loadGlobal("b"), deleteLocal("this")], context({ localBindings }));
    expect([...localBindings.keys()]).toEqual(["this"]);
  });
});

describe("imports", () => {
  const fakeModule = { helper: () => 1 };

  it("resolves an imported module", () => {
    const refs = extractReferences([importName("m"), instr("return")], context(), {
      sink: new CollectingSink(),
      resolveModule: createTableResolver({ m: fakeModule }),
    });
    expect(refs).toEqual([concrete(fakeModule)]);
  });

  it("falls back to the module name when it cannot be loaded", () => {
    const sink = new CollectingSink();
    const refs = walk([importName("m"), instr("return")], context(), sink);
    expect(refs).toEqual([partialName("m")]);
    expect(sink.diagnostics.map((d) => [d.code, d.severity])).toEqual([["unresolved-import", "info"]]);
    expect(sink.warnings()).toEqual([]);
  });

  it("resolves members imported from a module", () => {
    const refs = extractReferences([importName("m"), importFrom("helper"), storeLocal("helper"), instr("pop")], context(), {
      sink: new CollectingSink(),
      resolveModule: createTableResolver({ m: fakeModule }),
    });
    expect(refs).toEqual([]);

    const used = extractReferences(
      [importName("m"), importFrom("helper"), storeLocal("helper"), instr("pop"), loadLocal("helper"), instr("call", 0)],
      context(),
      { sink: new CollectingSink(), resolveModule: createTableResolver({ m: fakeModule }) }
    );
    expect(used).toEqual([concrete(fakeModule.helper)]);
  });

  it("chains member names onto an unresolved module", () => {
    const refs = walk([importName("m"), importFrom("helper"), storeLocal("helper"), loadLocal("helper"), instr("call", 0)]);
    expect(refs).toEqual([partialName("m.helper")]);
  });
});

describe("ordering", () => {
  it("emits references in commit order without deduplicating", () => {
    const refs = walk([
      loadGlobal("b"),
      instr("call", 0),
      loadGlobal("a"),
      instr("call", 0),
      loadGlobal("b"),
      instr("call", 0),
    ]);
    expect(referenceValues(refs)).toEqual(["b", "a", "b"]);
  });

  it("commits a pending value when the next load replaces it", () => {
    const refs = walk([loadGlobal("first"), loadGlobal("second")]);
    expect(referenceValues(refs)).toEqual(["first", "second"]);
  });

  it("commits the pending value after the last instruction", () => {
    expect(walk([loadGlobal("tail")])).toEqual([partialName("tail")]);
  });
});

describe("fault containment", () => {
  const faulty = {
    get broken(): number {
      throw new Error("getter failed");
    },
  };

  it("reports a failing attribute lookup once and keeps walking", () => {
    const sink = new CollectingSink();
    const refs = walk(
      [
        loadGlobal("before"),
        instr("call", 0),
        loadGlobal("faulty", 3),
        loadAttr("broken"),
        loadAttr("more"),
        loadGlobal("after", 4),
        instr("call", 0),
      ],
      context({ globalBindings: { faulty } }),
      sink
    );
    expect(referenceValues(refs)).toEqual(["before", "more", "after"]);
    expect(sink.diagnostics).toHaveLength(1);
    expect(sink.diagnostics[0]).toMatchObject({
      code: "unresolved-reference",
      severity: "warning",
      line: 3,
      message: "Error: getter failed",
    });
  });

  it("reports a missing attribute", () => {
    const sink = new CollectingSink();
    const refs = walk([loadGlobal("obj"), loadAttr("nope"), instr("return")], context({ globalBindings: { obj: {} } }), sink);
    expect(refs).toEqual([]);
    expect(sink.diagnostics[0].message).toBe('ResolutionFailure: [object] has no attribute "nope"');
  });

  it("reports attribute access on null", () => {
    const sink = new CollectingSink();
    walk([loadGlobal("value"), loadAttr("x")], context({ globalBindings: { value: null } }), sink);
    expect(sink.diagnostics[0].message).toBe('ResolutionFailure: Cannot read "x" of null');
  });

  it("carries the last seen line into diagnostics", () => {
    const sink = new CollectingSink();
    walk([loadConst(0, 10), loadGlobal("value"), loadAttr("x")], context({ globalBindings: { value: undefined } }), sink);
    expect(sink.diagnostics[0].line).toBe(10);
  });

  it("names the callable in diagnostics", () => {
    const sink = new CollectingSink();
    extractReferences([loadDeref("gone")], context(), {
      sink,
      origin: { name: "compute", fileName: "/srv/jobs.js" },
    });
    expect(sink.diagnostics[0]).toMatchObject({ callable: "compute", fileName: "/srv/jobs.js", line: undefined });
  });
});

describe("idempotence", () => {
  it("gives identical output for repeated walks", () => {
    const ctx = context({
      globalBindings: { helper: { run: () => 0 } },
      localBindings: new Map([["this", concrete({ x: 1 })]]),
    });
    const stream = [
      loadGlobal("helper"),
      storeLocal("h"),
      loadLocal("h"),
      loadMethod("run"),
      instr("callMethod", 0),
      loadLocal("this"),
      loadAttr("x"),
      deleteLocal("this"),
      loadGlobal("unknown"),
      loadAttr("path"),
    ];
    const first = walk(stream, ctx);
    const second = walk(stream, ctx);
    expect(second).toEqual(first);
    expect(referenceValues(first).length).toBe(2);
  });
});
