/**
 * Tests for diagnostics, module resolvers and reference rendering.
 */
import * as path from "path";
import { describe, it, expect, vi, afterEach } from "vitest";

import {
  CollectingSink,
  ImportFailure,
  ReferenceDiagnostic,
  concrete,
  consoleSink,
  createNodeResolver,
  createTableResolver,
  formatDiagnostic,
  moduleNameOf,
  partialName,
  renderReferences,
  renderReferencesJson,
  silentSink,
} from "../src/index";

const warning: ReferenceDiagnostic = {
  code: "unresolved-reference",
  severity: "warning",
  callable: "compute",
  fileName: "/srv/jobs.js",
  line: 12,
  message: "ResolutionFailure: Cannot read \"x\" of null",
};

describe("formatDiagnostic", () => {
  it("explains an unresolved reference", () => {
    expect(formatDiagnostic(warning)).toBe(
      "Found a code reference in /srv/jobs.js:12 that cannot be hashed when hashing compute. " +
        "The reference is ignored, so changes to it won't invalidate the cache.\n" +
        'ResolutionFailure: Cannot read "x" of null'
    );
  });

  it("leaves out an unknown line", () => {
    const diagnostic: ReferenceDiagnostic = {
      ...warning,
      code: "unresolved-import",
      severity: "info",
      line: undefined,
      message: 'ImportFailure: Cannot import module "m"',
    };
    expect(formatDiagnostic(diagnostic)).toBe(
      '/srv/jobs.js: compute: ImportFailure: Cannot import module "m"; hashing the module by name'
    );
  });
});

describe("sinks", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes warnings to the console", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    consoleSink.report(warning);
    consoleSink.report({ ...warning, severity: "info" });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(formatDiagnostic(warning));
  });

  it("discards everything through the silent sink", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    silentSink.report(warning);
    expect(warn).not.toHaveBeenCalled();
  });

  it("collects diagnostics in order", () => {
    const sink = new CollectingSink();
    sink.report({ ...warning, severity: "info" });
    sink.report(warning);
    expect(sink.diagnostics.map((d) => d.severity)).toEqual(["info", "warning"]);
    expect(sink.warnings()).toEqual([warning]);
  });
});

describe("module resolvers", () => {
  it("resolves from a table and records the module name", () => {
    const mod = { run() {} };
    expect(createTableResolver({ tools: mod })("tools")).toBe(mod);
    expect(moduleNameOf(mod)).toBe("tools");
  });

  it("fails for a module missing from the table", () => {
    expect(() => createTableResolver({})("missing")).toThrow(ImportFailure);
  });

  it("loads built-in modules through Node resolution", () => {
    const loaded = createNodeResolver()("path");
    expect(Reflect.get(Object(loaded), "sep")).toBe(path.sep);
    expect(moduleNameOf(loaded)).toBe("path");
  });

  it("wraps Node resolution failures", () => {
    const resolve = createNodeResolver();
    expect(() => resolve("./no-such-module-here")).toThrow('Cannot import module "./no-such-module-here"');
  });
});

describe("rendering", () => {
  const references = [concrete(42), partialName("db.connect"), concrete("label")];

  it("renders one reference per line", () => {
    expect(renderReferences(references)).toBe(['object 42', "name   db.connect", 'object "label"'].join("\n"));
  });

  it("renders JSON records", () => {
    expect(JSON.parse(renderReferencesJson(references))).toEqual([
      { kind: "object", text: "42" },
      { kind: "name", text: "db.connect" },
      { kind: "object", text: '"label"' },
    ]);
  });
});
