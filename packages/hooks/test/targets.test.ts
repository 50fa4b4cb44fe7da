import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { MissingTargetError } from "@logscrub/core";

import { HookCatalog, createPlatformHooks, formatStack, isHandler, propertyTarget } from "../src/index.js";

function fakePlatform() {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const fakeConsole = {
    warn: (): void => {},
    error: (): void => {},
    log: (): void => {},
    info: (): void => {},
    debug: (): void => {},
    trace: (): void => {},
    assert: (): void => {},
  };
  const fakeProcess = { emitWarning: (): void => {} };
  const fakeError: { prepareStackTrace?: unknown } = {};
  const hooks = createPlatformHooks({
    console: fakeConsole,
    process: fakeProcess,
    errorClass: fakeError,
    stdout: { write: (chunk: string) => stdout.push(chunk) },
    stderr: { write: (chunk: string) => stderr.push(chunk) },
  });
  return { hooks, stdout, stderr, fakeConsole, fakeProcess, fakeError, catalog: new HookCatalog(hooks) };
}

describe("createPlatformHooks", () => {
  it("defines the well-known hooks", () => {
    const { hooks } = fakePlatform();
    assert.deepEqual(
      hooks.map((h) => h.id),
      ["WARN", "ERROR", "LOG", "INFO", "DEBUG", "TRACE", "ASSERT", "WARNING", "DIE"],
    );
  });

  it("reads the live handler from the console", () => {
    const { catalog, fakeConsole } = fakePlatform();
    assert.equal(catalog.resolve("WARN").get(), fakeConsole.warn);
    assert.equal(catalog.resolve("WARNING").get() !== undefined, true);
  });

  it("marks console aliases", () => {
    const { catalog } = fakePlatform();
    assert.equal(catalog.resolve("ERROR").aliasOf, "WARN");
    assert.equal(catalog.resolve("INFO").aliasOf, "LOG");
    assert.equal(catalog.resolve("DEBUG").aliasOf, "LOG");
    assert.equal(catalog.resolve("WARN").aliasOf, undefined);
  });

  it("treats an unset prepareStackTrace as an empty slot", () => {
    const { catalog } = fakePlatform();
    const die = catalog.resolve("DIE");
    assert.equal(die.get(), undefined);
    assert.equal(die.redacts, "result");
    assert.equal(die.kind, "hook");
  });

  it("writes console fallbacks to the right stream", () => {
    const { catalog, stdout, stderr } = fakePlatform();
    catalog.resolve("WARN").fallback("a %s", "b");
    catalog.resolve("LOG").fallback("count: %d", 3);
    catalog.resolve("TRACE").fallback("here");
    catalog.resolve("WARNING").fallback("deprecated");

    assert.deepEqual(stdout, ["count: 3\n"]);
    assert.deepEqual(stderr, ["a b\n", "Trace: here\n", "Warning: deprecated\n"]);
  });

  it("prints failed assertions only", () => {
    const { catalog, stderr } = fakePlatform();
    const assertHook = catalog.resolve("ASSERT");
    assertHook.fallback(true, "never");
    assertHook.fallback(false, "n=%d", 2);
    assertHook.fallback(0);

    assert.equal(assertHook.passthrough, 1);
    assert.deepEqual(stderr, ["Assertion failed: n=2\n", "Assertion failed\n"]);
  });

  it("sets and clears a slot", () => {
    const { catalog, fakeError } = fakePlatform();
    const die = catalog.resolve("DIE");
    const handler = (): string => "stack";

    die.set(handler);
    assert.equal(fakeError.prepareStackTrace, handler);
    die.set(undefined);
    assert.equal(fakeError.prepareStackTrace, undefined);
  });
});

describe("formatStack", () => {
  it("formats like V8", () => {
    assert.equal(formatStack(new Error("boom"), ["a (x.js:1:1)", "b (y.js:2:2)"]), "Error: boom\n    at a (x.js:1:1)\n    at b (y.js:2:2)");
  });

  it("returns only the header without call sites", () => {
    assert.equal(formatStack(new TypeError("bad")), "TypeError: bad");
  });

  it("survives a throwing toString", () => {
    const hostile = {
      toString(): string {
        throw new Error("no");
      },
    };
    assert.equal(formatStack(hostile, []), "Error");
  });
});

describe("HookCatalog", () => {
  it("throws MissingTargetError with the known ids", () => {
    const catalog = new HookCatalog([]);
    assert.throws(
      () => catalog.resolve("WARN"),
      (err: unknown) => err instanceof MissingTargetError && err.code === "MISSING_TARGET" && err.target === "WARN",
    );
  });

  it("accepts custom hook definitions", () => {
    const reporter = { onError: (): void => {} };
    const catalog = new HookCatalog([]);
    catalog.define(propertyTarget("REPORT", reporter, "onError", { fallback: () => undefined }));

    assert.equal(catalog.has("REPORT"), true);
    assert.deepEqual(catalog.ids(), ["REPORT"]);
    assert.equal(catalog.resolve("REPORT").get(), reporter.onError);
  });
});

describe("isHandler", () => {
  it("accepts functions only", () => {
    assert.equal(isHandler(() => 1), true);
    assert.equal(isHandler("warn"), false);
    assert.equal(isHandler(undefined), false);
  });
});
