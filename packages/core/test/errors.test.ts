import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  ConfigConflictError,
  MissingTargetError,
  PatternError,
  ScopeMisuseError,
  ScrubError,
} from "../src/index.js";

describe("errors", () => {
  it("names each error after its class", () => {
    assert.equal(new ConfigConflictError("WARN").name, "ConfigConflictError");
    assert.equal(new MissingTargetError("X").name, "MissingTargetError");
    assert.equal(new ScopeMisuseError("m").name, "ScopeMisuseError");
  });

  it("carries a stable code", () => {
    const err = new ScopeMisuseError("both");
    assert.ok(err instanceof ScrubError);
    assert.ok(err instanceof Error);
    assert.equal(err.code, "SCOPE_MISUSE");
    assert.equal(err.message, "both");
  });

  it("describes a conflict", () => {
    const err = new ConfigConflictError("DIE");
    assert.equal(err.code, "CONFIG_CONFLICT");
    assert.equal(err.target, "DIE");
    assert.equal(
      err.message,
      'Cannot restore "DIE": its handler was replaced by another party; leaving it in place',
    );
  });

  it("describes a missing target with or without detail", () => {
    assert.equal(new MissingTargetError("NOPE").message, 'Unknown target "NOPE"');
    assert.equal(new MissingTargetError("NOPE", "no such hook").message, 'Unknown target "NOPE": no such hook');
  });

  it("includes the compiler's reason in PatternError", () => {
    const err = new PatternError("(", new SyntaxError("Unterminated group"));
    assert.equal(err.code, "INVALID_PATTERN");
    assert.equal(err.pattern, "(");
    assert.equal(err.message, 'Invalid pattern "(": Unterminated group');
    assert.equal(new PatternError("x", "bad").message, 'Invalid pattern "x": bad');
  });
});
