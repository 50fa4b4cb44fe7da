import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { createLogger } from "../src/index.js";

function capture(verbose?: boolean) {
  const lines: string[] = [];
  const log = createLogger("hooks", { verbose, sink: (line) => lines.push(line) });
  return { lines, log };
}

describe("createLogger", () => {
  it("prefixes and formats warnings", () => {
    const { lines, log } = capture();
    log.warn("Cannot restore %s (%d tries)", "WARN", 2);
    assert.deepEqual(lines, ["[hooks] Cannot restore WARN (2 tries)"]);
  });

  it("drops debug lines unless verbose", () => {
    const quiet = capture();
    quiet.log.debug("Installed %s", "WARN");
    assert.deepEqual(quiet.lines, []);
    assert.equal(quiet.log.verbose, false);

    const loud = capture(true);
    loud.log.debug("Installed %s", "WARN");
    assert.deepEqual(loud.lines, ["[hooks] Installed WARN"]);
    assert.equal(loud.log.verbose, true);
  });

  it("appends extra arguments like console does", () => {
    const { lines, log } = capture();
    log.warn("done", 3);
    assert.deepEqual(lines, ["[hooks] done 3"]);
  });
});
