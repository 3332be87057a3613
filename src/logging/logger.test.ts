/**
 * Tests for the logger and run id.
 *
 * Run: node --import tsx --test src/logging/logger.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, describe, test } from "node:test";

import { createLogger, formatLogEntry, generateRunId, getRunId, initRunId } from "./index.js";

const tempDir = mkdtempSync(join(tmpdir(), "bootenv-log-"));
after(() => rmSync(tempDir, { recursive: true, force: true }));

describe("run id", () => {
  test("generated ids are date plus six hex digits", () => {
    assert.match(generateRunId(), /^\d{8}-[0-9a-f]{6}$/);
  });

  test("initRunId keeps a supplied id", () => {
    assert.equal(initRunId("run-fixed"), "run-fixed");
    assert.equal(getRunId(), "run-fixed");
  });
});

describe("formatLogEntry", () => {
  test("includes level, run id, message and context", () => {
    initRunId("run-1");
    const entry = formatLogEntry("info", "Rendered machine", { machine: "node-01" });
    assert.match(
      entry,
      /^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO \] \[run-1\] Rendered machine \{"machine":"node-01"\}$/
    );
  });

  test("omits an empty context", () => {
    initRunId("run-1");
    assert.ok(formatLogEntry("warn", "msg", {}).endsWith("[WARN ] [run-1] msg"));
  });
});

describe("createLogger", () => {
  test("child loggers bind context and levels filter entries", () => {
    initRunId("run-2");
    const logger = createLogger({
      level: "info",
      console: false,
      file: true,
      logDir: tempDir,
      logFile: "child.log",
    });

    const child = logger.child({ bootEnv: "centos-7-install" });
    child.debug("dropped");
    child.info("kept", { machine: "node-01" });

    const lines = readFileSync(join(tempDir, "child.log"), "utf8").trim().split("\n");
    assert.equal(lines.length, 1);
    assert.ok(
      lines[0].endsWith('[run-2] kept {"bootEnv":"centos-7-install","machine":"node-01"}'),
      lines[0]
    );
  });
});
