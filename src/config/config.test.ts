/**
 * Tests for engine configuration loading.
 *
 * Run: node --import tsx --test src/config/config.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

import {
  ConfigError,
  deepFreeze,
  EngineConfigError,
  loadEngineConfig,
  optionalEnv,
  optionalEnvBool,
  optionalEnvInt,
} from "./index.js";

describe("env readers", () => {
  test("optionalEnv falls back for empty values", () => {
    assert.equal(optionalEnv("A", "dflt", { A: "" }), "dflt");
    assert.equal(optionalEnv("A", "dflt", { A: "set" }), "set");
  });

  test("optionalEnvInt parses integers and rejects anything else", () => {
    assert.equal(optionalEnvInt("N", 1, { N: "42" }), 42);
    assert.equal(optionalEnvInt("N", 1, {}), 1);
    assert.throws(() => optionalEnvInt("N", 1, { N: "4x" }), ConfigError);
  });

  test("optionalEnvBool recognises the usual spellings", () => {
    assert.equal(optionalEnvBool("B", false, { B: "YES" }), true);
    assert.equal(optionalEnvBool("B", true, { B: "0" }), false);
    assert.throws(() => optionalEnvBool("B", false, { B: "maybe" }), ConfigError);
  });
});

describe("loadEngineConfig", () => {
  test("defaults when nothing is set", () => {
    const config = loadEngineConfig({}, {});
    assert.equal(config.installRoot, "/tftpboot");
    assert.equal(config.provisionerUrl, "http://127.0.0.1:8091");
    assert.equal(config.commandUrl, "https://127.0.0.1:3000");
    assert.equal(config.tenantId, 1);
    assert.equal(config.extractCommand, "/explode_iso.sh");
    assert.equal(config.logLevel, "info");
    assert.ok(Object.isFrozen(config));
  });

  test("reads environment variables and strips trailing slashes from URLs", () => {
    const config = loadEngineConfig(
      {},
      {
        INSTALL_ROOT: "/srv/tftp",
        PROVISIONER_URL: "http://prov.test:8091/",
        TENANT_ID: "7",
        LOG_TO_FILE: "yes",
        NODE_ENV: "test",
      }
    );
    assert.equal(config.installRoot, "/srv/tftp");
    assert.equal(config.provisionerUrl, "http://prov.test:8091");
    assert.equal(config.tenantId, 7);
    assert.equal(config.logToFile, true);
    assert.equal(config.env, "test");
  });

  test("explicit overrides win over the environment", () => {
    const config = loadEngineConfig({ installRoot: "/override" }, { INSTALL_ROOT: "/from-env" });
    assert.equal(config.installRoot, "/override");
  });

  test("a relative install root fails validation", () => {
    try {
      loadEngineConfig({ installRoot: "relative/dir" }, {});
      assert.fail("expected EngineConfigError");
    } catch (err) {
      assert.ok(err instanceof EngineConfigError);
      assert.deepEqual(err.issues.map((i) => i.path), [["installRoot"]]);
      assert.equal(
        err.format(),
        "Engine configuration validation failed:\n  - installRoot: installRoot must be an absolute path"
      );
    }
  });

  test("an unknown log level fails validation", () => {
    assert.throws(
      () => loadEngineConfig({}, { LOG_LEVEL: "verbose" }),
      (err: unknown) =>
        err instanceof EngineConfigError && err.issues.some((i) => i.path[0] === "logLevel")
    );
  });

  test("a malformed TENANT_ID is reported against the variable", () => {
    assert.throws(
      () => loadEngineConfig({}, { TENANT_ID: "one" }),
      (err: unknown) => err instanceof ConfigError && err.variable === "TENANT_ID"
    );
  });
});

describe("deepFreeze", () => {
  test("freezes nested objects", () => {
    const value = deepFreeze({ outer: { inner: [1, 2] } });
    assert.ok(Object.isFrozen(value.outer));
    assert.ok(Object.isFrozen(value.outer.inner));
  });
});
