/**
 * Tests for content template stores.
 *
 * Run: node --import tsx --test src/templates/store.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, describe, test } from "node:test";

import { DirectoryTemplateStore, InMemoryTemplateStore, TemplateNotFoundError } from "./store.js";

const tempDir = mkdtempSync(join(tmpdir(), "bootenv-store-"));
after(() => rmSync(tempDir, { recursive: true, force: true }));

describe("InMemoryTemplateStore", () => {
  test("loads registered sources", async () => {
    const store = new InMemoryTemplateStore({ "default-ipxe.tmpl": "#!ipxe" });
    store.set("extra.tmpl", "x");
    assert.equal(await store.load("default-ipxe.tmpl"), "#!ipxe");
    assert.equal(await store.load("extra.tmpl"), "x");
  });

  test("rejects unknown ids", async () => {
    await assert.rejects(
      new InMemoryTemplateStore().load("missing"),
      (err: unknown) => err instanceof TemplateNotFoundError && err.templateId === "missing"
    );
  });
});

describe("DirectoryTemplateStore", () => {
  test("reads a file once and serves it from cache until invalidated", async () => {
    const file = join(tempDir, "pxelinux.tmpl");
    writeFileSync(file, "v1");
    const store = new DirectoryTemplateStore(tempDir);

    assert.equal(await store.load("pxelinux.tmpl"), "v1");
    writeFileSync(file, "v2");
    assert.equal(await store.load("pxelinux.tmpl"), "v1");

    store.invalidate();
    assert.equal(await store.load("pxelinux.tmpl"), "v2");
  });

  test("missing files are TemplateNotFoundError with the read error as cause", async () => {
    await assert.rejects(
      new DirectoryTemplateStore(tempDir).load("nope.tmpl"),
      (err: unknown) => err instanceof TemplateNotFoundError && err.cause instanceof Error
    );
  });

  test("ids cannot escape the directory", async () => {
    await assert.rejects(
      new DirectoryTemplateStore(tempDir).load("../etc/passwd"),
      (err: unknown) =>
        err instanceof TemplateNotFoundError &&
        err.message === "Template id escapes the template directory: ../etc/passwd"
    );
  });
});
