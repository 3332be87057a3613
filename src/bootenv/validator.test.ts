/**
 * Tests for structural and required-parameter validation.
 *
 * Run: node --import tsx --test src/bootenv/validator.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, test } from "node:test";

import { parseMachine } from "../machines/schema.js";
import { parseBootEnv } from "./schema.js";
import {
  assertRequiredParams,
  DuplicateTemplateError,
  IllegalTemplateError,
  IncompleteBootSupportError,
  missingRequiredParams,
  MissingRequiredParamsError,
  validateBootEnvStructure,
} from "./validator.js";

function envWith(templates: { Name: string; Path: string; UUID: string }[], required: string[] = []) {
  return parseBootEnv({
    Name: "e",
    OS: { Name: "os" },
    Templates: templates,
    RequiredParams: required,
  });
}

const t = (name: string) => ({ Name: name, Path: `${name}.cfg`, UUID: `${name}.tmpl` });

describe("validateBootEnvStructure", () => {
  test("ipxe alone is enough", () => {
    validateBootEnvStructure(envWith([t("ipxe")]));
  });

  test("pxelinux and elilo together are enough", () => {
    validateBootEnvStructure(envWith([t("pxelinux"), t("elilo")]));
  });

  test("pxelinux without elilo is incomplete", () => {
    assert.throws(
      () => validateBootEnvStructure(envWith([t("pxelinux")])),
      (err: unknown) =>
        err instanceof IncompleteBootSupportError &&
        err.message ===
          'Boot environment e: missing elilo or pxelinux template (needs "ipxe", or both "pxelinux" and "elilo"; has: pxelinux)'
    );
  });

  test("no templates at all is incomplete", () => {
    assert.throws(
      () => validateBootEnvStructure(envWith([])),
      (err: unknown) => err instanceof IncompleteBootSupportError && err.message.endsWith("has: none)")
    );
  });

  test("empty template fields are illegal", () => {
    assert.throws(
      () => validateBootEnvStructure(envWith([t("ipxe"), { Name: "elilo", Path: "", UUID: "" }])),
      (err: unknown) =>
        err instanceof IllegalTemplateError &&
        err.index === 1 &&
        err.emptyFields.join(",") === "path,content id"
    );
  });

  test("two templates with the same name are rejected", () => {
    const again = { Name: "ipxe", Path: "other/{{ .Machine.Name }}.ipxe", UUID: "ipxe.tmpl" };
    assert.throws(
      () => validateBootEnvStructure(envWith([t("ipxe"), again])),
      (err: unknown) =>
        err instanceof DuplicateTemplateError &&
        err.templateName === "ipxe" &&
        err.message === "Boot environment e: template name ipxe is used more than once"
    );
  });
});

describe("required parameters", () => {
  const machine = parseMachine({
    Name: "node-01",
    Uuid: "u-1",
    Address: "10.0.0.5",
    BootEnv: "e",
    Params: { c: 1 },
  });

  test("reports missing keys once, in declaration order", () => {
    const env = envWith([t("ipxe")], ["b", "a", "b", "c"]);
    assert.deepEqual(missingRequiredParams(env, machine), ["b", "a"]);
  });

  test("assertRequiredParams names environment, machine and keys", () => {
    const env = envWith([t("ipxe")], ["dns-domain", "c"]);
    assert.throws(
      () => assertRequiredParams(env, machine),
      (err: unknown) =>
        err instanceof MissingRequiredParamsError &&
        err.machine === "node-01" &&
        err.message === "Boot environment e: machine node-01 is missing required params: dns-domain"
    );
  });

  test("passes when every key is present", () => {
    assertRequiredParams(envWith([t("ipxe")], ["c"]), machine);
  });
});
