/**
 * Tests for the bootenv command-line front end.
 *
 * Run: node --import tsx --test src/cli/commands.test.ts
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after, describe, test } from "node:test";
import { fileURLToPath } from "node:url";

import { runCli, USAGE, type CliIo } from "./commands.js";

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const workDir = mkdtempSync(join(tmpdir(), "bootenv-cli-"));
after(() => rmSync(workDir, { recursive: true, force: true }));

const templatesDir = join(workDir, "templates");
const root = join(workDir, "tftpboot");
mkdirSync(templatesDir);
mkdirSync(root);

writeFileSync(join(templatesDir, "ipxe.tmpl"), "#!ipxe\nchain {{ .Machine.Url }}\n");

function writeJson(name: string, value: unknown): string {
  const path = join(workDir, name);
  writeFileSync(path, JSON.stringify(value));
  return path;
}

const envPath = writeJson("bootenv.json", {
  Name: "centos-7-install",
  OS: { Name: "centos-7" },
  Templates: [{ Name: "ipxe", Path: "{{ .Machine.HexAddress }}.ipxe", UUID: "ipxe.tmpl" }],
});

const machinePath = writeJson("machine.json", {
  Name: "node-01",
  Uuid: "u-1",
  Address: "10.0.0.5",
  BootEnv: "centos-7-install",
});

const ENV = { LOG_LEVEL: "error", PROVISIONER_URL: "http://prov.test:8091" };

async function cli(...argv: string[]): Promise<{ code: number; out: string[]; err: string[] }> {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIo = { out: (line) => out.push(line), err: (line) => err.push(line) };
  const code = await runCli(argv, { io, env: ENV });
  return { code, out, err };
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════

describe("validate", () => {
  test("reports a valid definition", async () => {
    const result = await cli("validate", envPath, "--templates", templatesDir);
    assert.equal(result.code, 0);
    assert.deepEqual(result.out, ["✓ centos-7-install: 1 template(s) valid"]);
  });

  test("--json prints a machine-readable result", async () => {
    const result = await cli("validate", envPath, "--templates", templatesDir, "--json");
    assert.equal(result.code, 0);
    assert.deepEqual(JSON.parse(result.out[0]), {
      bootEnv: "centos-7-install",
      valid: true,
      templates: ["ipxe"],
    });
  });

  test("a missing content template fails", async () => {
    const result = await cli("validate", envPath, "--templates", join(workDir, "empty"));
    assert.equal(result.code, 1);
    assert.ok(result.err[0].startsWith("✗ Template file not found: "), result.err[0]);
  });

  test("schema errors are listed", async () => {
    const bad = writeJson("bad.json", { Name: "x" });
    const result = await cli("validate", bad);
    assert.equal(result.code, 1);
    assert.ok(
      result.err[0].startsWith("✗ Invalid boot environment definition: 1 validation error(s)\n  - OS: "),
      result.err[0]
    );
  });

  test("unparsable JSON fails", async () => {
    const path = join(workDir, "broken.json");
    writeFileSync(path, "{ not json");
    const result = await cli("validate", path);
    assert.equal(result.code, 1);
    assert.ok(result.err[0].startsWith(`✗ ${path}: invalid JSON: `), result.err[0]);
  });
});

describe("render / delete", () => {
  const artifact = join(root, "centos-7", "install", "0A000005.ipxe");

  test("render writes the machine's artifacts under --root", async () => {
    const result = await cli("render", envPath, machinePath, "--templates", templatesDir, "--root", root);
    assert.equal(result.code, 0, result.err.join("\n"));
    assert.deepEqual(result.out, [`✓ ipxe: ${artifact}`]);
    assert.equal(readFileSync(artifact, "utf8"), "#!ipxe\nchain http://prov.test:8091/machines/u-1\n");
  });

  test("delete removes them, and a second delete finds nothing", async () => {
    const first = await cli("delete", envPath, machinePath, "--templates", templatesDir, "--root", root);
    assert.equal(first.code, 0);
    assert.deepEqual(first.out, [`✓ removed ${artifact}`]);
    assert.equal(existsSync(artifact), false);

    const second = await cli("delete", envPath, machinePath, "--templates", templatesDir, "--root", root);
    assert.deepEqual(second.out, ["Nothing to remove"]);
  });

  test("a machine bound to another environment is rejected", async () => {
    const other = writeJson("other-machine.json", {
      Name: "node-02",
      Uuid: "u-2",
      Address: "10.0.0.6",
      BootEnv: "local",
    });
    const result = await cli("render", envPath, other, "--templates", templatesDir, "--root", root);
    assert.equal(result.code, 1);
    assert.deepEqual(result.err, ["✗ Machine node-02 is bound to local, not centos-7-install"]);
  });

  test("render without a machine file is a usage error", async () => {
    const result = await cli("render", envPath, "--templates", templatesDir);
    assert.deepEqual(result.err, ["✗ render: missing <machine.json>"]);
  });
});

describe("bundled examples", () => {
  const repoRoot = fileURLToPath(new URL("../../", import.meta.url));

  test("the example environment renders with the shipped templates", async () => {
    const exampleRoot = join(workDir, "example-root");
    const result = await cli(
      "render",
      join(repoRoot, "examples", "centos-7-install.json"),
      join(repoRoot, "examples", "node-01.json"),
      "--templates",
      join(repoRoot, "templates"),
      "--root",
      exampleRoot
    );

    assert.equal(result.code, 0, result.err.join("\n"));
    const installDir = join(exampleRoot, "centos-7.2.1511", "install");
    assert.deepEqual(result.out, [
      `✓ pxelinux: ${join(installDir, "pxelinux.cfg", "C0A87C15")}`,
      `✓ elilo: ${join(installDir, "C0A87C15.conf")}`,
      `✓ ipxe: ${join(installDir, "192.168.124.21.ipxe")}`,
      `✓ compute.ks: ${join(installDir, "node-01", "compute.ks")}`,
    ]);
    assert.equal(
      readFileSync(join(installDir, "C0A87C15.conf"), "utf8"),
      [
        "delay=2",
        "timeout=20",
        "verbose=5",
        "image=centos-7.2.1511/install/images/pxeboot/vmlinuz",
        "initrd=centos-7.2.1511/install/images/pxeboot/initrd.img",
        'append="ksdevice=bootif ks=http://prov.test:8091/machines/3f2a9c1e-0000-4000-8000-000000000001/compute.ks ' +
          'method=http://prov.test:8091/centos-7.2.1511/install inst.geoloc=0"',
        "",
      ].join("\n")
    );
  });
});

describe("usage", () => {
  test("--help prints usage and succeeds", async () => {
    const result = await cli("--help");
    assert.equal(result.code, 0);
    assert.deepEqual(result.out, [USAGE]);
  });

  test("no command prints usage and fails", async () => {
    const result = await cli();
    assert.equal(result.code, 1);
    assert.deepEqual(result.out, [USAGE]);
  });

  test("unknown commands fail", async () => {
    const result = await cli("frob", envPath);
    assert.equal(result.code, 1);
    assert.deepEqual(result.err, ["✗ Unknown command: frob"]);
  });

  test("unknown options fail", async () => {
    const result = await cli("validate", envPath, "--frob");
    assert.equal(result.code, 1);
    assert.equal(result.err[1], USAGE);
  });
});
