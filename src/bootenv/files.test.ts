/**
 * Tests for auxiliary OS file validation and fetching.
 *
 * Run: node --import tsx --test src/bootenv/files.test.ts
 *
 * HttpFileFetcher is exercised against an HTTP server bound to loopback in
 * this process.
 */

import { strict as assert } from "node:assert";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { createServer, type Server } from "node:http";
import type { AddressInfo } from "node:net";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { after, before, describe, test } from "node:test";

import {
  ensureOsFiles,
  FileFetchFailedError,
  HttpFileFetcher,
  HttpStatusError,
  type FileFetcher,
} from "./files.js";
import { parseBootEnv } from "./schema.js";

const baseDir = mkdtempSync(join(tmpdir(), "bootenv-files-"));
after(() => rmSync(baseDir, { recursive: true, force: true }));

let run = 0;
function freshRoot(): string {
  const root = join(baseDir, `root-${run++}`);
  mkdirSync(root, { recursive: true });
  return root;
}

const env = parseBootEnv({
  Name: "centos-7-install",
  OS: {
    Name: "centos-7",
    Files: [{ URL: "http://files.test/ipxe/undionly.kpxe", Name: "ipxe/undionly.kpxe" }],
  },
});

class FakeFetcher implements FileFetcher {
  readonly calls: string[] = [];

  constructor(private readonly write = true) {}

  async fetch(url: string, destination: string): Promise<void> {
    this.calls.push(url);
    if (!this.write) return;
    await mkdir(dirname(destination), { recursive: true });
    await writeFile(destination, `from ${url}`);
  }
}

describe("ensureOsFiles", () => {
  test("fetches a missing file to the install tree", async () => {
    const root = freshRoot();
    const fetcher = new FakeFetcher();
    const destination = join(root, "centos-7", "install", "ipxe", "undionly.kpxe");

    const outcomes = await ensureOsFiles(env, {
      config: { installRoot: root, provisionerUrl: "http://prov.test:8091" },
      fetcher,
    });

    assert.deepEqual([...outcomes], [[destination, "fetched"]]);
    assert.equal(readFileSync(destination, "utf8"), "from http://files.test/ipxe/undionly.kpxe");
  });

  test("never re-downloads a file that is already valid", async () => {
    const root = freshRoot();
    const destination = join(root, "centos-7", "install", "ipxe", "undionly.kpxe");
    mkdirSync(dirname(destination), { recursive: true });
    writeFileSync(destination, "local copy");
    const fetcher = new FakeFetcher();

    const outcomes = await ensureOsFiles(env, {
      config: { installRoot: root, provisionerUrl: "http://prov.test:8091" },
      fetcher,
    });

    assert.deepEqual([...outcomes], [[destination, "valid"]]);
    assert.equal(fetcher.calls.length, 0);
    assert.equal(readFileSync(destination, "utf8"), "local copy");
  });

  test("a fetch that leaves the file invalid is fatal", async () => {
    const root = freshRoot();
    await assert.rejects(
      ensureOsFiles(env, {
        config: { installRoot: root, provisionerUrl: "http://prov.test:8091" },
        fetcher: new FakeFetcher(false),
      }),
      (err: unknown) =>
        err instanceof FileFetchFailedError &&
        err.url === "http://files.test/ipxe/undionly.kpxe" &&
        err.cause === undefined
    );
  });

  test("a failing fetch is fatal and keeps the cause", async () => {
    const root = freshRoot();
    const fetcher: FileFetcher = {
      fetch: async () => {
        throw new Error("connection refused");
      },
    };
    await assert.rejects(
      ensureOsFiles(env, {
        config: { installRoot: root, provisionerUrl: "http://prov.test:8091" },
        fetcher,
      }),
      (err: unknown) => err instanceof FileFetchFailedError && err.cause instanceof Error
    );
  });
});

describe("HttpFileFetcher", () => {
  let server: Server;
  let baseUrl: string;

  before(async () => {
    server = createServer((req, res) => {
      if (req.url === "/files/elilo.efi") {
        res.writeHead(200, { "content-type": "application/octet-stream" });
        res.end("EFI-BINARY");
        return;
      }
      if (req.url === "/files/truncated.img") {
        res.writeHead(200, { "content-length": "1000" });
        res.write("PARTIAL", () => res.destroy());
        return;
      }
      res.writeHead(404);
      res.end();
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address: AddressInfo | string | null = server.address();
    assert.ok(address !== null && typeof address === "object");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  after(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve()))
    );
  });

  test("streams the body to a new directory", async () => {
    const destination = join(freshRoot(), "deep", "dir", "elilo.efi");
    await new HttpFileFetcher().fetch(`${baseUrl}/files/elilo.efi`, destination);
    assert.equal(readFileSync(destination, "utf8"), "EFI-BINARY");
  });

  test("non-2xx responses fail without creating the file", async () => {
    const destination = join(freshRoot(), "missing.efi");
    await assert.rejects(
      new HttpFileFetcher().fetch(`${baseUrl}/files/missing.efi`, destination),
      (err: unknown) =>
        err instanceof HttpStatusError &&
        err.status === 404 &&
        err.message.startsWith(`GET ${baseUrl}/files/missing.efi: 404`)
    );
    assert.equal(existsSync(destination), false);
  });

  test("a body cut off mid-stream leaves no file behind", async () => {
    const destination = join(freshRoot(), "images", "truncated.img");
    await assert.rejects(new HttpFileFetcher().fetch(`${baseUrl}/files/truncated.img`, destination));
    assert.equal(existsSync(destination), false);
    assert.equal(existsSync(`${destination}.part`), false);
  });

  test("a cut-off download is retried on the next pass instead of passing validation", async () => {
    const root = freshRoot();
    const truncatedEnv = parseBootEnv({
      Name: "centos-7-install",
      OS: {
        Name: "centos-7",
        Files: [{ URL: `${baseUrl}/files/truncated.img`, Name: "images/truncated.img" }],
      },
    });
    const deps = { config: { installRoot: root, provisionerUrl: "http://p" }, fetcher: new HttpFileFetcher() };

    for (let pass = 0; pass < 2; pass++) {
      await assert.rejects(ensureOsFiles(truncatedEnv, deps), FileFetchFailedError);
    }
    assert.equal(existsSync(join(root, "centos-7", "install", "images", "truncated.img")), false);
  });
});
