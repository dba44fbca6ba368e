import assert from "node:assert/strict";
import { spawnSync } from "node:child_process";
import { createHash } from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { RootfsManager, USAGE, runCli } from "../src/index.ts";

import {
  bytesResponse,
  createFakeFetch,
  jsonResponse,
} from "../../packages/distro/test/helpers/fake-fetch.ts";
import { buildTarGz } from "./helpers/tar.ts";

class CaptureStream {
  readonly isTTY = false;
  text = "";

  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
}

function makeIo() {
  return { stdout: new CaptureStream(), stderr: new CaptureStream() };
}

function sha256(data: Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

function makeTempDir(prefix = "distrofs-cli-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

test("cli: distrofs --help renders usage", () => {
  const rootfsDir = path.join(import.meta.dirname, "..");

  const result = spawnSync(
    process.execPath,
    ["--import", "tsx", "bin/distrofs.ts", "--help"],
    {
      cwd: rootfsDir,
      env: process.env,
      encoding: "utf8",
      timeout: 15000,
    },
  );

  assert.equal(result.status, 0);
  assert.match(result.stdout ?? "", /^usage: distrofs <command> \[options\]/);
});

test("runCli prints usage for --help and exits 0", async () => {
  const io = makeIo();
  assert.equal(await runCli(["--help"], io), 0);
  assert.equal(io.stdout.text, USAGE);
  assert.equal(io.stderr.text, "");
});

test("runCli without a command prints usage to stderr", async () => {
  const io = makeIo();
  assert.equal(await runCli([], io), 2);
  assert.equal(io.stderr.text, USAGE);
});

test("runCli reports errors with an error prefix", async () => {
  const io = makeIo();
  assert.equal(await runCli(["frobnicate"], io), 1);
  assert.equal(io.stderr.text, "error: unknown command: frobnicate\n");

  const bad = makeIo();
  assert.equal(await runCli(["resolve", "plan9", "--official"], bad), 1);
  assert.equal(bad.stderr.text, "error: unsupported distribution: plan9\n");
});

test("resolve --official prints template urls", async () => {
  const io = makeIo();
  const code = await runCli(["resolve", "ubuntu:22.04", "--arch", "arm64", "--official"], io);
  assert.equal(code, 0);
  assert.equal(
    io.stdout.text,
    "url: https://cloud-images.ubuntu.com/jammy/current/jammy-server-cloudimg-arm64-root.tar.xz\n" +
      "checksum: https://cloud-images.ubuntu.com/jammy/current/SHA256SUMS (sha256)\n",
  );
});

test("list and prune work on an empty cache", async () => {
  const root = makeTempDir();
  try {
    const io = makeIo();
    assert.equal(await runCli(["list", "--cache-dir", root], io), 0);
    assert.equal(io.stdout.text, "no cached rootfs archives\n");

    const pruned = makeIo();
    assert.equal(await runCli(["prune", "--keep", "1", "--cache-dir", root], pruned), 0);
    assert.equal(pruned.stdout.text, "freed 0B\n");

    const missing = makeIo();
    assert.equal(await runCli(["prune", "--cache-dir", root], missing), 1);
    assert.equal(missing.stderr.text, "error: prune requires --keep N\n");
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});

test("ensure --extract downloads, caches and unpacks", async () => {
  const root = makeTempDir();
  try {
    const archive = buildTarGz([{ name: "etc/hostname", body: Buffer.from("distrofs\n") }]);
    const imagePath = "images/alpine/3.21/arm64/default/20260218_13:00/rootfs.tar.gz";
    const fake = createFakeFetch({
      "https://mirror.test/streams/v1/images.json": () =>
        jsonResponse({
          products: {
            "alpine:3.21:arm64:default": {
              versions: {
                "20260218_13:00": {
                  items: {
                    "root.tar.xz": {
                      ftype: "root.tar.xz",
                      sha256: sha256(archive),
                      size: archive.length,
                      path: imagePath,
                    },
                  },
                },
              },
            },
          },
        }),
      [`https://mirror.test/${imagePath}`]: () => bytesResponse(archive),
    });

    const cacheDir = path.join(root, "cache");
    const target = path.join(root, "rootfs");
    const io = { ...makeIo(), fetch: fake.fetch };
    const code = await runCli(
      [
        "ensure",
        "alpine:3.21",
        "--arch",
        "aarch64",
        "--mirror",
        "https://mirror.test",
        "--cache-dir",
        cacheDir,
        "--extract",
        target,
      ],
      io,
    );

    assert.equal(io.stderr.text, "");
    assert.equal(code, 0);
    const archivePath = path.join(cacheDir, "alpine", "3.21", "aarch64", "rootfs.tar.gz");
    assert.equal(io.stdout.text, `${archivePath}\nextracted to ${target}\n`);
    assert.equal(fs.readFileSync(path.join(target, "etc", "hostname"), "utf8"), "distrofs\n");

    const listed = makeIo();
    await runCli(["list", "--cache-dir", cacheDir], listed);
    assert.equal(listed.stdout.text, `alpine:3.21\taarch64\t${archive.length}B\trootfs.tar.gz\n`);

    assert.equal(RootfsManager.create(cacheDir).listCached().length, 1);
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});
