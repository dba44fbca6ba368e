import assert from "node:assert/strict";
import test from "node:test";

import { ChecksumParseError, parseChecksumFile } from "../src/index.ts";

const UBUNTU_SUMS = [
  "abc111 *noble-server-cloudimg-amd64.img",
  "def222 *noble-server-cloudimg-arm64-root.tar.xz",
  "ghi333 *noble-server-cloudimg-amd64-root.tar.xz",
  "",
].join("\n");

test("single-entry takes the first token of the first line", () => {
  const hash = parseChecksumFile(
    "single-entry",
    "ABCDEF0123  alpine-minirootfs-3.21.3-aarch64.tar.gz\nignored second line\n",
    "whatever.tar.gz",
  );
  assert.equal(hash, "abcdef0123");
});

test("single-entry rejects empty content", () => {
  assert.throws(
    () => parseChecksumFile("single-entry", "\n", "rootfs.tar.gz"),
    ChecksumParseError,
  );
});

test("gnu-coreutils matches binary-mode entries exactly", () => {
  assert.equal(
    parseChecksumFile("gnu-coreutils", UBUNTU_SUMS, "noble-server-cloudimg-arm64-root.tar.xz"),
    "def222",
  );
  assert.equal(
    parseChecksumFile("gnu-coreutils", UBUNTU_SUMS, "noble-server-cloudimg-amd64-root.tar.xz"),
    "ghi333",
  );
});

test("gnu-coreutils accepts text-mode double-space separators", () => {
  const content = "0A1B2C  debian-12-nocloud-arm64.tar.xz\n";
  assert.equal(
    parseChecksumFile("gnu-coreutils", content, "debian-12-nocloud-arm64.tar.xz"),
    "0a1b2c",
  );
});

test("gnu-coreutils does not match a filename suffix", () => {
  const content = "def222 *arm64-root.tar.xz\n";
  assert.throws(
    () => parseChecksumFile("gnu-coreutils", content, "root.tar.xz"),
    (error: unknown) =>
      error instanceof ChecksumParseError &&
      error.message === "failed to parse checksum file (no entry for root.tar.xz)",
  );
});

test("bsd grammar returns the hash after the last equals sign", () => {
  const content = [
    "# Fedora-Cloud-41-1.2-x86_64-CHECKSUM",
    "SHA256 (Fedora-Cloud-Base-41-1.2.x86_64.raw.xz) = ABC123DEF456",
    "",
  ].join("\n");
  assert.equal(
    parseChecksumFile("bsd", content, "Fedora-Cloud-Base-41-1.2.x86_64.raw.xz"),
    "abc123def456",
  );
});

test("bsd grammar requires the exact parenthesized name", () => {
  const content = "SHA256 (Fedora-Cloud-Base-41-1.2.x86_64.raw.xz) = abc123def456\n";
  assert.throws(() => parseChecksumFile("bsd", content, "raw.xz"), ChecksumParseError);
});

test("bsd grammar skips lines not starting with SHA", () => {
  const content = "MD5 (image.raw.xz) = 00ff\nSHA256 (image.raw.xz) = 11ee\n";
  assert.equal(parseChecksumFile("bsd", content, "image.raw.xz"), "11ee");
});
