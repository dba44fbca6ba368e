import assert from "node:assert/strict";
import test from "node:test";

import {
  createDownloadProgress,
  formatProgressBytes,
  formatProgressDuration,
  progressDetails,
} from "../src/index.ts";

class CaptureStream {
  readonly isTTY: boolean;
  readonly columns = 120;
  readonly chunks: string[] = [];

  constructor(isTTY: boolean) {
    this.isTTY = isTTY;
  }

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }
}

test("formatProgressBytes scales units", () => {
  assert.equal(formatProgressBytes(512), "512B");
  assert.equal(formatProgressBytes(1536), "1.50KB");
  assert.equal(formatProgressBytes(20 * 1024 * 1024), "20.0MB");
  assert.equal(formatProgressBytes(300 * 1024 * 1024), "300MB");
});

test("formatProgressDuration", () => {
  assert.equal(formatProgressDuration(250), "250ms");
  assert.equal(formatProgressDuration(4_000), "4s");
  assert.equal(formatProgressDuration(125_000), "2m5s");
});

test("progressDetails estimates the remaining time", () => {
  assert.deepEqual(progressDetails(1024, 4096, 1000), { progress: "1.00KB/4.00KB", eta: "3s" });
  assert.deepEqual(progressDetails(0, 4096, 1000), { progress: "0B/4.00KB" });
  assert.deepEqual(progressDetails(700, 0, 1000), { progress: "700B" });
});

test("progress renders nothing off a tty", () => {
  const stream = new CaptureStream(false);
  const progress = createDownloadProgress("alpine 3.21", { stream });
  progress.onProgress(10, 100);
  progress.finish();
  assert.deepEqual(stream.chunks, []);
});

test("progress prints a final line on a tty", (t) => {
  const previousCi = process.env.CI;
  delete process.env.CI;
  t.after(() => {
    if (previousCi === undefined) delete process.env.CI;
    else process.env.CI = previousCi;
  });

  let now = 1_000;
  const stream = new CaptureStream(true);
  const progress = createDownloadProgress("alpine 3.21", { stream, now: () => now });

  progress.onProgress(1024, 2048);
  progress.onProgress(2048, 2048);
  now += 3_000;
  progress.finish();
  progress.fail();

  assert.deepEqual(stream.chunks, ["\r\x1b[2K✓ downloaded alpine 3.21 2.00KB in 3s", "\n"]);
});

test("failed downloads are reported once", (t) => {
  const previousCi = process.env.CI;
  delete process.env.CI;
  t.after(() => {
    if (previousCi === undefined) delete process.env.CI;
    else process.env.CI = previousCi;
  });

  let now = 0;
  const stream = new CaptureStream(true);
  const progress = createDownloadProgress("debian 12", { stream, now: () => now });
  progress.onProgress(100, 1000);
  now = 500;
  progress.fail();
  progress.finish();

  assert.deepEqual(stream.chunks, ["\r\x1b[2K✗ failed downloading debian 12 after 500ms", "\n"]);
});

test("progress stays silent when no bytes were downloaded", (t) => {
  const previousCi = process.env.CI;
  delete process.env.CI;
  t.after(() => {
    if (previousCi === undefined) delete process.env.CI;
    else process.env.CI = previousCi;
  });

  const stream = new CaptureStream(true);
  const hit = createDownloadProgress("ubuntu 24.04", { stream, now: () => 0 });
  hit.finish();
  hit.onProgress(10, 100);

  const failed = createDownloadProgress("fedora 41", { stream, now: () => 0 });
  failed.fail();

  assert.deepEqual(stream.chunks, []);
});
