import assert from "node:assert/strict";
import test from "node:test";

import {
  BuildKey,
  IndexDecodeError,
  ProductNotFoundError,
  RootfsNotFoundError,
  SimplestreamsClient,
  customMirror,
  latestBuildKey,
  parseSimplestreamsIndex,
  presetMirror,
  productKey,
} from "../src/index.ts";

import { createFakeFetch, jsonResponse, textResponse } from "./helpers/fake-fetch.ts";

const ALPINE_PATH_OLD = "images/alpine/3.21/amd64/default/20260217_13:00/rootfs.tar.xz";
const ALPINE_PATH_NEW = "images/alpine/3.21/amd64/default/20260218_13:00/rootfs.tar.xz";

const INDEX_DOCUMENT = {
  format: "products:1.0",
  products: {
    "alpine:3.21:amd64:default": {
      arch: "amd64",
      os: "Alpine",
      release: "3.21",
      release_title: "3.21",
      variant: "default",
      versions: {
        "20260217_13:00": {
          items: {
            "root.tar.xz": {
              ftype: "root.tar.xz",
              sha256: "aabbccdd",
              size: 3100000,
              path: ALPINE_PATH_OLD,
            },
          },
        },
        "20260218_13:00": {
          items: {
            "lxd.tar.xz": {
              ftype: "lxd.tar.xz",
              sha256: "11112222",
              size: 800,
              path: "images/alpine/3.21/amd64/default/20260218_13:00/lxd.tar.xz",
            },
            "root.tar.xz": {
              ftype: "root.tar.xz",
              sha256: "EEFF0011",
              size: 3200000,
              path: ALPINE_PATH_NEW,
            },
          },
        },
      },
    },
    "ubuntu:noble:arm64:default": {
      versions: {
        "20260218_07:42": {
          items: {
            rootfs: {
              ftype: "squashfs",
              sha256: "ubuntuhash",
              size: 42,
              path: "images/ubuntu/noble/arm64/default/20260218_07:42/rootfs.tar.xz",
            },
          },
        },
      },
    },
    "kali:current:arm64:cloud": {
      versions: {
        "20260101_00:00": {
          items: {
            "root.tar.xz": {
              ftype: "root.tar.xz",
              sha256: "ca11",
              size: 10,
              path: "/images/kali/current/arm64/cloud/20260101_00:00/rootfs.tar.xz",
            },
          },
        },
      },
    },
    "fedora:41:amd64:default": {
      versions: {},
    },
    "gentoo:current:amd64:default": {
      versions: {
        "20260101_00:00": {
          items: {
            "lxd.tar.xz": {
              ftype: "lxd.tar.xz",
              sha256: "0000",
              size: 1,
              path: "images/gentoo/current/amd64/default/20260101_00:00/lxd.tar.xz",
            },
          },
        },
      },
    },
  },
};

const INDEX_URL = "https://images.linuxcontainers.org/streams/v1/images.json";

function loadIndex() {
  return parseSimplestreamsIndex(INDEX_DOCUMENT);
}

test("productKey maps distro names, release codenames and arch", () => {
  assert.equal(productKey("alpine", "3.21", "x86_64", "default"), "alpine:3.21:amd64:default");
  assert.equal(productKey("ubuntu", "24.04", "aarch64", "default"), "ubuntu:noble:arm64:default");
  assert.equal(productKey("rocky", "9", "x86_64", "cloud"), "rockylinux:9:amd64:cloud");
  assert.equal(productKey("debian", "trixie", "aarch64", "default"), "debian:trixie:arm64:default");
});

test("latestBuildKey picks the newest well-formed build", () => {
  assert.equal(latestBuildKey(["20260217_13:00", "20260218_13:00"]), "20260218_13:00");
  assert.equal(latestBuildKey(["20260218", "20260217_23:59"]), "20260218");
  assert.equal(latestBuildKey(["zzz-not-a-date", "20250101_00:00"]), "20250101_00:00");
  assert.equal(latestBuildKey([]), null);
});

test("BuildKey sorts malformed keys below well-formed ones", () => {
  assert.ok(new BuildKey("garbage").compare(new BuildKey("20000101")) < 0);
  assert.equal(new BuildKey("20260218_13:00").compare(new BuildKey("20260218_13:00")), 0);
});

test("resolveFromIndex returns the newest build's rootfs", () => {
  const client = new SimplestreamsClient();
  const image = client.resolveFromIndex(loadIndex(), "alpine", "3.21", "x86_64");

  assert.deepEqual(image, {
    url: `https://images.linuxcontainers.org/${ALPINE_PATH_NEW}`,
    sha256: "eeff0011",
    size: 3200000,
    filename: "rootfs.tar.xz",
  });
});

test("resolveFromIndex falls back to the path suffix when no ftype matches", () => {
  const client = new SimplestreamsClient();
  const image = client.resolveFromIndex(loadIndex(), "ubuntu", "24.04", "aarch64");
  assert.equal(image.sha256, "ubuntuhash");
  assert.equal(image.size, 42);
});

test("resolveFromIndex tries the cloud variant after default", () => {
  const client = new SimplestreamsClient({ mirror: customMirror("https://mirror.test/lxc///") });
  const image = client.resolveFromIndex(loadIndex(), "kali", "current", "aarch64");
  assert.equal(
    image.url,
    "https://mirror.test/lxc/images/kali/current/arm64/cloud/20260101_00:00/rootfs.tar.xz",
  );
});

test("resolveFromIndex reports missing products, builds and rootfs items", () => {
  const client = new SimplestreamsClient();
  const index = loadIndex();

  assert.throws(
    () => client.resolveFromIndex(index, "alpine", "3.99", "aarch64"),
    (error: unknown) =>
      error instanceof ProductNotFoundError &&
      error.message === "product not found: alpine 3.99 (arm64)",
  );
  assert.throws(
    () => client.resolveFromIndex(index, "fedora", "41", "x86_64"),
    (error: unknown) =>
      error instanceof RootfsNotFoundError && error.productKey === "fedora:41:amd64:default",
  );
  assert.throws(
    () => client.resolveFromIndex(index, "gentoo", "current", "x86_64"),
    RootfsNotFoundError,
  );
});

test("parseSimplestreamsIndex rejects malformed documents", () => {
  assert.throws(() => parseSimplestreamsIndex([]), IndexDecodeError);
  assert.throws(() => parseSimplestreamsIndex({ products: null }), IndexDecodeError);
  assert.throws(
    () =>
      parseSimplestreamsIndex({
        products: {
          "alpine:3.21:amd64:default": {
            versions: { "20260101": { items: { root: { ftype: "root.tar.xz", size: "big", path: "x" } } } },
          },
        },
      }),
    (error: unknown) =>
      error instanceof IndexDecodeError &&
      error.message ===
        "invalid image index: products['alpine:3.21:amd64:default'].versions['20260101'].items['root'].size: expected non-negative integer",
  );
});

test("resolve fetches the index from the selected mirror", async () => {
  const fake = createFakeFetch({
    "https://mirrors.ustc.edu.cn/lxc-images/streams/v1/images.json": () =>
      jsonResponse(INDEX_DOCUMENT),
  });
  const client = new SimplestreamsClient({ mirror: presetMirror("ustc"), fetch: fake.fetch });

  const image = await client.resolve("alpine", "3.21", "x86_64");
  assert.equal(image.url, `https://mirrors.ustc.edu.cn/lxc-images/${ALPINE_PATH_NEW}`);
  assert.deepEqual(fake.requests, [
    "https://mirrors.ustc.edu.cn/lxc-images/streams/v1/images.json",
  ]);
});

test("fetchIndex wraps invalid json", async () => {
  const fake = createFakeFetch({ [INDEX_URL]: () => textResponse("{not json") });
  const client = new SimplestreamsClient({ fetch: fake.fetch });

  await assert.rejects(client.fetchIndex(), IndexDecodeError);
});
