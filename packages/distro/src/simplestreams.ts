/**
 * LXC image server (simplestreams) client.
 *
 * The server publishes one static JSON index listing every product with its
 * dated builds, so resolving an image is a single fetch plus a lookup.
 */

import { indexArchName, type Arch } from "./arch.ts";
import { debugLog, type LogSink } from "./debug.ts";
import { indexName, indexRelease, type Distro, type Version } from "./distro.ts";
import {
  IndexDecodeError,
  ProductNotFoundError,
  RootfsNotFoundError,
  formatError,
} from "./errors.ts";
import { fetchText, type HttpOptions } from "./http.ts";
import {
  DEFAULT_MIRROR,
  formatMirror,
  imageUrl,
  streamsUrl,
  type Mirror,
} from "./mirror.ts";

/** Variants tried in order; append to support more flavors */
export const PRODUCT_VARIANTS: readonly string[] = ["default", "cloud"];

/** Canonical item type of the root filesystem archive */
export const ROOTFS_FTYPE = "root.tar.xz";

/** Conventional file name of the root filesystem archive */
export const ROOTFS_FILENAME = "rootfs.tar.xz";

export type IndexItem = {
  /** file type tag (`root.tar.xz`, `lxd.tar.xz`, ...) */
  ftype: string;
  /** `sha256` hex digest */
  sha256: string;
  /** size in `bytes` */
  size: number;
  /** path relative to the mirror base url */
  path: string;
};

export type IndexBuild = {
  /** items keyed by item name */
  items: Record<string, IndexItem>;
};

export type IndexProduct = {
  /** builds keyed by build timestamp (`20260218_07:42`) */
  versions: Record<string, IndexBuild>;
  arch?: string;
  os?: string;
  release?: string;
  releaseTitle?: string;
  variant?: string;
};

export type SimplestreamsIndex = {
  /** products keyed by `distro:release:arch:variant` */
  products: Record<string, IndexProduct>;
};

export type ResolvedImage = {
  /** absolute download url */
  url: string;
  /** expected `sha256` (lowercase hex) */
  sha256: string;
  /** expected size in `bytes` */
  size: number;
  /** archive file name (last url path segment) */
  filename: string;
};

const BUILD_KEY_PATTERN = /^\d{8}(?:_\d{2}:\d{2})?$/;

/**
 * Ordering key for simplestreams build timestamps.
 *
 * Build keys are zero-padded `YYYYMMDD[_HH:MM]` strings, which sort
 * chronologically as plain strings. Keys in any other format sort below every
 * well-formed key.
 */
export class BuildKey {
  readonly value: string;
  readonly wellFormed: boolean;

  constructor(value: string) {
    this.value = value;
    this.wellFormed = BUILD_KEY_PATTERN.test(value);
  }

  compare(other: BuildKey): number {
    if (this.wellFormed !== other.wellFormed) {
      return this.wellFormed ? 1 : -1;
    }
    if (this.value === other.value) return 0;
    return this.value < other.value ? -1 : 1;
  }
}

export function latestBuildKey(keys: Iterable<string>): string | null {
  let latest: BuildKey | null = null;
  for (const key of keys) {
    const candidate = new BuildKey(key);
    if (!latest || candidate.compare(latest) > 0) {
      latest = candidate;
    }
  }
  return latest ? latest.value : null;
}

export function productKey(
  distro: Distro,
  version: Version,
  arch: Arch,
  variant: string,
): string {
  return `${indexName(distro)}:${indexRelease(distro, version)}:${indexArchName(arch)}:${variant}`;
}

function filenameFromPath(itemPath: string): string {
  const last = itemPath.split("/").pop();
  return last ? last : ROOTFS_FILENAME;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown, where: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new IndexDecodeError(`${where}: expected string`);
  }
  return value;
}

function parseItem(raw: unknown, where: string): IndexItem {
  if (!isRecord(raw)) {
    throw new IndexDecodeError(`${where}: expected object`);
  }
  const { ftype, sha256, size, path } = raw;
  if (typeof ftype !== "string") {
    throw new IndexDecodeError(`${where}.ftype: expected string`);
  }
  if (typeof path !== "string" || path.length === 0) {
    throw new IndexDecodeError(`${where}.path: expected non-empty string`);
  }
  if (typeof size !== "number" || !Number.isInteger(size) || size < 0) {
    throw new IndexDecodeError(`${where}.size: expected non-negative integer`);
  }
  // Signature and metadata items may carry no digest of their own.
  const digest = sha256 === undefined ? "" : sha256;
  if (typeof digest !== "string") {
    throw new IndexDecodeError(`${where}.sha256: expected string`);
  }
  return { ftype, sha256: digest.toLowerCase(), size, path };
}

function parseBuild(raw: unknown, where: string): IndexBuild {
  if (!isRecord(raw)) {
    throw new IndexDecodeError(`${where}: expected object`);
  }
  const itemsRaw = raw.items ?? {};
  if (!isRecord(itemsRaw)) {
    throw new IndexDecodeError(`${where}.items: expected object`);
  }
  const items: Record<string, IndexItem> = {};
  for (const [name, value] of Object.entries(itemsRaw)) {
    items[name] = parseItem(value, `${where}.items['${name}']`);
  }
  return { items };
}

function parseProduct(raw: unknown, where: string): IndexProduct {
  if (!isRecord(raw)) {
    throw new IndexDecodeError(`${where}: expected object`);
  }
  const versionsRaw = raw.versions ?? {};
  if (!isRecord(versionsRaw)) {
    throw new IndexDecodeError(`${where}.versions: expected object`);
  }
  const versions: Record<string, IndexBuild> = {};
  for (const [build, value] of Object.entries(versionsRaw)) {
    versions[build] = parseBuild(value, `${where}.versions['${build}']`);
  }

  return {
    versions,
    arch: optionalString(raw.arch, `${where}.arch`),
    os: optionalString(raw.os, `${where}.os`),
    release: optionalString(raw.release, `${where}.release`),
    releaseTitle: optionalString(raw.release_title, `${where}.release_title`),
    variant: optionalString(raw.variant, `${where}.variant`),
  };
}

export function parseSimplestreamsIndex(raw: unknown): SimplestreamsIndex {
  if (!isRecord(raw)) {
    throw new IndexDecodeError("expected object");
  }
  if (!isRecord(raw.products)) {
    throw new IndexDecodeError("products must be an object");
  }

  const products: Record<string, IndexProduct> = {};
  for (const [key, value] of Object.entries(raw.products)) {
    products[key] = parseProduct(value, `products['${key}']`);
  }
  return { products };
}

function findRootfsItem(build: IndexBuild): IndexItem | null {
  const items = Object.values(build.items);
  return (
    items.find((item) => item.ftype === ROOTFS_FTYPE) ??
    items.find((item) => item.path.endsWith(ROOTFS_FILENAME)) ??
    null
  );
}

export type SimplestreamsClientOptions = HttpOptions & {
  /** mirror serving the index and images (default: official) */
  mirror?: Mirror;
  /** log sink (default: stderr when `DISTROFS_DEBUG` includes `index`) */
  log?: LogSink;
};

export class SimplestreamsClient {
  readonly mirror: Mirror;
  private readonly http: HttpOptions;
  private readonly log: LogSink;

  constructor(options: SimplestreamsClientOptions = {}) {
    const { mirror, log, ...http } = options;
    this.mirror = mirror ?? DEFAULT_MIRROR;
    this.http = http;
    this.log = debugLog("index", log);
  }

  async resolve(distro: Distro, version: Version, arch: Arch): Promise<ResolvedImage> {
    const index = await this.fetchIndex();
    return this.resolveFromIndex(index, distro, version, arch);
  }

  async fetchIndex(): Promise<SimplestreamsIndex> {
    const url = streamsUrl(this.mirror);
    this.log(`fetching simplestreams index from ${formatMirror(this.mirror)} (${url})`);

    const text = await fetchText(url, this.http);
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new IndexDecodeError(`failed to parse json from ${url}: ${formatError(error)}`);
    }

    const index = parseSimplestreamsIndex(raw);
    this.log(`index loaded: ${Object.keys(index.products).length} products`);
    return index;
  }

  resolveFromIndex(
    index: SimplestreamsIndex,
    distro: Distro,
    version: Version,
    arch: Arch,
  ): ResolvedImage {
    let key: string | null = null;
    let product: IndexProduct | null = null;
    for (const variant of PRODUCT_VARIANTS) {
      const candidate = productKey(distro, version, arch, variant);
      const found = index.products[candidate];
      if (found) {
        key = candidate;
        product = found;
        break;
      }
    }

    if (!key || !product) {
      throw new ProductNotFoundError(distro, version, indexArchName(arch));
    }
    this.log(`found product ${key}`);

    const latest = latestBuildKey(Object.keys(product.versions));
    const build = latest === null ? undefined : product.versions[latest];
    if (!build) {
      throw new RootfsNotFoundError(key);
    }

    const item = findRootfsItem(build);
    if (!item) {
      throw new RootfsNotFoundError(key);
    }
    this.log(`selected build ${latest} (${item.path})`);

    return {
      url: imageUrl(this.mirror, item.path),
      sha256: item.sha256,
      size: item.size,
      filename: filenameFromPath(item.path),
    };
  }
}
