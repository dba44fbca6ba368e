import { createHash, randomUUID } from "crypto";
import fs from "fs";
import path from "path";

import {
  debugLog,
  digestsEqual,
  formatError,
  type DownloadResult,
  type LogSink,
} from "@distrofs/distro";

import { MetadataDecodeError } from "./errors.ts";

export const METADATA_FILENAME = "metadata.json";

/** Read buffer size used when re-hashing a cached archive */
export const VERIFY_CHUNK_SIZE = 64 * 1024;

/** Metadata sidecar stored next to a cached archive */
export type CacheMetadata = {
  /** distribution slug (`alpine`) */
  distro: string;
  /** version string (`3.21`) */
  version: string;
  /** architecture (`aarch64`) */
  arch: string;
  /** `sha256` hex digest of the archive */
  sha256: string;
  /** archive file name inside the entry directory */
  filename: string;
  /** archive size in `bytes` */
  size: number;
  /** download time as decimal unix epoch `seconds` */
  downloaded_at: string;
};

/** Read-only handle to a cached archive */
export type CachedRootfs = {
  /** absolute path to the archive file */
  readonly archivePath: string;
  readonly metadata: Readonly<CacheMetadata>;
};

/**
 * Ordering key for `downloaded_at`.
 *
 * Values are decimal epoch seconds, so numeric order is chronological; values
 * that do not parse sort below every valid timestamp.
 */
export class CacheTimestamp {
  readonly raw: string;
  readonly seconds: number | null;

  constructor(raw: string) {
    this.raw = raw;
    this.seconds = /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : null;
  }

  static now(): CacheTimestamp {
    return new CacheTimestamp(String(Math.floor(Date.now() / 1000)));
  }

  compare(other: CacheTimestamp): number {
    if (this.seconds === null || other.seconds === null) {
      if (this.seconds === other.seconds) return 0;
      return this.seconds === null ? -1 : 1;
    }
    return this.seconds - other.seconds;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseMetadata(raw: unknown, metadataPath: string): CacheMetadata {
  if (!isRecord(raw)) {
    throw new MetadataDecodeError(metadataPath, "expected object");
  }

  const fields = ["distro", "version", "arch", "sha256", "filename", "downloaded_at"] as const;
  const strings: Partial<Record<(typeof fields)[number], string>> = {};
  for (const field of fields) {
    const value = raw[field];
    if (typeof value !== "string") {
      throw new MetadataDecodeError(metadataPath, `${field}: expected string`);
    }
    strings[field] = value;
  }

  const size = raw.size;
  if (typeof size !== "number" || !Number.isInteger(size) || size < 0) {
    throw new MetadataDecodeError(metadataPath, "size: expected non-negative integer");
  }

  const filename = strings.filename ?? "";
  if (!filename || filename !== path.basename(filename) || filename === "..") {
    throw new MetadataDecodeError(metadataPath, `filename: invalid value '${filename}'`);
  }

  return {
    distro: strings.distro ?? "",
    version: strings.version ?? "",
    arch: strings.arch ?? "",
    sha256: (strings.sha256 ?? "").toLowerCase(),
    filename,
    size,
    downloaded_at: strings.downloaded_at ?? "",
  };
}

export function readMetadata(entryDir: string): CacheMetadata | null {
  const metadataPath = path.join(entryDir, METADATA_FILENAME);
  if (!fs.existsSync(metadataPath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(metadataPath, "utf8"));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new MetadataDecodeError(metadataPath, error.message, { cause: error });
    }
    throw error;
  }
  return parseMetadata(raw, metadataPath);
}

/**
 * Load an entry without verifying the archive contents.
 *
 * Returns null when the metadata or the archive it names is missing.
 */
export function loadEntry(entryDir: string): CachedRootfs | null {
  const metadata = readMetadata(entryDir);
  if (!metadata) {
    return null;
  }

  const archivePath = path.join(entryDir, metadata.filename);
  if (!fs.existsSync(archivePath)) {
    return null;
  }

  return { archivePath, metadata };
}

/** Stream a file through `sha256` with a fixed-size read buffer */
export async function fileSha256(filePath: string): Promise<string> {
  const hash = createHash("sha256");
  const stream = fs.createReadStream(filePath, { highWaterMark: VERIFY_CHUNK_SIZE });
  for await (const chunk of stream) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

export async function verifyIntegrity(entry: CachedRootfs): Promise<boolean> {
  const actual = await fileSha256(entry.archivePath);
  return digestsEqual(actual, entry.metadata.sha256);
}

export type CacheOptions = {
  /** log sink (default: stderr when `DISTROFS_DEBUG` includes `cache`) */
  log?: LogSink;
};

/**
 * Load an entry and re-verify its archive.
 *
 * A corrupted entry is removed (best effort) and reported as a miss.
 */
export async function loadCached(
  entryDir: string,
  options: CacheOptions = {},
): Promise<CachedRootfs | null> {
  const log = debugLog("cache", options.log);

  const entry = loadEntry(entryDir);
  if (!entry) {
    return null;
  }

  if (await verifyIntegrity(entry)) {
    return entry;
  }

  log(
    `integrity check failed for ${entry.archivePath} (expected ${entry.metadata.sha256}), removing entry`,
  );
  try {
    fs.rmSync(entryDir, { recursive: true, force: true });
  } catch (error) {
    log(`failed to remove ${entryDir}: ${formatError(error)}`);
  }
  return null;
}

/**
 * Write a downloaded archive and its metadata into `entryDir`.
 *
 * Distro, version and arch are taken from the last three path segments of
 * `entryDir` (`<root>/<distro>/<version>/<arch>`).
 */
export function storeEntry(entryDir: string, result: DownloadResult): CachedRootfs {
  fs.mkdirSync(entryDir, { recursive: true });

  const archivePath = path.join(entryDir, result.filename);
  fs.writeFileSync(archivePath, result.data);

  const segments = path.resolve(entryDir).split(path.sep).filter(Boolean);
  const segment = (fromEnd: number): string =>
    segments[segments.length - fromEnd] ?? "unknown";

  const metadata: CacheMetadata = {
    distro: segment(3),
    version: segment(2),
    arch: segment(1),
    sha256: result.sha256,
    filename: result.filename,
    size: result.data.length,
    downloaded_at: CacheTimestamp.now().raw,
  };

  const metadataPath = path.join(entryDir, METADATA_FILENAME);
  const tmpPath = `${metadataPath}.tmp-${randomUUID().slice(0, 8)}`;
  fs.writeFileSync(tmpPath, JSON.stringify(metadata, null, 2) + "\n");
  fs.renameSync(tmpPath, metadataPath);

  return { archivePath, metadata };
}

function subdirectories(dir: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => path.join(dir, entry.name));
}

/**
 * List every entry under `cacheDir` (`<distro>/<version>/<arch>`) without
 * verifying archives.
 */
export function listAll(cacheDir: string): CachedRootfs[] {
  if (!fs.existsSync(cacheDir)) {
    return [];
  }

  const entries: CachedRootfs[] = [];
  for (const distroDir of subdirectories(cacheDir)) {
    for (const versionDir of subdirectories(distroDir)) {
      for (const archDir of subdirectories(versionDir)) {
        const entry = loadEntry(archDir);
        if (entry) entries.push(entry);
      }
    }
  }
  return entries;
}

export type PruneOptions = CacheOptions & {
  /** directory removal (default: recursive `fs.rmSync`) */
  remove?: (dir: string) => void;
};

function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true });
}

/**
 * Keep the `keepLatest` newest entries per distribution and remove the rest.
 *
 * Returns the bytes freed, counting only entries whose directory was removed.
 */
export function prune(
  cacheDir: string,
  keepLatest: number,
  options: PruneOptions = {},
): number {
  if (!Number.isInteger(keepLatest) || keepLatest < 0) {
    throw new Error(`keepLatest must be a non-negative integer (got ${keepLatest})`);
  }

  const log = debugLog("cache", options.log);
  const remove = options.remove ?? removeDir;

  const byDistro = new Map<string, CachedRootfs[]>();
  for (const entry of listAll(cacheDir)) {
    const group = byDistro.get(entry.metadata.distro);
    if (group) group.push(entry);
    else byDistro.set(entry.metadata.distro, [entry]);
  }

  let freed = 0;
  for (const group of byDistro.values()) {
    const sorted = group
      .map((entry) => ({ entry, key: new CacheTimestamp(entry.metadata.downloaded_at) }))
      .sort((a, b) => b.key.compare(a.key));

    for (const { entry } of sorted.slice(keepLatest)) {
      const entryDir = path.dirname(entry.archivePath);
      try {
        remove(entryDir);
        freed += entry.metadata.size;
        log(`pruned ${entryDir} (${entry.metadata.size} bytes)`);
      } catch (error) {
        log(`failed to prune ${entryDir}: ${formatError(error)}`);
      }
    }
  }

  return freed;
}
