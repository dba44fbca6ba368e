import child_process from "child_process";
import fs from "fs";
import path from "path";

import { debugLog, type LogSink } from "@distrofs/distro";

import type { CachedRootfs } from "./cache.ts";
import { UnsupportedArchiveFormatError } from "./errors.ts";
import { extractTarGz } from "./tar.ts";

export type ArchiveFormat = "tar.gz" | "tar.xz";

const SUFFIXES: ReadonlyArray<readonly [string, ArchiveFormat]> = [
  [".tar.gz", "tar.gz"],
  [".tgz", "tar.gz"],
  [".tar.xz", "tar.xz"],
  [".txz", "tar.xz"],
];

/** Infer the archive format from the file name */
export function detectArchiveFormat(archivePath: string): ArchiveFormat {
  const name = path.basename(archivePath);
  for (const [suffix, format] of SUFFIXES) {
    if (name.endsWith(suffix)) {
      return format;
    }
  }
  throw new UnsupportedArchiveFormatError(name);
}

/** Unpacks one archive format into a target directory */
export type ArchiveUnpacker = (
  archivePath: string,
  targetDir: string,
  format: ArchiveFormat,
) => Promise<void>;

export type ExtractOptions = {
  /** replaces the built-in gzip/xz handling */
  unpacker?: ArchiveUnpacker;
  /** log sink (default: stderr when `DISTROFS_DEBUG` includes `cache`) */
  log?: LogSink;
};

function extractTarXz(archivePath: string, targetDir: string): void {
  child_process.execFileSync("tar", ["-xJf", archivePath, "-C", targetDir], {
    stdio: ["ignore", "ignore", "pipe"],
  });
}

function defaultUnpacker(log: LogSink): ArchiveUnpacker {
  return async (archivePath, targetDir, format) => {
    if (format === "tar.gz") {
      await extractTarGz(archivePath, targetDir, { log });
      return;
    }
    extractTarXz(archivePath, targetDir);
  };
}

/**
 * Unpack `archivePath` into `targetDir`, creating the directory.
 *
 * When `format` is omitted it is detected from the file name, and an
 * unsupported name fails before the target is touched.
 */
export async function extractArchive(
  archivePath: string,
  targetDir: string,
  format: ArchiveFormat = detectArchiveFormat(archivePath),
  options: ExtractOptions = {},
): Promise<void> {
  const log = debugLog("cache", options.log);
  const unpacker = options.unpacker ?? defaultUnpacker(log);

  fs.mkdirSync(targetDir, { recursive: true });
  log(`extracting ${archivePath} (${format}) into ${targetDir}`);
  await unpacker(archivePath, targetDir, format);
}

/** Extract a cached archive, detecting the format from its file name */
export async function extractCached(
  entry: CachedRootfs,
  targetDir: string,
  options: ExtractOptions = {},
): Promise<void> {
  const format = detectArchiveFormat(entry.metadata.filename);
  await extractArchive(entry.archivePath, targetDir, format, options);
}
