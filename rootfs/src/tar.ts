import fs from "fs";
import path from "path";
import { createGunzip } from "zlib";
import { Writable } from "stream";
import { pipeline } from "stream/promises";

import type { LogSink } from "@distrofs/distro";

const BLOCK_SIZE = 512;

export type TarEntryType = "file" | "directory" | "symlink" | "hardlink" | "other";

export type TarEntry = {
  /** path inside the archive */
  name: string;
  type: TarEntryType;
  /** permission bits */
  mode: number;
  /** payload size in `bytes` */
  size: number;
  /** link target for symlinks and hardlinks */
  linkName: string;
  /** file payload (regular files only) */
  content: Buffer | null;
};

type PendingOverrides = {
  path?: string;
  linkpath?: string;
};

function readTarString(buf: Buffer, offset: number, length: number): string {
  const slice = buf.subarray(offset, offset + length);
  const nullIdx = slice.indexOf(0);
  const end = nullIdx === -1 ? length : nullIdx;
  return slice.subarray(0, end).toString("utf8");
}

function readOctal(buf: Buffer, offset: number, length: number): number {
  const value = Number.parseInt(readTarString(buf, offset, length).trim(), 8);
  return Number.isFinite(value) ? value : 0;
}

function entryType(flag: number): TarEntryType {
  switch (flag) {
    case 0:
    case 0x30: // '0'
    case 0x37: // '7' contiguous file
      return "file";
    case 0x31: // '1'
      return "hardlink";
    case 0x32: // '2'
      return "symlink";
    case 0x35: // '5'
      return "directory";
    default:
      return "other";
  }
}

/** Parse PAX extended header records (`<len> <key>=<value>\n`) */
export function parsePaxRecords(data: Buffer): Map<string, string> {
  const records = new Map<string, string>();
  let offset = 0;

  while (offset < data.length) {
    const space = data.indexOf(0x20, offset);
    if (space === -1) break;

    const length = Number.parseInt(data.subarray(offset, space).toString("utf8"), 10);
    if (!Number.isFinite(length) || length <= 0 || offset + length > data.length) break;

    // strip trailing newline
    const record = data.subarray(space + 1, offset + length - 1).toString("utf8");
    const eq = record.indexOf("=");
    if (eq > 0) {
      records.set(record.slice(0, eq), record.slice(eq + 1));
    }
    offset += length;
  }

  return records;
}

/** Parse a raw tar archive buffer into entries */
export function parseTar(buf: Buffer): TarEntry[] {
  const entries: TarEntry[] = [];
  let offset = 0;
  let pending: PendingOverrides = {};

  while (offset + BLOCK_SIZE <= buf.length) {
    const header = buf.subarray(offset, offset + BLOCK_SIZE);

    // end-of-archive
    if (header.every((b) => b === 0)) {
      break;
    }

    const name = readTarString(header, 0, 100);
    const mode = readOctal(header, 100, 8);
    const size = readOctal(header, 124, 12);
    const typeFlag = header[156] ?? 0;
    const linkName = readTarString(header, 157, 100);

    let fullName = name;
    const magic = readTarString(header, 257, 6);
    if (magic === "ustar" || magic === "ustar ") {
      const prefix = readTarString(header, 345, 155);
      if (prefix && magic === "ustar") {
        fullName = `${prefix}/${name}`;
      }
    }

    offset += BLOCK_SIZE;
    const payload = buf.subarray(offset, offset + size);
    offset += Math.ceil(size / BLOCK_SIZE) * BLOCK_SIZE;

    // PAX per-entry header
    if (typeFlag === 0x78) {
      const records = parsePaxRecords(payload);
      pending = {
        path: records.get("path") ?? pending.path,
        linkpath: records.get("linkpath") ?? pending.linkpath,
      };
      continue;
    }
    // PAX global header
    if (typeFlag === 0x67) {
      continue;
    }
    // GNU long name / long link name
    if (typeFlag === 0x4c) {
      pending.path = readTarString(payload, 0, payload.length);
      continue;
    }
    if (typeFlag === 0x4b) {
      pending.linkpath = readTarString(payload, 0, payload.length);
      continue;
    }

    const type = entryType(typeFlag);
    entries.push({
      name: pending.path ?? fullName,
      type,
      mode,
      size,
      linkName: pending.linkpath ?? linkName,
      content: type === "file" ? Buffer.from(payload) : null,
    });
    pending = {};
  }

  return entries;
}

/** Decompress a gzip file and return the raw tar buffer */
export async function decompressTarGz(filePath: string): Promise<Buffer> {
  const chunks: Buffer[] = [];
  const input = fs.createReadStream(filePath);
  const gunzip = createGunzip();
  const collector = new Writable({
    write(chunk: Buffer, _encoding: BufferEncoding, cb: () => void) {
      chunks.push(chunk);
      cb();
    },
  });
  await pipeline(input, gunzip, collector);
  return Buffer.concat(chunks);
}

/** True when a directory between `root` and `target` is a symlink */
export function hasSymlinkComponent(target: string, root: string): boolean {
  const rel = path.relative(root, target);
  if (rel === "." || rel === "") return false;

  let current = root;
  const parts = rel.split(path.sep);
  for (const part of parts.slice(0, -1)) {
    current = path.join(current, part);
    const stat = fs.lstatSync(current, { throwIfNoEntry: false });
    if (!stat) return false;
    if (stat.isSymbolicLink()) return true;
  }
  return false;
}

function isInside(target: string, root: string): boolean {
  return target === root || target.startsWith(root + path.sep);
}

/** Remove whatever sits at `target` unless it is already a directory we want */
function prepareTarget(target: string, isDir: boolean): void {
  const stat = fs.lstatSync(target, { throwIfNoEntry: false });
  if (!stat) return;
  if (isDir && stat.isDirectory()) return;

  if (stat.isDirectory()) {
    fs.rmSync(target, { recursive: true, force: true });
  } else {
    fs.unlinkSync(target);
  }
}

export type ExtractEntriesOptions = {
  /** receives one line per skipped entry */
  log?: LogSink;
  /** hardlink creation (default: `fs.linkSync`, copied on failure) */
  link?: (existingPath: string, newPath: string) => void;
};

/**
 * Write tar entries below `destDir`.
 *
 * Entries resolving outside `destDir` or through a symlinked directory are
 * skipped, and so are hardlinks to anything but a regular file inside it.
 * Device nodes and fifos are skipped as well.
 */
export function extractEntries(
  entries: TarEntry[],
  destDir: string,
  options: ExtractEntriesOptions = {},
): void {
  const log = options.log ?? (() => {});
  const link = options.link ?? fs.linkSync;
  const absRoot = path.resolve(destDir);
  fs.mkdirSync(absRoot, { recursive: true });

  for (const entry of entries) {
    const target = path.resolve(absRoot, entry.name);

    if (!isInside(target, absRoot)) {
      log(`skipping path outside target ${entry.name}`);
      continue;
    }
    if (target === absRoot) {
      continue;
    }
    if (hasSymlinkComponent(target, absRoot)) {
      log(`skipping symlinked path ${entry.name}`);
      continue;
    }

    switch (entry.type) {
      case "directory":
        prepareTarget(target, true);
        fs.mkdirSync(target, { recursive: true });
        fs.chmodSync(target, (entry.mode & 0o7777) | 0o700);
        break;
      case "symlink":
        prepareTarget(target, false);
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.symlinkSync(entry.linkName, target);
        break;
      case "hardlink": {
        const linkTarget = path.resolve(absRoot, entry.linkName);
        if (!isInside(linkTarget, absRoot) || hasSymlinkComponent(linkTarget, absRoot)) {
          log(`skipping hardlink ${entry.name} -> ${entry.linkName}`);
          break;
        }
        // only regular files already written below the root
        const linkStat = fs.lstatSync(linkTarget, { throwIfNoEntry: false });
        if (!linkStat?.isFile()) {
          log(`skipping hardlink ${entry.name} -> ${entry.linkName}`);
          break;
        }
        prepareTarget(target, false);
        fs.mkdirSync(path.dirname(target), { recursive: true });
        try {
          link(linkTarget, target);
        } catch {
          fs.copyFileSync(linkTarget, target);
        }
        break;
      }
      case "file":
        prepareTarget(target, false);
        fs.mkdirSync(path.dirname(target), { recursive: true });
        fs.writeFileSync(target, entry.content ?? Buffer.alloc(0));
        fs.chmodSync(target, entry.mode & 0o7777);
        break;
      case "other":
        log(`skipping special file ${entry.name}`);
        break;
    }
  }
}

/** Extract a gzip-compressed tar into `destDir` */
export async function extractTarGz(
  archivePath: string,
  destDir: string,
  options: ExtractEntriesOptions = {},
): Promise<void> {
  const raw = await decompressTarGz(archivePath);
  extractEntries(parseTar(raw), destDir, options);
}
