import type { Arch } from "./arch.ts";
import type { HashAlgorithm } from "./checksum.ts";
import { debugLog, type LogSink } from "./debug.ts";
import type { Distro, Version } from "./distro.ts";
import { ChecksumMismatchError } from "./errors.ts";
import { digestsEqual, sha256Hex, sha512Hex } from "./hash.ts";
import { contentLength, fetchText, httpGet, type HttpOptions } from "./http.ts";
import { SimplestreamsClient } from "./simplestreams.ts";
import type { Mirror } from "./mirror.ts";
import { requireOfficialProvider } from "./templates.ts";

/**
 * Progress callback: bytes received so far and the advertised total
 * (`0` when the server sent no content length).
 *
 * Runs on every chunk before the next one is read.
 */
export type ProgressCallback = (downloaded: number, total: number) => void;

/** A fully downloaded archive with its `sha256` digest */
export class DownloadResult {
  readonly data: Buffer;
  /** `sha256` hex digest, always computed */
  readonly sha256: string;
  /** file name taken from the url */
  readonly filename: string;

  private sha512Cache: string | null = null;

  constructor(data: Buffer, filename: string, sha256 = sha256Hex(data)) {
    this.data = data;
    this.filename = filename;
    this.sha256 = sha256;
  }

  get size(): number {
    return this.data.length;
  }

  /** `sha512` hex digest, computed on first use */
  sha512(): string {
    if (this.sha512Cache === null) {
      this.sha512Cache = sha512Hex(this.data);
    }
    return this.sha512Cache;
  }

  digest(algorithm: HashAlgorithm): string {
    return algorithm === "sha512" ? this.sha512() : this.sha256;
  }
}

export type DownloadOptions = HttpOptions & {
  /** log sink (default: stderr when `DISTROFS_DEBUG` includes `download`) */
  log?: LogSink;
};

export type IndexDownloadOptions = DownloadOptions & {
  /** mirror to resolve and download from */
  mirror?: Mirror;
};

export function filenameFromUrl(url: string, fallback = "rootfs.tar.gz"): string {
  let pathname = url;
  try {
    pathname = new URL(url).pathname;
  } catch {
    // not an absolute url; use the raw string
  }
  const last = pathname.split("/").pop();
  return last ? last : fallback;
}

/**
 * Download `url` into memory, reporting progress after every chunk.
 */
export async function downloadUrl(
  url: string,
  onProgress: ProgressCallback = () => {},
  options: HttpOptions = {},
): Promise<Buffer> {
  const response = await httpGet(url, options);
  const total = contentLength(response);

  const chunks: Buffer[] = [];
  let downloaded = 0;

  if (response.body) {
    const reader = response.body.getReader();
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;

        const chunk = Buffer.from(value);
        chunks.push(chunk);
        downloaded += chunk.length;
        onProgress(downloaded, total);
      }
    } catch (error) {
      try {
        await reader.cancel();
      } catch {
        // the original error is the one to report
      }
      throw error;
    } finally {
      reader.releaseLock();
    }
  }

  return Buffer.concat(chunks, downloaded);
}

/**
 * Compare `expected` against the digest of `result` under `algorithm`.
 *
 * The `sha512` digest is only computed when the algorithm asks for it.
 */
export function verifyHash(
  expected: string,
  result: DownloadResult,
  algorithm: HashAlgorithm,
  source?: string,
): void {
  const actual = result.digest(algorithm);
  if (!digestsEqual(expected, actual)) {
    throw new ChecksumMismatchError(expected.trim().toLowerCase(), actual, source);
  }
}

/**
 * Download a rootfs through the simplestreams index and verify its `sha256`.
 */
export async function downloadFromIndex(
  distro: Distro,
  version: Version,
  arch: Arch,
  onProgress: ProgressCallback = () => {},
  options: IndexDownloadOptions = {},
): Promise<DownloadResult> {
  const { mirror, log, ...http } = options;
  const debug = debugLog("download", log);

  const client = new SimplestreamsClient({ ...http, mirror, log });
  const resolved = await client.resolve(distro, version, arch);

  debug(`downloading ${distro} ${version} (${arch}) from ${resolved.url}`);
  const data = await downloadUrl(resolved.url, onProgress, http);
  const result = new DownloadResult(data, resolved.filename);

  verifyHash(resolved.sha256, result, "sha256", resolved.url);
  debug(`sha256 verified for ${resolved.filename}`);

  return result;
}

/**
 * Download a rootfs from the distribution's official source without
 * checksum verification.
 */
export async function downloadDistro(
  distro: Distro,
  version: Version,
  arch: Arch,
  onProgress: ProgressCallback = () => {},
  options: DownloadOptions = {},
): Promise<DownloadResult> {
  const { log, ...http } = options;
  const debug = debugLog("download", log);

  const provider = requireOfficialProvider(distro);
  const url = provider.rootfsUrl(version, arch);

  debug(`downloading ${distro} ${version} (${arch}) from ${url}`);
  const data = await downloadUrl(url, onProgress, http);
  const result = new DownloadResult(data, filenameFromUrl(url));
  debug(`download complete: ${result.size} bytes, sha256 ${result.sha256}`);

  return result;
}

/**
 * Download from the official source and verify against the published
 * checksum file, using the algorithm the distribution signs with.
 */
export async function downloadWithVerification(
  distro: Distro,
  version: Version,
  arch: Arch,
  onProgress: ProgressCallback = () => {},
  options: DownloadOptions = {},
): Promise<DownloadResult> {
  const { log, ...http } = options;
  const debug = debugLog("download", log);

  const provider = requireOfficialProvider(distro);
  const result = await downloadDistro(distro, version, arch, onProgress, options);

  const checksumUrl = provider.checksumUrl(version, arch);
  if (!checksumUrl) {
    return result;
  }

  debug(`fetching checksum file ${checksumUrl}`);
  const content = await fetchText(checksumUrl, http);
  const expected = provider.parseChecksum(content, result.filename);

  const algorithm = provider.hashAlgorithm();
  verifyHash(expected, result, algorithm, checksumUrl);
  debug(`${algorithm} verified for ${result.filename}`);

  return result;
}
