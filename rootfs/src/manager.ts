import fs from "fs";
import path from "path";

import {
  debugLog,
  downloadFromIndex,
  downloadWithVerification,
  linuxArchName,
  normalizeVersion,
  type Arch,
  type Distro,
  type DownloadResult,
  type HttpOptions,
  type LogSink,
  type Mirror,
  type ProgressCallback,
  type Version,
} from "@distrofs/distro";

import {
  listAll,
  loadCached,
  prune,
  storeEntry,
  type CachedRootfs,
  type PruneOptions,
} from "./cache.ts";
import { defaultCacheDir, defaultMirror } from "./config.ts";
import { KeyedSingleflight } from "./singleflight.ts";

/** Where a missing rootfs is downloaded from */
export type RootfsSource = "index" | "official";

export type EnsureOptions = {
  /** mirror for the `index` source (default: `DISTROFS_MIRROR` or official) */
  mirror?: Mirror;
  /** download progress; concurrent callers share the first caller's callback */
  onProgress?: ProgressCallback;
  /** download source (default: `index`) */
  source?: RootfsSource;
};

export type RootfsManagerOptions = HttpOptions & {
  /** log sink shared by the cache and download layers */
  log?: LogSink;
  /** directory removal used by `prune()` */
  remove?: PruneOptions["remove"];
};

/**
 * Cached rootfs archives under `<cacheDir>/<distro>/<version>/<arch>/`.
 */
export class RootfsManager {
  readonly cacheDir: string;
  private readonly http: HttpOptions;
  private readonly log: LogSink | undefined;
  private readonly remove: PruneOptions["remove"];
  private readonly inflight = new KeyedSingleflight<CachedRootfs>();

  private constructor(cacheDir: string, options: RootfsManagerOptions) {
    const { log, remove, ...http } = options;
    this.cacheDir = cacheDir;
    this.http = http;
    this.log = log;
    this.remove = remove;
  }

  /** Open (and create) a cache root, defaulting to the configured directory */
  static create(
    cacheDir: string = defaultCacheDir(),
    options: RootfsManagerOptions = {},
  ): RootfsManager {
    fs.mkdirSync(cacheDir, { recursive: true });
    return new RootfsManager(path.resolve(cacheDir), options);
  }

  /** Entry directory; the version must be a single safe path segment */
  entryDir(distro: Distro, version: Version, arch: Arch): string {
    return path.join(
      this.cacheDir,
      distro,
      normalizeVersion(distro, version),
      linuxArchName(arch),
    );
  }

  /**
   * Return a verified cached rootfs, downloading it on a miss.
   *
   * Corrupted entries are removed and downloaded again.
   */
  async ensure(
    distro: Distro,
    version: Version,
    arch: Arch,
    options: EnsureOptions = {},
  ): Promise<CachedRootfs> {
    const entryDir = this.entryDir(distro, version, arch);
    return this.inflight.run(entryDir, () =>
      this.ensureUncoalesced(entryDir, distro, version, arch, options),
    );
  }

  private async ensureUncoalesced(
    entryDir: string,
    distro: Distro,
    version: Version,
    arch: Arch,
    options: EnsureOptions,
  ): Promise<CachedRootfs> {
    const debug = debugLog("cache", this.log);

    const cached = await loadCached(entryDir, { log: this.log });
    if (cached) {
      debug(`cache hit ${entryDir}`);
      return cached;
    }

    debug(`cache miss ${entryDir}`);
    const result = await this.download(distro, version, arch, options);
    const stored = storeEntry(entryDir, result);
    debug(`stored ${stored.archivePath} (${stored.metadata.size} bytes)`);
    return stored;
  }

  private download(
    distro: Distro,
    version: Version,
    arch: Arch,
    options: EnsureOptions,
  ): Promise<DownloadResult> {
    const onProgress = options.onProgress ?? (() => {});
    if (options.source === "official") {
      return downloadWithVerification(distro, version, arch, onProgress, {
        ...this.http,
        log: this.log,
      });
    }
    return downloadFromIndex(distro, version, arch, onProgress, {
      ...this.http,
      log: this.log,
      mirror: options.mirror ?? defaultMirror(),
    });
  }

  /** All cached entries, unverified */
  listCached(): CachedRootfs[] {
    return listAll(this.cacheDir);
  }

  /** Keep the newest `keepLatest` entries per distribution; returns bytes freed */
  prune(keepLatest: number): number {
    return prune(this.cacheDir, keepLatest, { log: this.log, remove: this.remove });
  }
}
