/**
 * @distrofs/rootfs
 *
 * Verified on-disk cache of distribution rootfs archives.
 */

export {
  CacheTimestamp,
  METADATA_FILENAME,
  VERIFY_CHUNK_SIZE,
  fileSha256,
  listAll,
  loadCached,
  loadEntry,
  prune,
  readMetadata,
  storeEntry,
  verifyIntegrity,
  type CacheMetadata,
  type CacheOptions,
  type CachedRootfs,
  type PruneOptions,
} from "./cache.ts";
export { defaultCacheDir, defaultMirror } from "./config.ts";
export { MetadataDecodeError, UnsupportedArchiveFormatError } from "./errors.ts";
export {
  detectArchiveFormat,
  extractArchive,
  extractCached,
  type ArchiveFormat,
  type ArchiveUnpacker,
  type ExtractOptions,
} from "./extract.ts";
export {
  RootfsManager,
  type EnsureOptions,
  type RootfsManagerOptions,
  type RootfsSource,
} from "./manager.ts";
export {
  createDownloadProgress,
  formatProgressBytes,
  formatProgressDuration,
  progressDetails,
  type DownloadProgress,
  type DownloadProgressOptions,
  type ProgressStream,
} from "./progress.ts";
export { KeyedSingleflight } from "./singleflight.ts";
export { parseTar, extractEntries, type TarEntry, type TarEntryType } from "./tar.ts";
export { USAGE, runCli, type CliIo } from "./cli.ts";
