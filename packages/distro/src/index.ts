/**
 * @distrofs/distro
 *
 * Linux distribution registry, rootfs URL resolution, download and checksum
 * verification.
 */

export {
  ARCHITECTURES,
  currentArch,
  debArchName,
  indexArchName,
  linuxArchName,
  parseArch,
  renderArch,
  type Arch,
  type ArchNaming,
} from "./arch.ts";
export {
  DISTRIBUTIONS,
  defaultVersion,
  indexName,
  indexRelease,
  isDistro,
  normalizeVersion,
  parseDistro,
  parseDistroSpec,
  type Distro,
  type Version,
} from "./distro.ts";
export {
  ChecksumMismatchError,
  ChecksumParseError,
  DistroError,
  HttpError,
  IndexDecodeError,
  NoOfficialProviderError,
  ProductNotFoundError,
  RootfsNotFoundError,
  UnsupportedDistroError,
  UnsupportedVersionError,
  formatError,
  type DistroErrorCode,
} from "./errors.ts";
export {
  DEFAULT_MIRROR,
  MIRROR_PRESETS,
  customMirror,
  formatMirror,
  imageUrl,
  mirrorBaseUrl,
  parseMirror,
  presetMirror,
  streamsUrl,
  type Mirror,
  type MirrorPreset,
} from "./mirror.ts";
export {
  parseChecksumFile,
  type ChecksumFormat,
  type HashAlgorithm,
} from "./checksum.ts";
export {
  ALPINE_SPEC,
  DEBIAN_SPEC,
  FEDORA_SPEC,
  UBUNTU_SPEC,
  TemplateProvider,
  getOfficialProvider,
  hasOfficialProvider,
  majorMinor,
  requireOfficialProvider,
  type DistroTemplateSpec,
  type VersionTransform,
} from "./templates.ts";
export {
  BuildKey,
  PRODUCT_VARIANTS,
  ROOTFS_FILENAME,
  ROOTFS_FTYPE,
  SimplestreamsClient,
  latestBuildKey,
  parseSimplestreamsIndex,
  productKey,
  type IndexBuild,
  type IndexItem,
  type IndexProduct,
  type ResolvedImage,
  type SimplestreamsClientOptions,
  type SimplestreamsIndex,
} from "./simplestreams.ts";
export {
  DownloadResult,
  downloadDistro,
  downloadFromIndex,
  downloadUrl,
  downloadWithVerification,
  filenameFromUrl,
  verifyHash,
  type DownloadOptions,
  type IndexDownloadOptions,
  type ProgressCallback,
} from "./download.ts";
export { digestHex, digestsEqual, sha256Hex, sha512Hex } from "./hash.ts";
export {
  DEFAULT_USER_AGENT,
  httpGet,
  resolveUserAgent,
  type HttpFetch,
  type HttpOptions,
} from "./http.ts";
export { debugLog, parseDebugEnv, type DebugFlag, type LogSink } from "./debug.ts";
