export type DistroErrorCode =
  | "unsupported_distro"
  | "no_official_provider"
  | "unsupported_version"
  | "checksum_mismatch"
  | "checksum_parse"
  | "product_not_found"
  | "rootfs_not_found"
  | "http"
  | "index_decode";

export class DistroError extends Error {
  /** stable error code */
  readonly code: DistroErrorCode;

  constructor(code: DistroErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DistroError";
    this.code = code;
  }
}

export class UnsupportedDistroError extends DistroError {
  /** distribution name as given by the caller */
  readonly distro: string;

  constructor(
    distro: string,
    message = `unsupported distribution: ${distro}`,
    code: DistroErrorCode = "unsupported_distro",
  ) {
    super(code, message);
    this.name = "UnsupportedDistroError";
    this.distro = distro;
  }
}

/**
 * Raised when a distribution has no official URL template and must be
 * resolved through the unified image index instead.
 */
export class NoOfficialProviderError extends UnsupportedDistroError {
  constructor(distro: string) {
    super(
      distro,
      `no official download source for ${distro} (use the image index instead)`,
      "no_official_provider",
    );
    this.name = "NoOfficialProviderError";
  }
}

export class UnsupportedVersionError extends DistroError {
  readonly distro: string;
  readonly version: string;

  constructor(distro: string, version: string) {
    super("unsupported_version", `unsupported version ${version} for ${distro}`);
    this.name = "UnsupportedVersionError";
    this.distro = distro;
    this.version = version;
  }
}

export class ChecksumMismatchError extends DistroError {
  /** hash from the checksum file or index */
  readonly expected: string;
  /** hash computed from the downloaded bytes */
  readonly actual: string;

  constructor(expected: string, actual: string, source?: string) {
    const where = source ? ` for ${source}` : "";
    super(
      "checksum_mismatch",
      `checksum mismatch${where}\n  expected: ${expected}\n  got:      ${actual}`,
    );
    this.name = "ChecksumMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

export class ChecksumParseError extends DistroError {
  /** file the checksum was looked up for */
  readonly filename: string;

  constructor(filename: string) {
    super("checksum_parse", `failed to parse checksum file (no entry for ${filename})`);
    this.name = "ChecksumParseError";
    this.filename = filename;
  }
}

export class ProductNotFoundError extends DistroError {
  readonly distro: string;
  readonly version: string;
  readonly arch: string;

  constructor(distro: string, version: string, arch: string) {
    super("product_not_found", `product not found: ${distro} ${version} (${arch})`);
    this.name = "ProductNotFoundError";
    this.distro = distro;
    this.version = version;
    this.arch = arch;
  }
}

export class RootfsNotFoundError extends DistroError {
  /** product key, e.g. `alpine:3.21:amd64:default` */
  readonly productKey: string;

  constructor(productKey: string) {
    super("rootfs_not_found", `rootfs not found in product: ${productKey}`);
    this.name = "RootfsNotFoundError";
    this.productKey = productKey;
  }
}

export class HttpError extends DistroError {
  readonly url: string;
  /** response status, absent when the request never got a response */
  readonly status?: number;

  constructor(url: string, message: string, status?: number, cause?: unknown) {
    super("http", message, cause === undefined ? undefined : { cause });
    this.name = "HttpError";
    this.url = url;
    this.status = status;
  }
}

export class IndexDecodeError extends DistroError {
  constructor(message: string) {
    super("index_decode", `invalid image index: ${message}`);
    this.name = "IndexDecodeError";
  }
}

export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
