export class MetadataDecodeError extends Error {
  /** metadata file that failed to decode */
  readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super(`invalid cache metadata at ${path}: ${message}`, options);
    this.name = "MetadataDecodeError";
    this.path = path;
  }
}

export class UnsupportedArchiveFormatError extends Error {
  /** archive file name */
  readonly filename: string;

  constructor(filename: string) {
    super(
      `unsupported archive format: ${filename || "(empty)"} (expected .tar.gz, .tgz, .tar.xz or .txz)`,
    );
    this.name = "UnsupportedArchiveFormatError";
    this.filename = filename;
  }
}
