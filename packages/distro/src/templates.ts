import { renderArch, type Arch, type ArchNaming } from "./arch.ts";
import {
  parseChecksumFile,
  type ChecksumFormat,
  type HashAlgorithm,
} from "./checksum.ts";
import type { Distro, Version } from "./distro.ts";
import { NoOfficialProviderError } from "./errors.ts";

/** How `{major_minor}` is derived from the requested version */
export type VersionTransform = "identity" | "major-minor";

/**
 * Static description of an official rootfs download.
 *
 * URL templates support `{version}`, `{arch}`, `{codename}` and
 * `{major_minor}`. Placeholder text must not appear as literal content
 * elsewhere in a template.
 */
export type DistroTemplateSpec = {
  /** rootfs archive url template */
  rootfsUrl: string;
  /** checksum file url template */
  checksumUrl?: string;
  /** grammar of the checksum file */
  checksumFormat: ChecksumFormat;
  /** algorithm the checksum file is written with */
  hashAlgorithm: HashAlgorithm;
  /** architecture spelling in urls */
  archNaming: ArchNaming;
  /** version -> codename */
  codenames?: Readonly<Record<string, string>>;
  /** codename used when the version is not in `codenames` */
  defaultCodename: string;
  versionTransform: VersionTransform;
};

export const ALPINE_SPEC: DistroTemplateSpec = {
  rootfsUrl:
    "https://dl-cdn.alpinelinux.org/alpine/v{major_minor}/releases/{arch}/alpine-minirootfs-{version}-{arch}.tar.gz",
  checksumUrl:
    "https://dl-cdn.alpinelinux.org/alpine/v{major_minor}/releases/{arch}/alpine-minirootfs-{version}-{arch}.tar.gz.sha256",
  checksumFormat: "single-entry",
  hashAlgorithm: "sha256",
  archNaming: "linux",
  defaultCodename: "",
  versionTransform: "major-minor",
};

export const UBUNTU_SPEC: DistroTemplateSpec = {
  rootfsUrl:
    "https://cloud-images.ubuntu.com/{codename}/current/{codename}-server-cloudimg-{arch}-root.tar.xz",
  checksumUrl: "https://cloud-images.ubuntu.com/{codename}/current/SHA256SUMS",
  checksumFormat: "gnu-coreutils",
  hashAlgorithm: "sha256",
  archNaming: "debian",
  codenames: {
    "20.04": "focal",
    "22.04": "jammy",
    "24.04": "noble",
    "24.10": "oracular",
    "25.04": "plucky",
  },
  defaultCodename: "noble",
  versionTransform: "identity",
};

export const DEBIAN_SPEC: DistroTemplateSpec = {
  rootfsUrl:
    "https://cloud.debian.org/images/cloud/{codename}/latest/debian-{version}-nocloud-{arch}.tar.xz",
  checksumUrl: "https://cloud.debian.org/images/cloud/{codename}/latest/SHA512SUMS",
  checksumFormat: "gnu-coreutils",
  hashAlgorithm: "sha512",
  archNaming: "debian",
  codenames: {
    "10": "buster",
    "11": "bullseye",
    "12": "bookworm",
    "13": "trixie",
  },
  defaultCodename: "bookworm",
  versionTransform: "identity",
};

export const FEDORA_SPEC: DistroTemplateSpec = {
  rootfsUrl:
    "https://download.fedoraproject.org/pub/fedora/linux/releases/{version}/Cloud/{arch}/images/Fedora-Cloud-Base-{version}-1.2.{arch}.raw.xz",
  checksumUrl:
    "https://download.fedoraproject.org/pub/fedora/linux/releases/{version}/Cloud/{arch}/images/Fedora-Cloud-{version}-1.2-{arch}-CHECKSUM",
  checksumFormat: "bsd",
  hashAlgorithm: "sha256",
  archNaming: "linux",
  defaultCodename: "",
  versionTransform: "identity",
};

const OFFICIAL_SPECS: Readonly<Partial<Record<Distro, DistroTemplateSpec>>> = {
  alpine: ALPINE_SPEC,
  ubuntu: UBUNTU_SPEC,
  debian: DEBIAN_SPEC,
  fedora: FEDORA_SPEC,
};

/** `3.21.3` -> `3.21`; anything without a second dot is returned as-is */
export function majorMinor(version: Version): string {
  const first = version.indexOf(".");
  if (first === -1) return version;
  const second = version.indexOf(".", first + 1);
  if (second === -1) return version;
  return version.slice(0, second);
}

/**
 * Interprets a {@link DistroTemplateSpec}. Adding a distribution means adding
 * a spec record, never a new provider.
 */
export class TemplateProvider {
  readonly spec: DistroTemplateSpec;

  constructor(spec: DistroTemplateSpec) {
    this.spec = spec;
  }

  rootfsUrl(version: Version, arch: Arch): string {
    return this.resolveTemplate(this.spec.rootfsUrl, version, arch);
  }

  checksumUrl(version: Version, arch: Arch): string | null {
    const template = this.spec.checksumUrl;
    return template ? this.resolveTemplate(template, version, arch) : null;
  }

  parseChecksum(content: string, filename: string): string {
    return parseChecksumFile(this.spec.checksumFormat, content, filename);
  }

  hashAlgorithm(): HashAlgorithm {
    return this.spec.hashAlgorithm;
  }

  codename(version: Version): string {
    const table = this.spec.codenames;
    if (table && Object.prototype.hasOwnProperty.call(table, version)) {
      return table[version] ?? this.spec.defaultCodename;
    }
    return this.spec.defaultCodename;
  }

  resolveTemplate(template: string, version: Version, arch: Arch): string {
    const versionPart =
      this.spec.versionTransform === "major-minor" ? majorMinor(version) : version;

    return template
      .replaceAll("{version}", version)
      .replaceAll("{arch}", renderArch(arch, this.spec.archNaming))
      .replaceAll("{codename}", this.codename(version))
      .replaceAll("{major_minor}", versionPart);
  }
}

export function getOfficialProvider(distro: Distro): TemplateProvider | null {
  const spec = OFFICIAL_SPECS[distro];
  return spec ? new TemplateProvider(spec) : null;
}

export function requireOfficialProvider(distro: Distro): TemplateProvider {
  const provider = getOfficialProvider(distro);
  if (!provider) {
    throw new NoOfficialProviderError(distro);
  }
  return provider;
}

export function hasOfficialProvider(distro: Distro): boolean {
  return OFFICIAL_SPECS[distro] !== undefined;
}
