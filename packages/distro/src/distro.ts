import { UnsupportedDistroError, UnsupportedVersionError } from "./errors.ts";

export type Distro =
  | "alma"
  | "alpine"
  | "arch"
  | "centos"
  | "debian"
  | "devuan"
  | "fedora"
  | "gentoo"
  | "kali"
  | "nixos"
  | "openeuler"
  | "opensuse"
  | "oracle"
  | "rocky"
  | "ubuntu"
  | "void";

/** A version string as given by the user (`3.21`, `24.04`, `bookworm`, ...) */
export type Version = string;

type DistroInfo = {
  /** name used in simplestreams product keys */
  indexName: string;
  /** version used when none is requested */
  defaultVersion: Version;
  /** version -> simplestreams release name */
  releases?: Readonly<Record<string, string>>;
};

const DISTROS: Readonly<Record<Distro, DistroInfo>> = {
  alma: { indexName: "almalinux", defaultVersion: "9" },
  alpine: { indexName: "alpine", defaultVersion: "3.21" },
  arch: { indexName: "archlinux", defaultVersion: "current" },
  centos: { indexName: "centos", defaultVersion: "9-Stream" },
  debian: {
    indexName: "debian",
    defaultVersion: "12",
    releases: {
      "10": "buster",
      "11": "bullseye",
      "12": "bookworm",
      "13": "trixie",
    },
  },
  devuan: {
    indexName: "devuan",
    defaultVersion: "daedalus",
    releases: {
      "4": "chimaera",
      "5": "daedalus",
      "6": "excalibur",
    },
  },
  fedora: { indexName: "fedora", defaultVersion: "41" },
  gentoo: { indexName: "gentoo", defaultVersion: "current" },
  kali: { indexName: "kali", defaultVersion: "current" },
  nixos: { indexName: "nixos", defaultVersion: "25.05" },
  openeuler: { indexName: "openeuler", defaultVersion: "24.03" },
  opensuse: { indexName: "opensuse", defaultVersion: "tumbleweed" },
  oracle: { indexName: "oracle", defaultVersion: "9" },
  rocky: { indexName: "rockylinux", defaultVersion: "9" },
  ubuntu: {
    indexName: "ubuntu",
    defaultVersion: "24.04",
    releases: {
      "20.04": "focal",
      "22.04": "jammy",
      "24.04": "noble",
      "24.10": "oracular",
      "25.04": "plucky",
    },
  },
  void: { indexName: "voidlinux", defaultVersion: "current" },
};

export const DISTRIBUTIONS: readonly Distro[] = [
  "alma",
  "alpine",
  "arch",
  "centos",
  "debian",
  "devuan",
  "fedora",
  "gentoo",
  "kali",
  "nixos",
  "openeuler",
  "opensuse",
  "oracle",
  "rocky",
  "ubuntu",
  "void",
];

const ALIASES: Readonly<Record<string, Distro>> = {
  almalinux: "alma",
  archlinux: "arch",
  rockylinux: "rocky",
  voidlinux: "void",
};

// Versions become a directory name in the cache.
const VERSION_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export function isDistro(value: string): value is Distro {
  return Object.prototype.hasOwnProperty.call(DISTROS, value);
}

export function indexName(distro: Distro): string {
  return DISTROS[distro].indexName;
}

export function defaultVersion(distro: Distro): Version {
  return DISTROS[distro].defaultVersion;
}

/**
 * Map a user-facing version to the simplestreams release name.
 *
 * Ubuntu, Debian and Devuan publish codenames in the index
 * (`24.04` -> `noble`); everything else uses the version as-is.
 */
export function indexRelease(distro: Distro, version: Version): string {
  const releases = DISTROS[distro].releases;
  if (releases && Object.prototype.hasOwnProperty.call(releases, version)) {
    return releases[version] ?? version;
  }
  return version;
}

export function normalizeVersion(distro: Distro, version: string): Version {
  const trimmed = version.trim();
  if (!VERSION_PATTERN.test(trimmed)) {
    throw new UnsupportedVersionError(distro, version);
  }
  return trimmed;
}

export function parseDistro(name: string): Distro {
  const lower = name.trim().toLowerCase();
  if (isDistro(lower)) return lower;
  const alias = ALIASES[lower];
  if (alias) return alias;
  throw new UnsupportedDistroError(name);
}

/**
 * Parse `name[:version]`, e.g. `alpine:3.20` or `ubuntu`.
 *
 * A missing version resolves to the distribution's default.
 */
export function parseDistroSpec(spec: string): {
  distro: Distro;
  version: Version;
} {
  const colon = spec.indexOf(":");
  const name = colon === -1 ? spec : spec.slice(0, colon);
  const distro = parseDistro(name);

  if (colon === -1) {
    return { distro, version: defaultVersion(distro) };
  }
  return { distro, version: normalizeVersion(distro, spec.slice(colon + 1)) };
}
