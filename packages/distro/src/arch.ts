export type Arch = "aarch64" | "x86_64";

export const ARCHITECTURES: readonly Arch[] = ["aarch64", "x86_64"];

/** How an architecture name is spelled in a URL or index key */
export type ArchNaming = "linux" | "debian";

const DEBIAN_NAMES: Record<Arch, string> = {
  aarch64: "arm64",
  x86_64: "amd64",
};

/** Kernel-style name (`aarch64` / `x86_64`), also used for cache paths */
export function linuxArchName(arch: Arch): string {
  return arch;
}

/** Debian-style name (`arm64` / `amd64`) */
export function debArchName(arch: Arch): string {
  return DEBIAN_NAMES[arch];
}

/** Name used in simplestreams product keys (same as Debian) */
export function indexArchName(arch: Arch): string {
  return debArchName(arch);
}

export function renderArch(arch: Arch, naming: ArchNaming): string {
  return naming === "debian" ? debArchName(arch) : linuxArchName(arch);
}

export function parseArch(value: string | undefined | null): Arch | null {
  if (!value) return null;
  const lower = value.trim().toLowerCase();
  if (lower === "aarch64" || lower === "arm64") return "aarch64";
  if (lower === "x86_64" || lower === "amd64" || lower === "x64") {
    return "x86_64";
  }
  return null;
}

function nodeArchToArch(arch: NodeJS.Architecture): Arch {
  if (arch === "arm64") return "aarch64";
  return "x86_64";
}

export function currentArch(): Arch {
  return nodeArchToArch(process.arch);
}
