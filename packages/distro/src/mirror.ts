/**
 * Simplestreams mirrors for the LXC image server.
 *
 * Every mirror serves the same `streams/v1/images.json` index and image tree;
 * only the base URL differs.
 */

export type MirrorPreset = "official" | "tuna" | "ustc" | "bfsu";

export type Mirror =
  | { kind: "preset"; name: MirrorPreset }
  | { kind: "custom"; url: string };

const PRESET_BASE_URLS: Readonly<Record<MirrorPreset, string>> = {
  official: "https://images.linuxcontainers.org",
  tuna: "https://mirrors.tuna.tsinghua.edu.cn/lxc-images",
  ustc: "https://mirrors.ustc.edu.cn/lxc-images",
  bfsu: "https://mirrors.bfsu.edu.cn/lxc-images",
};

export const MIRROR_PRESETS: readonly MirrorPreset[] = [
  "official",
  "tuna",
  "ustc",
  "bfsu",
];

export const DEFAULT_MIRROR: Mirror = { kind: "preset", name: "official" };

const STREAMS_INDEX_PATH = "streams/v1/images.json";

export function presetMirror(name: MirrorPreset): Mirror {
  return { kind: "preset", name };
}

export function customMirror(url: string): Mirror {
  return { kind: "custom", url };
}

function isMirrorPreset(value: string): value is MirrorPreset {
  return Object.prototype.hasOwnProperty.call(PRESET_BASE_URLS, value);
}

/** Base URL without a trailing slash */
export function mirrorBaseUrl(mirror: Mirror): string {
  if (mirror.kind === "preset") {
    return PRESET_BASE_URLS[mirror.name];
  }
  return mirror.url.replace(/\/+$/, "");
}

export function streamsUrl(mirror: Mirror): string {
  return `${mirrorBaseUrl(mirror)}/${STREAMS_INDEX_PATH}`;
}

/** Absolute URL for an item path taken from the index */
export function imageUrl(mirror: Mirror, itemPath: string): string {
  return `${mirrorBaseUrl(mirror)}/${itemPath.replace(/^\/+/, "")}`;
}

export function formatMirror(mirror: Mirror): string {
  return mirror.kind === "preset" ? mirror.name : `custom(${mirror.url})`;
}

/**
 * Parse a mirror selector: a preset name (`official`, `tuna`, `ustc`, `bfsu`)
 * or an http(s) base URL.
 */
export function parseMirror(value: string): Mirror {
  const trimmed = value.trim();
  const lower = trimmed.toLowerCase();
  if (isMirrorPreset(lower)) {
    return presetMirror(lower);
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new Error(
      `invalid mirror '${value}' (expected one of ${MIRROR_PRESETS.join(", ")} or an http(s) url)`,
    );
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new Error(`invalid mirror '${value}': unsupported protocol ${url.protocol}`);
  }
  return customMirror(trimmed);
}
