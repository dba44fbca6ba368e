import os from "os";
import path from "path";

import { DEFAULT_MIRROR, parseMirror, type Mirror } from "@distrofs/distro";

function dataBaseDir(): string {
  return process.env.XDG_DATA_HOME ?? path.join(os.homedir(), ".local", "share");
}

/**
 * Determine where cached rootfs archives live.
 *
 * Priority:
 * 1. DISTROFS_CACHE_DIR environment variable
 * 2. $XDG_DATA_HOME/distrofs/rootfs
 * 3. ~/.local/share/distrofs/rootfs
 */
export function defaultCacheDir(): string {
  const explicit = process.env.DISTROFS_CACHE_DIR?.trim();
  if (explicit) {
    return explicit;
  }
  return path.join(dataBaseDir(), "distrofs", "rootfs");
}

/** Mirror from DISTROFS_MIRROR, falling back to the official server */
export function defaultMirror(): Mirror {
  const value = process.env.DISTROFS_MIRROR?.trim();
  return value ? parseMirror(value) : DEFAULT_MIRROR;
}
