import { createHash } from "crypto";

import type { HashAlgorithm } from "./checksum.ts";

export function digestHex(algorithm: HashAlgorithm, data: Uint8Array): string {
  return createHash(algorithm).update(data).digest("hex");
}

export function sha256Hex(data: Uint8Array): string {
  return digestHex("sha256", data);
}

export function sha512Hex(data: Uint8Array): string {
  return digestHex("sha512", data);
}

/** Compare two hex digests ignoring case and surrounding whitespace */
export function digestsEqual(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}
