import { ChecksumParseError } from "./errors.ts";

/**
 * Checksum file grammars.
 *
 * - `single-entry`: first token of the first line (Alpine `.sha256` files)
 * - `gnu-coreutils`: `<hash>  <file>` or `<hash> *<file>` per line (Ubuntu, Debian)
 * - `bsd`: `SHA256 (<file>) = <hash>` per line (Fedora)
 */
export type ChecksumFormat = "single-entry" | "gnu-coreutils" | "bsd";

export type HashAlgorithm = "sha256" | "sha512";

export function parseChecksumFile(
  format: ChecksumFormat,
  content: string,
  filename: string,
): string {
  let hash: string | null;
  switch (format) {
    case "single-entry":
      hash = parseSingleEntry(content);
      break;
    case "gnu-coreutils":
      hash = parseGnuCoreutils(content, filename);
      break;
    case "bsd":
      hash = parseBsd(content, filename);
      break;
  }

  if (!hash) {
    throw new ChecksumParseError(filename);
  }
  return hash.toLowerCase();
}

function splitLines(content: string): string[] {
  return content.split(/\r?\n/);
}

function parseSingleEntry(content: string): string | null {
  const firstLine = splitLines(content)[0] ?? "";
  const token = firstLine.trim().split(/\s+/)[0];
  return token ? token : null;
}

function parseGnuCoreutils(content: string, filename: string): string | null {
  for (const line of splitLines(content)) {
    const match = /^(\S+)\s(.*)$/.exec(line);
    if (!match) continue;

    const [, hash, rest] = match;
    // `*` marks binary mode in coreutils output
    const name = (rest ?? "").trimStart().replace(/^\*/, "");
    if (name === filename) {
      return hash ?? null;
    }
  }
  return null;
}

function parseBsd(content: string, filename: string): string | null {
  for (const line of splitLines(content)) {
    if (!line.startsWith("SHA")) continue;

    const open = line.indexOf("(");
    const close = line.indexOf(")");
    if (open === -1 || close === -1 || close < open) continue;

    if (line.slice(open + 1, close) !== filename) continue;

    const eq = line.lastIndexOf("=");
    if (eq === -1) return null;
    return line.slice(eq + 1).trim() || null;
  }
  return null;
}
