import { parseArgs } from "util";

import {
  SimplestreamsClient,
  currentArch,
  formatError,
  formatMirror,
  linuxArchName,
  parseArch,
  parseDistroSpec,
  parseMirror,
  requireOfficialProvider,
  type Arch,
  type HttpFetch,
  type Mirror,
} from "@distrofs/distro";

import { defaultCacheDir, defaultMirror } from "./config.ts";
import { extractCached } from "./extract.ts";
import { RootfsManager } from "./manager.ts";
import { createDownloadProgress, formatProgressBytes, type ProgressStream } from "./progress.ts";

export const USAGE = `usage: distrofs <command> [options]

commands:
  ensure <distro[:version]>   download (or reuse) a verified rootfs archive
  resolve <distro[:version]>  print the download url without downloading
  list                        list cached archives
  prune --keep N              keep the newest N archives per distribution

options:
  --arch ARCH        target architecture (aarch64, x86_64; default: host)
  --mirror MIRROR    official, tuna, ustc, bfsu or a base url
  --official         use the distribution's own servers and checksum files
  --extract DIR      (ensure) unpack the archive into DIR
  --cache-dir DIR    cache root (default: DISTROFS_CACHE_DIR or XDG data dir)
  --keep N           (prune) entries to keep per distribution
  -h, --help         show this help
`;

/** Streams and transport the CLI runs against */
export type CliIo = {
  stdout: ProgressStream;
  stderr: ProgressStream;
  /** injected http transport */
  fetch?: HttpFetch;
};

type CliValues = {
  arch?: string;
  mirror?: string;
  official?: boolean;
  extract?: string;
  "cache-dir"?: string;
  keep?: string;
  help?: boolean;
};

function parseCli(argv: string[]): { values: CliValues; positionals: string[] } {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      arch: { type: "string" },
      mirror: { type: "string" },
      official: { type: "boolean" },
      extract: { type: "string" },
      "cache-dir": { type: "string" },
      keep: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });
}

function resolveArch(value: string | undefined): Arch {
  if (value === undefined) return currentArch();
  const arch = parseArch(value);
  if (!arch) {
    throw new Error(`unsupported architecture: ${value}`);
  }
  return arch;
}

function resolveMirror(value: string | undefined): Mirror {
  return value === undefined ? defaultMirror() : parseMirror(value);
}

function requireSpec(command: string, positionals: string[]): string {
  const spec = positionals[1];
  if (!spec) {
    throw new Error(`${command} requires <distro[:version]>`);
  }
  return spec;
}

function parseKeep(value: string | undefined): number {
  if (value === undefined) {
    throw new Error("prune requires --keep N");
  }
  if (!/^\d+$/.test(value)) {
    throw new Error(`--keep must be a non-negative integer (got ${value})`);
  }
  return Number.parseInt(value, 10);
}

async function runEnsure(values: CliValues, positionals: string[], io: CliIo): Promise<void> {
  const { distro, version } = parseDistroSpec(requireSpec("ensure", positionals));
  const arch = resolveArch(values.arch);
  const manager = RootfsManager.create(values["cache-dir"] ?? defaultCacheDir(), {
    fetch: io.fetch,
  });

  const progress = createDownloadProgress(`${distro} ${version} (${linuxArchName(arch)})`, {
    stream: io.stderr,
  });
  const entry = await manager
    .ensure(distro, version, arch, {
      mirror: resolveMirror(values.mirror),
      source: values.official ? "official" : "index",
      onProgress: progress.onProgress,
    })
    .then(
      (cached) => {
        progress.finish();
        return cached;
      },
      (error: unknown) => {
        progress.fail();
        throw error;
      },
    );

  io.stdout.write(`${entry.archivePath}\n`);

  if (values.extract) {
    await extractCached(entry, values.extract);
    io.stdout.write(`extracted to ${values.extract}\n`);
  }
}

async function runResolve(values: CliValues, positionals: string[], io: CliIo): Promise<void> {
  const { distro, version } = parseDistroSpec(requireSpec("resolve", positionals));
  const arch = resolveArch(values.arch);

  if (values.official) {
    const provider = requireOfficialProvider(distro);
    io.stdout.write(`url: ${provider.rootfsUrl(version, arch)}\n`);
    const checksumUrl = provider.checksumUrl(version, arch);
    if (checksumUrl) {
      io.stdout.write(`checksum: ${checksumUrl} (${provider.hashAlgorithm()})\n`);
    }
    return;
  }

  const mirror = resolveMirror(values.mirror);
  const client = new SimplestreamsClient({ mirror, fetch: io.fetch });
  const image = await client.resolve(distro, version, arch);
  io.stdout.write(
    `url: ${image.url}\n` +
      `sha256: ${image.sha256}\n` +
      `size: ${image.size}\n` +
      `mirror: ${formatMirror(mirror)}\n`,
  );
}

function runList(values: CliValues, io: CliIo): void {
  const manager = RootfsManager.create(values["cache-dir"] ?? defaultCacheDir());
  const entries = manager.listCached();
  if (entries.length === 0) {
    io.stdout.write("no cached rootfs archives\n");
    return;
  }

  const sorted = [...entries].sort((a, b) =>
    `${a.metadata.distro}/${a.metadata.version}/${a.metadata.arch}`.localeCompare(
      `${b.metadata.distro}/${b.metadata.version}/${b.metadata.arch}`,
    ),
  );
  for (const { metadata } of sorted) {
    io.stdout.write(
      `${metadata.distro}:${metadata.version}\t${metadata.arch}\t` +
        `${formatProgressBytes(metadata.size)}\t${metadata.filename}\n`,
    );
  }
}

function runPrune(values: CliValues, io: CliIo): void {
  const keep = parseKeep(values.keep);
  const manager = RootfsManager.create(values["cache-dir"] ?? defaultCacheDir());
  const freed = manager.prune(keep);
  io.stdout.write(`freed ${formatProgressBytes(freed)}\n`);
}

/** Run the `distrofs` command line; resolves to the process exit code */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  try {
    const { values, positionals } = parseCli(argv);
    const command = positionals[0];

    if (values.help || !command) {
      (values.help ? io.stdout : io.stderr).write(USAGE);
      return values.help ? 0 : 2;
    }

    switch (command) {
      case "ensure":
        await runEnsure(values, positionals, io);
        return 0;
      case "resolve":
        await runResolve(values, positionals, io);
        return 0;
      case "list":
        runList(values, io);
        return 0;
      case "prune":
        runPrune(values, io);
        return 0;
      default:
        throw new Error(`unknown command: ${command}`);
    }
  } catch (error) {
    io.stderr.write(`error: ${formatError(error)}\n`);
    return 1;
  }
}
