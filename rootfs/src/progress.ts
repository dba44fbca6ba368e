import type { ProgressCallback } from "@distrofs/distro";

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

const RENDER_INTERVAL_MS = 250;

export function formatProgressBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB", "TB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit += 1;
  }

  if (unit === 0) {
    return `${Math.round(value)}${units[unit]}`;
  }
  if (value >= 100) {
    return `${value.toFixed(0)}${units[unit]}`;
  }
  if (value >= 10) {
    return `${value.toFixed(1)}${units[unit]}`;
  }
  return `${value.toFixed(2)}${units[unit]}`;
}

export function formatProgressDuration(totalMs: number): string {
  if (totalMs < 1000) {
    return `${Math.max(1, Math.round(totalMs))}ms`;
  }

  const totalSeconds = Math.max(1, Math.round(totalMs / 1000));
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;

  if (minutes > 0) {
    return `${minutes}m${seconds}s`;
  }
  return `${seconds}s`;
}

/** Terminal the progress line is drawn on */
export type ProgressStream = {
  isTTY?: boolean;
  columns?: number;
  write(chunk: string): boolean;
};

export type DownloadProgress = {
  /** feed to the download functions */
  onProgress: ProgressCallback;
  /** mark download success */
  finish: () => void;
  /** mark download failure */
  fail: () => void;
};

export type DownloadProgressOptions = {
  /** output stream (default: `process.stderr`) */
  stream?: ProgressStream;
  /** clock in `ms` (default: `Date.now`) */
  now?: () => number;
};

function truncateProgressLine(line: string, columns: number | undefined): string {
  if (!columns || columns < 8) {
    return line;
  }
  if (line.length <= columns - 1) {
    return line;
  }
  return `${line.slice(0, Math.max(1, columns - 2))}…`;
}

/** Bytes and eta text for the current state */
export function progressDetails(
  downloadedBytes: number,
  totalBytes: number,
  elapsedMs: number,
): { progress: string; eta?: string } {
  if (totalBytes <= 0) {
    return { progress: formatProgressBytes(downloadedBytes) };
  }

  const progress = `${formatProgressBytes(downloadedBytes)}/${formatProgressBytes(totalBytes)}`;
  const elapsedSeconds = Math.max(elapsedMs / 1000, 0.001);
  const speedBytesPerSecond = downloadedBytes / elapsedSeconds;
  if (downloadedBytes <= 0 || speedBytesPerSecond <= 0) {
    return { progress };
  }

  const remainingBytes = Math.max(0, totalBytes - downloadedBytes);
  const etaSeconds = remainingBytes / speedBytesPerSecond;
  return {
    progress,
    eta: formatProgressDuration(etaSeconds * 1000),
  };
}

/**
 * Spinner line on a TTY showing bytes, total and eta.
 *
 * The line appears with the first `onProgress` call. Renders nothing when the
 * stream is not a TTY or `CI=true`.
 */
export function createDownloadProgress(
  label: string,
  options: DownloadProgressOptions = {},
): DownloadProgress {
  const stream: ProgressStream = options.stream ?? process.stderr;
  const now = options.now ?? Date.now;

  const isTty = Boolean(stream.isTTY) && process.env.CI !== "true";
  if (!isTty) {
    return {
      onProgress() {},
      finish() {},
      fail() {},
    };
  }

  let startedAt = 0;
  let downloadedBytes = 0;
  let totalBytes = 0;
  let frame = 0;
  let interval: ReturnType<typeof setInterval> | null = null;
  let finished = false;

  const render = (line: string, final = false): void => {
    stream.write(`\r\x1b[2K${truncateProgressLine(line, stream.columns)}`);
    if (final) {
      stream.write("\n");
    }
  };

  const start = (): void => {
    startedAt = now();
    interval = setInterval(() => {
      const spinner = SPINNER_FRAMES[frame % SPINNER_FRAMES.length];
      frame += 1;
      const info = progressDetails(downloadedBytes, totalBytes, now() - startedAt);
      const etaSuffix = info.eta ? `, eta ${info.eta}` : "";
      render(`${spinner} downloading ${label} ${info.progress}${etaSuffix}`);
    }, RENDER_INTERVAL_MS);
    interval.unref();
  };

  // nothing is drawn until bytes flow, so cache hits stay silent
  const stop = (): boolean => {
    if (finished) return false;
    finished = true;
    if (interval === null) return false;
    clearInterval(interval);
    return true;
  };

  return {
    onProgress(downloaded, total) {
      if (finished) return;
      if (interval === null) start();
      downloadedBytes = downloaded;
      totalBytes = total;
    },

    finish() {
      if (!stop()) return;
      const elapsed = formatProgressDuration(now() - startedAt);
      const size = totalBytes > 0 ? totalBytes : downloadedBytes;
      render(`✓ downloaded ${label} ${formatProgressBytes(size)} in ${elapsed}`, true);
    },

    fail() {
      if (!stop()) return;
      const elapsed = formatProgressDuration(now() - startedAt);
      render(`✗ failed downloading ${label} after ${elapsed}`, true);
    },
  };
}
