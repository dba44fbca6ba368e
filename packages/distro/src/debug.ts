export type DebugFlag = "cache" | "download" | "index";

const ALL_FLAGS: readonly DebugFlag[] = ["cache", "download", "index"];

export type LogSink = (msg: string) => void;

export function parseDebugEnv(value: string | undefined = process.env.DISTROFS_DEBUG): Set<DebugFlag> {
  const flags = new Set<DebugFlag>();
  if (!value) return flags;
  for (const entry of value.split(",")) {
    const flag = entry.trim().toLowerCase();
    if (!flag) continue;
    if (flag === "*" || flag === "all") {
      for (const known of ALL_FLAGS) flags.add(known);
      continue;
    }
    for (const known of ALL_FLAGS) {
      if (flag === known) flags.add(known);
    }
  }
  return flags;
}

function stderrSink(msg: string): void {
  process.stderr.write(`${msg}\n`);
}

/**
 * Return a log sink for `flag`.
 *
 * An explicit sink always wins; otherwise lines go to stderr when the flag is
 * enabled through `DISTROFS_DEBUG`, and are dropped when it is not.
 */
export function debugLog(flag: DebugFlag, sink?: LogSink): LogSink {
  if (sink) return sink;
  if (!parseDebugEnv().has(flag)) {
    return () => {};
  }
  return (msg) => stderrSink(`[${flag}] ${msg}`);
}
