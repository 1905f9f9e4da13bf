/**
 * Debug Channels
 *
 * Follows a page through the compiler: which imports files it pulls in, when
 * the chunk tree cache parses or reuses a tree, and what each merge layer
 * contributes.
 *
 * Enable via environment variable:
 * ```bash
 * STRATA_DEBUG=cache npm test          # Just the chunk tree cache
 * STRATA_DEBUG=chain,merge npm test    # Multiple channels
 * STRATA_DEBUG=* npm test              # Everything
 * ```
 *
 * Call sites stay in place and are no-ops while their channel is off:
 * ```typescript
 * debug.merge("layer", { file, chunks: tree.chunks.length });
 * ```
 */

const DEBUG_CHANNELS = ["parse", "cache", "chain", "merge", "emit", "host"] as const;

export type DebugChannelName = (typeof DEBUG_CHANNELS)[number];

/** Payloads are flat: paths, counts, flags and statuses. */
export type DebugData = Readonly<Record<string, string | number | boolean | null>>;

export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  /** `pretty` writes `[channel.point] { key=value }`, `json` one object per line. */
  format: "json" | "pretty";
  output: (message: string) => void;
}

let config: DebugConfig = { format: "pretty", output: console.log };

function parseDebugEnv(): ReadonlySet<string> {
  const env = process.env["STRATA_DEBUG"] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") return new Set(DEBUG_CHANNELS);
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()));
}

let enabledChannels = parseDebugEnv();

function formatMessage(channel: DebugChannelName, point: string, data: DebugData | undefined): string {
  if (config.format === "json") {
    return JSON.stringify({ channel, point, ...(data && { data }) });
  }
  const label = `[${channel}.${point}]`;
  const entries = Object.entries(data ?? {});
  if (entries.length === 0) return label;
  const parts = entries.map(([key, value]) => `${key}=${typeof value === "string" ? JSON.stringify(value) : String(value)}`);
  return `${label} { ${parts.join(", ")} }`;
}

function createChannel(name: DebugChannelName): DebugChannel {
  if (!enabledChannels.has(name)) return () => {};
  return (point, data) => config.output(formatMessage(name, point, data));
}

/** One channel per compiler stage, plus `host` for discovery and batch compiles. */
export const debug: Record<DebugChannelName, DebugChannel> = {
  parse: createChannel("parse"),
  cache: createChannel("cache"),
  chain: createChannel("chain"),
  merge: createChannel("merge"),
  emit: createChannel("emit"),
  host: createChannel("host"),
};

/** Re-reads `STRATA_DEBUG` and rebuilds every channel. */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  for (const name of DEBUG_CHANNELS) debug[name] = createChannel(name);
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}
