/**
 * Debug Channels
 *
 * Named, targeted logging for the output buffer and the tag matcher.
 * A channel is selected once, when it is created: a disabled channel is a
 * no-op function, so call sites stay in the code permanently.
 *
 * Enable via environment variable:
 * ```bash
 * TAGWRIGHT_DEBUG=match npm test         # Just tag matching
 * TAGWRIGHT_DEBUG=output,match npm test  # Multiple channels
 * TAGWRIGHT_DEBUG=* npm test             # Everything
 * ```
 *
 * In code:
 * ```typescript
 * debug.match("rule.matched", { tagName, directive });
 * ```
 */

import { TAGWRIGHT_DEBUG_ENV } from "./config.js";

export type DebugData = Record<string, unknown>;

export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  /** `json` for machine-readable lines, `pretty` for humans */
  format: "json" | "pretty";
  timestamps: boolean;
  output: (message: string) => void;
}

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: console.log,
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env[TAGWRIGHT_DEBUG_ENV] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") return new Set(["*"]);
  return new Set(
    env
      .split(",")
      .map((s) => s.trim().toLowerCase())
      .filter((s) => s.length > 0),
  );
}

let enabledChannels = parseDebugEnv();

const extraChannels = new Map<string, DebugChannel>();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function formatMessage(channel: string, point: string, data: DebugData | undefined): string {
  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data }),
      ...(config.timestamps && { timestamp: Date.now() }),
    });
  }

  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : "";
  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) return `${prefix}${label}`;
  return `${prefix}${label} ${formatData(data)}`;
}

function formatData(data: DebugData): string {
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `{ ${parts.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    if (value.length > 60) return `"${value.slice(0, 57)}..."`;
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 3) {
      const inline = `[${value.map((v) => formatValue(v)).join(", ")}]`;
      if (inline.length <= 50) return inline;
    }
    return `[${value.length} items]`;
  }
  if (typeof value === "object") {
    if ("name" in value && typeof value.name === "string") return `<${value.name}>`;
    if ("kind" in value && typeof value.kind === "string") return `<${value.kind}>`;
    return "{...}";
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return "[unserializable]";
  }
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point: string, data?: DebugData) => {
    config.output(formatMessage(name, point, data));
  };
}

/** Get or create a debug channel outside the built-in set. */
export function getDebugChannel(name: string): DebugChannel {
  const key = name.trim().toLowerCase();
  if (!key) return () => {};
  const existing = extraChannels.get(key);
  if (existing) return existing;
  const channel = createChannel(key);
  extraChannels.set(key, channel);
  return channel;
}

/**
 * Re-read TAGWRIGHT_DEBUG and rebuild every channel.
 */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.output = createChannel("output");
  debug.match = createChannel("match");
  for (const name of extraChannels.keys()) {
    extraChannels.set(name, createChannel(name));
  }
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

/** With no argument: whether any channel at all is enabled. */
export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const debug = {
  /** Fragment buffer and scratch pool */
  output: createChannel("output"),

  /** Tag-to-directive matching */
  match: createChannel("match"),
};

export type Debug = typeof debug;
