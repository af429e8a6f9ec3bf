/** Environment variable that selects debug channels (see debug.ts). */
export const TAGWRIGHT_DEBUG_ENV = "TAGWRIGHT_DEBUG";

/** Line terminator written by `writeLine` unless a buffer is configured otherwise. */
export const DEFAULT_NEW_LINE = "\n";

export interface CharArrayPoolLimits {
  /** Longest array kept for reuse; longer rentals are allocated exactly and dropped on return. */
  maxArrayLength: number;
  /** Arrays retained per size bucket. */
  maxArraysPerBucket: number;
}

export const DEFAULT_POOL_LIMITS: Readonly<CharArrayPoolLimits> = Object.freeze({
  maxArrayLength: 1024 * 1024,
  maxArraysPerBucket: 50,
});
