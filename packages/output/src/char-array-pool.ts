import { DEFAULT_POOL_LIMITS, debug, invalidArgument, type CharArrayPoolLimits } from "@tagwright/kernel";
import type { CharBuffer } from "./fragment.js";

/**
 * Reusable scratch arrays. Every `rent` must be paired with exactly one
 * `return` of the same array; a rented array may be longer than requested.
 */
export interface CharArrayPool {
  rent(minimumLength: number): CharBuffer;
  return(buffer: CharBuffer): void;
}

const MIN_BUCKET_LENGTH = 16;

/**
 * Power-of-two size buckets. Arrays handed back are not cleared; callers only
 * ever read the prefix they wrote.
 */
export class BucketedCharArrayPool implements CharArrayPool {
  private readonly limits: CharArrayPoolLimits;
  private readonly buckets = new Map<number, CharBuffer[]>();

  constructor(limits: Partial<CharArrayPoolLimits> = {}) {
    this.limits = { ...DEFAULT_POOL_LIMITS, ...limits };
  }

  rent(minimumLength: number): CharBuffer {
    if (!Number.isInteger(minimumLength) || minimumLength < 0) {
      throw invalidArgument("minimumLength", "expected a non-negative integer");
    }
    const size = bucketLength(minimumLength);
    if (size > this.limits.maxArrayLength) {
      return new Uint16Array(minimumLength);
    }
    return this.buckets.get(size)?.pop() ?? new Uint16Array(size);
  }

  return(buffer: CharBuffer): void {
    const size = bucketLength(buffer.length);
    // Oversized rentals were never pooled.
    if (size > this.limits.maxArrayLength) return;
    if (size !== buffer.length) {
      throw invalidArgument("buffer", `length ${buffer.length} was not rented from this pool`);
    }
    let bucket = this.buckets.get(buffer.length);
    if (!bucket) {
      bucket = [];
      this.buckets.set(buffer.length, bucket);
    }
    if (bucket.length >= this.limits.maxArraysPerBucket) {
      debug.output("pool.bucket-full", { length: buffer.length });
      return;
    }
    bucket.push(buffer);
  }

  /** Arrays currently available for reuse in the bucket for `length`. */
  available(length: number): number {
    return this.buckets.get(bucketLength(length))?.length ?? 0;
  }
}

function bucketLength(minimumLength: number): number {
  let size = MIN_BUCKET_LENGTH;
  while (size < minimumLength) size *= 2;
  return size;
}

let shared: BucketedCharArrayPool | undefined;

/** Process-wide pool, created on first use. */
export function sharedCharArrayPool(): CharArrayPool {
  shared ??= new BucketedCharArrayPool();
  return shared;
}
