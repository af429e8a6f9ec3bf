/**
 * Content Fragment Buffer
 *
 * Collects the output of one render pass as fragments and hands them to the
 * final sink untouched. Strings and whole arrays pass through by reference;
 * only spans, whose storage the caller may reuse, are copied.
 *
 * Not safe for concurrent writers: a buffer belongs to the render that
 * created it.
 */

import { DEFAULT_NEW_LINE, debug, invalidArgument } from "@tagwright/kernel";
import { sharedCharArrayPool, type CharArrayPool } from "./char-array-pool.js";
import {
  INTERNED_CHAR_COUNT,
  borrowedSpan,
  copiedSpan,
  fragmentToString,
  internedChar,
  ownedText,
  type CharBuffer,
  type Fragment,
} from "./fragment.js";
import type { FragmentSink } from "./sink.js";

export interface ContentFragmentBufferOptions {
  /** Scratch pool used by `writeSpan`. Defaults to the shared pool. */
  pool?: CharArrayPool;
  /** Terminator appended by `writeLine`. */
  newLine?: string;
}

// Async writes complete before they return; every call hands back this one.
const COMPLETED: Promise<void> = Promise.resolve();

export class ContentFragmentBuffer {
  private readonly _fragments: Fragment[] = [];
  private readonly pool: CharArrayPool;
  private readonly newLine: string;
  private pooledArrays: CharBuffer[] | null = null;

  constructor(options: ContentFragmentBufferOptions = {}) {
    this.pool = options.pool ?? sharedCharArrayPool();
    this.newLine = options.newLine ?? DEFAULT_NEW_LINE;
  }

  /** Snapshot of the fragments written so far, in write order. */
  get fragments(): readonly Fragment[] {
    return Object.freeze(this._fragments.slice());
  }

  /** Number of fragments written. */
  get length(): number {
    return this._fragments.length;
  }

  /* ---------- Synchronous writes ---------- */

  /** Append one UTF-16 code unit. Codes below 256 reuse a shared fragment. */
  writeChar(code: number): void {
    if (!Number.isInteger(code) || code < 0 || code > 0xffff) {
      throw invalidArgument("code", `not a UTF-16 code unit: ${code}`);
    }
    const interned = code < INTERNED_CHAR_COUNT ? internedChar(code) : undefined;
    this._fragments.push(interned ?? ownedText(String.fromCharCode(code)));
  }

  writeText(text: string): void {
    this._fragments.push(ownedText(text));
  }

  /**
   * Append a range of `buffer` without copying it. The caller gives up the
   * right to mutate `buffer`.
   */
  writeChars(buffer: CharBuffer | null | undefined, offset?: number, length?: number): void {
    this._fragments.push(borrowedSpan(buffer, offset, length));
  }

  /**
   * Append a copy of `span`. The span's storage may be reused by the caller as
   * soon as this returns.
   */
  writeSpan(span: CharBuffer | null | undefined): void {
    if (span == null) throw invalidArgument("span", "a character span is required");

    const scratch = this.pool.rent(span.length);
    let retained = false;
    try {
      scratch.set(span);
      const fragment = copiedSpan(scratch.slice(0, span.length));
      (this.pooledArrays ??= []).push(scratch);
      retained = true;
      this._fragments.push(fragment);
    } catch (error) {
      debug.output("span.copy-failed", { length: span.length, scratch: scratch.length });
      throw error;
    } finally {
      if (!retained) this.pool.return(scratch);
    }
  }

  writeLine(text?: string): void {
    if (text !== undefined) this.writeText(text);
    this.writeText(this.newLine);
  }

  writeLineChar(code: number): void {
    this.writeChar(code);
    this.writeText(this.newLine);
  }

  writeLineChars(buffer: CharBuffer | null | undefined, offset?: number, length?: number): void {
    this.writeChars(buffer, offset, length);
    this.writeText(this.newLine);
  }

  /* ---------- Asynchronous writes ----------
   * These exist for callers that await every write. The write happens before
   * the promise is returned, so interleaving with synchronous calls keeps
   * write order.
   */

  writeCharAsync(code: number): Promise<void> {
    this.writeChar(code);
    return COMPLETED;
  }

  writeTextAsync(text: string): Promise<void> {
    this.writeText(text);
    return COMPLETED;
  }

  writeCharsAsync(buffer: CharBuffer | null | undefined, offset?: number, length?: number): Promise<void> {
    this.writeChars(buffer, offset, length);
    return COMPLETED;
  }

  writeLineAsync(text?: string): Promise<void> {
    this.writeLine(text);
    return COMPLETED;
  }

  writeLineCharAsync(code: number): Promise<void> {
    this.writeLineChar(code);
    return COMPLETED;
  }

  writeLineCharsAsync(buffer: CharBuffer | null | undefined, offset?: number, length?: number): Promise<void> {
    this.writeLineChars(buffer, offset, length);
    return COMPLETED;
  }

  /* ---------- Output ---------- */

  /** Write every fragment to `sink`, in order. The buffer keeps its content. */
  emit(sink: FragmentSink): void {
    for (const fragment of this._fragments) {
      sink.write(fragment);
    }
  }

  toString(): string {
    return this._fragments.map(fragmentToString).join("");
  }

  /**
   * Return every scratch array rented by `writeSpan` to the pool. Safe to call
   * more than once. Written fragments remain valid.
   *
   * Each array is offered to the pool even when an earlier `return` throws;
   * the first such error is rethrown once all have been offered.
   */
  dispose(): void {
    const arrays = this.pooledArrays;
    if (arrays === null) return;
    this.pooledArrays = null;
    debug.output("buffer.dispose", { released: arrays.length });

    let failure: { error: unknown } | undefined;
    for (const array of arrays) {
      try {
        this.pool.return(array);
      } catch (error) {
        debug.output("buffer.release-failed", { length: array.length });
        failure ??= { error };
      }
    }
    if (failure) throw failure.error;
  }
}
