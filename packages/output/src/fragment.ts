import { assertNever, invalidArgument, outOfRange } from "@tagwright/kernel";

/** UTF-16 code units. */
export type CharBuffer = Uint16Array;

/* ---------- Fragment union ---------- */

/** One of the 256 shared single-character fragments. */
export interface InternedCharFragment {
  readonly kind: "interned-char";
  readonly code: number;
  readonly text: string;
}

export interface OwnedTextFragment {
  readonly kind: "owned-text";
  readonly text: string;
}

/**
 * A range of a caller buffer, held by reference. The caller must not mutate
 * the buffer once it has been written.
 */
export interface BorrowedSpanFragment {
  readonly kind: "borrowed-span";
  readonly buffer: CharBuffer;
  readonly offset: number;
  readonly length: number;
}

/** A private copy of data whose original storage could not be trusted. */
export interface CopiedSpanFragment {
  readonly kind: "copied-span";
  readonly buffer: CharBuffer;
}

export type Fragment =
  | InternedCharFragment
  | OwnedTextFragment
  | BorrowedSpanFragment
  | CopiedSpanFragment;

export type FragmentKind = Fragment["kind"];

/* ---------- Interned characters ---------- */

export const INTERNED_CHAR_COUNT = 256;

function buildInternedChars(): readonly InternedCharFragment[] {
  const table: InternedCharFragment[] = [];
  for (let code = 0; code < INTERNED_CHAR_COUNT; code++) {
    table.push(Object.freeze({ kind: "interned-char", code, text: String.fromCharCode(code) }));
  }
  return Object.freeze(table);
}

/** Indexed by character code; built once at module load and never mutated. */
export const INTERNED_CHARS: readonly InternedCharFragment[] = buildInternedChars();

/** The shared fragment for `code`, or undefined when `code` is outside [0,256). */
export function internedChar(code: number): InternedCharFragment | undefined {
  if (!Number.isInteger(code)) return undefined;
  return INTERNED_CHARS[code];
}

/* ---------- Factories ---------- */

export function ownedText(text: string): OwnedTextFragment {
  if (typeof text !== "string") throw invalidArgument("text", "expected a string");
  return Object.freeze({ kind: "owned-text", text });
}

export function borrowedSpan(
  buffer: CharBuffer | null | undefined,
  offset = 0,
  length?: number,
): BorrowedSpanFragment {
  if (buffer == null) throw invalidArgument("buffer", "a character buffer is required");
  const count = length ?? buffer.length - offset;
  checkRange(buffer, offset, count);
  return Object.freeze({ kind: "borrowed-span", buffer, offset, length: count });
}

export function copiedSpan(buffer: CharBuffer | null | undefined): CopiedSpanFragment {
  if (buffer == null) throw invalidArgument("buffer", "a character buffer is required");
  return Object.freeze({ kind: "copied-span", buffer });
}

function checkRange(buffer: CharBuffer, offset: number, length: number): void {
  if (!Number.isInteger(offset) || offset < 0 || offset > buffer.length) {
    throw outOfRange("offset", offset, buffer.length);
  }
  if (!Number.isInteger(length) || length < 0 || offset + length > buffer.length) {
    throw outOfRange("length", length, buffer.length - offset);
  }
}

/* ---------- Dispatch ---------- */

// String.fromCharCode spreads its arguments onto the stack; decode in chunks.
const DECODE_CHUNK = 8192;

export function charsToString(buffer: CharBuffer, offset = 0, length = buffer.length - offset): string {
  if (length <= DECODE_CHUNK) {
    return String.fromCharCode(...buffer.subarray(offset, offset + length));
  }
  const parts: string[] = [];
  const end = offset + length;
  for (let i = offset; i < end; i += DECODE_CHUNK) {
    parts.push(String.fromCharCode(...buffer.subarray(i, Math.min(i + DECODE_CHUNK, end))));
  }
  return parts.join("");
}

export function fragmentToString(fragment: Fragment): string {
  switch (fragment.kind) {
    case "interned-char":
    case "owned-text":
      return fragment.text;
    case "borrowed-span":
      return charsToString(fragment.buffer, fragment.offset, fragment.length);
    case "copied-span":
      return charsToString(fragment.buffer);
    default:
      return assertNever(fragment, "fragment kind");
  }
}

/** Length in UTF-16 code units. */
export function fragmentLength(fragment: Fragment): number {
  switch (fragment.kind) {
    case "interned-char":
      return 1;
    case "owned-text":
      return fragment.text.length;
    case "borrowed-span":
      return fragment.length;
    case "copied-span":
      return fragment.buffer.length;
    default:
      return assertNever(fragment, "fragment kind");
  }
}

/** Encode a string as UTF-16 code units. */
export function toCharBuffer(text: string): CharBuffer {
  const buffer = new Uint16Array(text.length);
  for (let i = 0; i < text.length; i++) buffer[i] = text.charCodeAt(i);
  return buffer;
}
