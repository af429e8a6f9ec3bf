/**
 * @tagwright/output - deferred output buffering for template rendering
 *
 * Primary exports:
 * - ContentFragmentBuffer - collects fragments for one render pass
 * - Fragment - the closed union of buffered output pieces
 * - CharArrayPool - scratch arrays for span copies
 */

export {
  ContentFragmentBuffer,
  type ContentFragmentBufferOptions,
} from "./content-fragment-buffer.js";

export {
  INTERNED_CHARS,
  INTERNED_CHAR_COUNT,
  internedChar,
  ownedText,
  borrowedSpan,
  copiedSpan,
  fragmentToString,
  fragmentLength,
  charsToString,
  toCharBuffer,
  type CharBuffer,
  type Fragment,
  type FragmentKind,
  type InternedCharFragment,
  type OwnedTextFragment,
  type BorrowedSpanFragment,
  type CopiedSpanFragment,
} from "./fragment.js";

export {
  BucketedCharArrayPool,
  sharedCharArrayPool,
  type CharArrayPool,
} from "./char-array-pool.js";

export { StringSink, type FragmentSink } from "./sink.js";
