import { describe, test, expect } from "vitest";
import { TagwrightErrorCode, isTagwrightError } from "@tagwright/kernel";
import {
  INTERNED_CHARS,
  borrowedSpan,
  charsToString,
  copiedSpan,
  fragmentLength,
  fragmentToString,
  internedChar,
  ownedText,
  toCharBuffer,
} from "@tagwright/output";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return isTagwrightError(err) ? err.code : "foreign";
  }
  return undefined;
}

describe("interned characters", () => {
  test("the table covers codes 0..255 and is frozen", () => {
    expect(INTERNED_CHARS).toHaveLength(256);
    expect(Object.isFrozen(INTERNED_CHARS)).toBe(true);
    expect(Object.isFrozen(INTERNED_CHARS[65])).toBe(true);
  });

  test("each entry holds its own character", () => {
    for (let code = 0; code < 256; code++) {
      const fragment = internedChar(code);
      expect(fragment?.code).toBe(code);
      expect(fragment?.text).toBe(String.fromCharCode(code));
    }
  });

  test("lookups outside the table return undefined", () => {
    expect(internedChar(256)).toBeUndefined();
    expect(internedChar(-1)).toBeUndefined();
    expect(internedChar(1.5)).toBeUndefined();
  });
});

describe("fragment factories", () => {
  test("borrowedSpan defaults to the rest of the buffer", () => {
    const buffer = toCharBuffer("hello");
    const fragment = borrowedSpan(buffer, 1);
    expect(fragment).toEqual({ kind: "borrowed-span", buffer, offset: 1, length: 4 });
    expect(fragment.buffer).toBe(buffer);
  });

  test("absent buffers are rejected when the fragment is created", () => {
    expect(codeOf(() => borrowedSpan(null, 0, 0))).toBe(TagwrightErrorCode.INVALID_ARGUMENT);
    expect(codeOf(() => borrowedSpan(undefined))).toBe(TagwrightErrorCode.INVALID_ARGUMENT);
    expect(codeOf(() => copiedSpan(null))).toBe(TagwrightErrorCode.INVALID_ARGUMENT);
  });

  test("ranges outside the buffer are rejected", () => {
    const buffer = toCharBuffer("abc");
    expect(codeOf(() => borrowedSpan(buffer, 4, 0))).toBe(TagwrightErrorCode.OUT_OF_RANGE);
    expect(codeOf(() => borrowedSpan(buffer, -1, 1))).toBe(TagwrightErrorCode.OUT_OF_RANGE);
    expect(codeOf(() => borrowedSpan(buffer, 1, 3))).toBe(TagwrightErrorCode.OUT_OF_RANGE);
    expect(codeOf(() => borrowedSpan(buffer, 3, 0))).toBeUndefined();
  });

  test("fragments are frozen", () => {
    expect(Object.isFrozen(ownedText("x"))).toBe(true);
    expect(Object.isFrozen(copiedSpan(toCharBuffer("x")))).toBe(true);
  });
});

describe("fragmentToString / fragmentLength", () => {
  test("every kind materializes its text", () => {
    const buffer = toCharBuffer("template");
    const cases = [
      { fragment: INTERNED_CHARS[60], text: "<" },
      { fragment: ownedText("héllo"), text: "héllo" },
      { fragment: borrowedSpan(buffer, 2, 3), text: "mpl" },
      { fragment: copiedSpan(toCharBuffer("€ok")), text: "€ok" },
    ];
    for (const { fragment, text } of cases) {
      if (!fragment) throw new Error("missing fragment");
      expect(fragmentToString(fragment)).toBe(text);
      expect(fragmentLength(fragment)).toBe(text.length);
    }
  });

  test("empty content yields empty text", () => {
    expect(fragmentToString(ownedText(""))).toBe("");
    expect(fragmentToString(borrowedSpan(new Uint16Array(0)))).toBe("");
  });

  test("long buffers decode in full", () => {
    const text = "abcdefghij".repeat(2000);
    expect(charsToString(toCharBuffer(text))).toBe(text);
  });
});
