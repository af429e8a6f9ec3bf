/* =============================================================================
 * ERRORS
 * ============================================================================= */

/** Error codes */
export const TagwrightErrorCode = {
  INVALID_ARGUMENT: "TAGWRIGHT_INVALID_ARGUMENT",
  OUT_OF_RANGE: "TAGWRIGHT_OUT_OF_RANGE",
} as const;

export type TagwrightErrorCodeType = (typeof TagwrightErrorCode)[keyof typeof TagwrightErrorCode];

/**
 * Raised for caller mistakes detected by this library. Failures coming out of
 * a sink or a pool are never wrapped.
 */
export class TagwrightError extends Error {
  constructor(
    message: string,
    public readonly code: TagwrightErrorCodeType,
    public readonly detail?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "TagwrightError";
  }
}

export function isTagwrightError(value: unknown, code?: TagwrightErrorCodeType): value is TagwrightError {
  if (!(value instanceof TagwrightError)) return false;
  return code === undefined || value.code === code;
}

export function invalidArgument(name: string, reason: string): TagwrightError {
  return new TagwrightError(`Invalid argument '${name}': ${reason}`, TagwrightErrorCode.INVALID_ARGUMENT, {
    argument: name,
  });
}

export function outOfRange(name: string, value: number, limit: number): TagwrightError {
  return new TagwrightError(
    `Argument '${name}' is out of range: ${value} (limit ${limit})`,
    TagwrightErrorCode.OUT_OF_RANGE,
    { argument: name, value, limit },
  );
}

/** Exhaustiveness check for closed unions. */
export function assertNever(value: never, what: string): never {
  throw new Error(`Unhandled ${what}: ${JSON.stringify(value)}`);
}
