// Cross-cutting infrastructure shared by the output and directives packages.
// IMPORTANT: This package has no dependencies on other tagwright packages.

export {
  debug,
  getDebugChannel,
  refreshDebugChannels,
  configureDebug,
  isDebugEnabled,
  type Debug,
  type DebugChannel,
  type DebugConfig,
  type DebugData,
} from "./debug.js";

export {
  TagwrightError,
  TagwrightErrorCode,
  isTagwrightError,
  invalidArgument,
  outOfRange,
  assertNever,
  type TagwrightErrorCodeType,
} from "./errors.js";

export {
  TAGWRIGHT_DEBUG_ENV,
  DEFAULT_NEW_LINE,
  DEFAULT_POOL_LIMITS,
  type CharArrayPoolLimits,
} from "./config.js";
