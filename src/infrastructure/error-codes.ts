/**
 * Error Code Definitions: centralized error codes.
 * Every error code must be explicitly defined here.
 */

// ============================================================================
// Review Domain Error Codes
// ============================================================================

export const REVIEW_ERROR_CODES = {
  // Aggregation pass
  REVIEW_PASS_ERROR: "REVIEW_PASS_ERROR",
  LOG_PARSE_ERROR: "LOG_PARSE_ERROR",
  GROUP_NOT_FOUND: "GROUP_NOT_FOUND",

  // Repository access
  GIT_UNAVAILABLE: "GIT_UNAVAILABLE",
  GIT_SYNC_ERROR: "GIT_SYNC_ERROR",
} as const;

// ============================================================================
// Router Error Codes
// ============================================================================

export const ROUTER_ERROR_CODES = {
  HANDLER_NOT_FOUND: "HANDLER_NOT_FOUND",
  HANDLER_CONFLICT: "HANDLER_CONFLICT",
  HANDLER_ERROR: "HANDLER_ERROR",
  MIDDLEWARE_ERROR: "MIDDLEWARE_ERROR",
  VALIDATION_ERROR: "VALIDATION_ERROR",
} as const;

// ============================================================================
// Infrastructure Error Codes
// ============================================================================

export const INFRASTRUCTURE_ERROR_CODES = {
  CONFIG_EXISTS: "CONFIG_EXISTS",
  CONFIG_NOT_FOUND: "CONFIG_NOT_FOUND",
  CONFIG_READ_ERROR: "CONFIG_READ_ERROR",
  CONFIG_WRITE_ERROR: "CONFIG_WRITE_ERROR",
  CONFIG_INVALID: "CONFIG_INVALID",
} as const;

// ============================================================================
// Generic Error Codes
// ============================================================================

export const GENERIC_ERROR_CODES = {
  INVALID_PARAMS: "INVALID_PARAMS",
  UNKNOWN_ERROR: "UNKNOWN_ERROR",
} as const;

/**
 * Combined error codes for convenience
 */
export const ERROR_CODES = {
  ...REVIEW_ERROR_CODES,
  ...ROUTER_ERROR_CODES,
  ...INFRASTRUCTURE_ERROR_CODES,
  ...GENERIC_ERROR_CODES,
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];
