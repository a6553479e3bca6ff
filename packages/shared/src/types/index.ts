/**
 * Shared Type Definitions
 */

// =============================================================================
// Error Types
// =============================================================================

/**
 * Every failure a caller can observe. None of them is fatal: each maps to a
 * message and the service stays usable.
 */
export const ErrorCode = {
  INVALID_URL: "INVALID_URL",
  INVALID_LIMIT: "INVALID_LIMIT",
  UNKNOWN_OPTION: "UNKNOWN_OPTION",
  NOT_FOUND: "NOT_FOUND",
  EXPIRED: "EXPIRED",
  LIMIT_EXHAUSTED: "LIMIT_EXHAUSTED",
  FORBIDDEN: "FORBIDDEN",
  INVALID_IDENTITY: "INVALID_IDENTITY",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Successful operation result
 */
export interface Success<T> {
  success: true;
  data: T;
}

/**
 * Failed operation result, narrowed to the codes the operation can produce
 */
export interface Failure<C extends ErrorCode = ErrorCode> {
  success: false;
  errorCode: C;
  error: string;
}

export type Result<T, C extends ErrorCode = ErrorCode> = Success<T> | Failure<C>;

// =============================================================================
// Link Types
// =============================================================================

/** Owner identity: a lowercase UUID */
export type OwnerId = string;

/**
 * Click budget of a link.
 * `remaining` stays within 0..max and only ever decreases.
 */
export type ClickBudget =
  | { kind: "unlimited" }
  | { kind: "limited"; max: number; remaining: number };

/**
 * Link record held by the registry
 */
export interface LinkRecord {
  /** Unique 8-character slug */
  slug: string;

  /** Absolute destination URL, as given at creation */
  targetUrl: string;

  /** Owner who created the link */
  ownerId: OwnerId;

  /** Click limit and what is left of it */
  clicks: ClickBudget;

  /** Creation timestamp */
  createdAt: Date;

  /** createdAt + TTL */
  expiresAt: Date;
}

// =============================================================================
// Notification Types
// =============================================================================

/**
 * System message queued in an owner's mailbox
 */
export interface Notification {
  timestamp: Date;
  message: string;
}

// =============================================================================
// API Response Types
// =============================================================================

/**
 * Standard API success response
 */
export interface ApiResponse<T> {
  success: true;
  data: T;
}

/**
 * Standard API error response
 */
export interface ApiError {
  success: false;
  error: string;
  /** Absent for transport-level failures (rate limit, internal error) */
  errorCode?: ErrorCode;
  details?: Record<string, unknown>;
}
