/**
 * Error codes raised by Clubhouse components.
 * Uses a string-literal union so callers can switch exhaustively.
 */
export type ClubhouseErrorCode =
  | "ALREADY_EXISTS"     // Session id already taken for this (app, user)
  | "SESSION_NOT_FOUND"  // Session vanished between read and append
  | "NOT_FOUND"          // Partial update on a document that does not exist
  | "INVALID_ARGUMENT"   // Bad id, path, field name, limit or batch size
  | "DATA_CORRUPTION"    // Stored document failed schema validation
  | "CONFIG_ERROR"       // Configuration file unreadable or invalid
  | "INTERNAL_ERROR";    // Unexpected system failure

export interface ClubhouseErrorInfo {
  readonly code: ClubhouseErrorCode;
  readonly message: string;
  /** The original error, if wrapping a lower-level failure. */
  readonly cause?: unknown;
}
