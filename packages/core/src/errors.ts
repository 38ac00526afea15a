import type { ClubhouseErrorCode, ClubhouseErrorInfo } from "@clubhouse/types";

/**
 * Error thrown by every Clubhouse component.
 * Switch on `code` rather than on the message text.
 */
export class ClubhouseError extends Error implements ClubhouseErrorInfo {
  readonly code: ClubhouseErrorCode;

  constructor(code: ClubhouseErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ClubhouseError";
    this.code = code;
  }
}

/** Narrow an unknown error, optionally to a single code. */
export function isClubhouseError(
  err: unknown,
  code?: ClubhouseErrorCode
): err is ClubhouseError {
  return err instanceof ClubhouseError && (code === undefined || err.code === code);
}
