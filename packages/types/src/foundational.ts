/** ISO 8601 timestamp, the form every time is stored in. */
export type Timestamp = string;

/** Seconds since the Unix epoch, with a fractional part. */
export type EpochSeconds = number;

/**
 * Any value a stored document field can hold.
 * Documents are schemaless; convert them into typed entities through
 * a validating schema before use.
 */
export type DocumentValue =
  | null
  | boolean
  | number
  | string
  | DocumentValue[]
  | DocumentData;

/** A string-keyed map of document values (a whole document, or a nested map). */
export interface DocumentData {
  [field: string]: DocumentValue;
}

/** Source of the current time. Injected so tests can control it. */
export interface Clock {
  /** Current time in epoch seconds. */
  now(): EpochSeconds;
}
