import type { Clock, EpochSeconds } from "@clubhouse/types";

/** Wall-clock time. */
export const systemClock: Clock = {
  now: () => Date.now() / 1000,
};

/**
 * A clock that only moves when told to.
 */
export class ManualClock implements Clock {
  constructor(private current: EpochSeconds = 0) {}

  now(): EpochSeconds {
    return this.current;
  }

  set(time: EpochSeconds): void {
    this.current = time;
  }

  advance(seconds: number): EpochSeconds {
    this.current += seconds;
    return this.current;
  }
}

/** Epoch seconds → ISO 8601. */
export function toTimestamp(seconds: EpochSeconds): string {
  return new Date(seconds * 1000).toISOString();
}

/**
 * Stored time → epoch seconds.
 * Numbers are taken as epoch seconds, strings as ISO 8601; anything
 * else, or a string that does not parse, reads as 0.
 */
export function toEpochSeconds(value: unknown): EpochSeconds {
  if (typeof value === "number") return Number.isFinite(value) ? value : 0;
  if (typeof value !== "string") return 0;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? 0 : ms / 1000;
}
