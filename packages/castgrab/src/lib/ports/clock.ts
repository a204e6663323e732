/**
 * Abstraction for time-related operations.
 * Transfer rate and ETA are computed against this so tests can step time.
 */
export interface Clock {
  /** Current timestamp in milliseconds */
  now(): number;
  newDate(): Date;
}
