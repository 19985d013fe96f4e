/**
 * Source of the current time, used for the dated log line.
 */
export interface Clock {
  now(): Date;
}
