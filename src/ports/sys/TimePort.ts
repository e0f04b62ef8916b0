export interface TimePort {
  /** Current time in epoch milliseconds. */
  now(): number;
}
