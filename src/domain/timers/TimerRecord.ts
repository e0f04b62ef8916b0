/**
 * One start/stop interval. `end === null` marks the timer that is still running.
 * Timestamps are epoch milliseconds.
 */
export interface TimerRecord {
  start: number;
  end: number | null;
}

export type TimerState = "running" | "stopped";

export function isRunning(record: TimerRecord): boolean {
  return record.end === null;
}

export function lastRecord(records: readonly TimerRecord[]): TimerRecord | undefined {
  return records.length ? records[records.length - 1] : undefined;
}

export function stateOf(records: readonly TimerRecord[]): TimerState {
  const last = lastRecord(records);
  return last && isRunning(last) ? "running" : "stopped";
}
