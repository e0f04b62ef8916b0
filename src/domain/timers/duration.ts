import type { TimerRecord } from "./TimerRecord";

export interface DurationBreakdown {
  totalSeconds: number;
  hours: number;
  minutes: number;
  seconds: number;
}

/**
 * Elapsed time of a record, `(end ?? now) - start`, truncated to whole seconds.
 * Used by both status reporting and push so the two never disagree.
 */
export function measure(record: TimerRecord, now: number): DurationBreakdown {
  const end = record.end ?? now;
  const elapsedMs = Math.max(0, end - record.start);
  return breakdown(Math.floor(elapsedMs / 1000));
}

export function breakdown(totalSeconds: number): DurationBreakdown {
  const whole = Math.max(0, Math.floor(totalSeconds));
  return {
    totalSeconds: whole,
    hours: Math.floor(whole / 3600),
    minutes: Math.floor((whole % 3600) / 60),
    seconds: whole % 60,
  };
}

export function sumDurations(durations: readonly DurationBreakdown[]): DurationBreakdown {
  return breakdown(durations.reduce((acc, d) => acc + d.totalSeconds, 0));
}

export function toHours(duration: DurationBreakdown): number {
  return duration.totalSeconds / 3600;
}
