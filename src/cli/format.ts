import { formatLocalDateTime } from "../domain/timers/dates";
import type { DurationBreakdown } from "../domain/timers/duration";
import type { RecordStatus, StatusReport } from "../domain/timers/TimerEngine";

/** `H:MM:SS`, hours unpadded and unbounded. */
export function formatDuration(duration: DurationBreakdown): string {
  const mm = duration.minutes.toString().padStart(2, "0");
  const ss = duration.seconds.toString().padStart(2, "0");
  return `${duration.hours}:${mm}:${ss}`;
}

export function formatEntry(label: string, entry: RecordStatus): string {
  const start = formatLocalDateTime(entry.record.start);
  const end = entry.record.end === null ? "Currently Running" : formatLocalDateTime(entry.record.end);
  return `${label}: Start: ${start}, End: ${end}, Duration: ${formatDuration(entry.duration)}`;
}

export function formatStatus(report: StatusReport, all: boolean): string[] {
  if (!report.entries.length) return ["No timer started."];
  if (!all) return [formatEntry("Last timer", report.entries[0])];

  return [
    ...report.entries.map((entry) => formatEntry(`Timer ${entry.position}`, entry)),
    "",
    `Total time worked: ${formatDuration(report.total)}.`,
  ];
}
