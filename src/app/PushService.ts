import { formatLocalDate } from "../domain/timers/dates";
import { measure, toHours } from "../domain/timers/duration";
import type { TimerRecordStore } from "../domain/timers/TimerStore";
import { lastRecord } from "../domain/timers/TimerRecord";
import { NoTimerDataError, UsageError } from "../domain/errors";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { TimePort } from "../ports/sys/TimePort";
import type { AttendanceEntry, AttendancePort, AttendanceResult } from "../ports/worklog/AttendancePort";

export class PushService {
  constructor(
    private readonly store: TimerRecordStore,
    private readonly attendance: AttendancePort,
    private readonly time: TimePort,
    private readonly logger: LoggerPort
  ) {}

  /**
   * Submits either `manualHours` (dated today) or the duration of the latest
   * timer (dated by its start), measuring a running timer up to now.
   * The local timer history is left exactly as it was, whatever the outcome.
   */
  async push(description: string, manualHours?: number): Promise<AttendanceResult> {
    const entry = await this.buildEntry(description, manualHours);
    this.logger.info("Sending attendance to the API", { ...entry });
    const result = await this.attendance.submit(entry);
    this.logger.debug("Attendance API responded", { status: result.status });
    return result;
  }

  private async buildEntry(description: string, manualHours?: number): Promise<AttendanceEntry> {
    if (manualHours !== undefined) {
      if (!Number.isFinite(manualHours) || manualHours < 0) {
        throw new UsageError(`Hours must be a non-negative number, got ${manualHours}.`);
      }
      return {
        durationHours: manualHours,
        description,
        date: formatLocalDate(this.time.now()),
      };
    }

    const last = lastRecord(await this.store.load());
    if (!last) throw new NoTimerDataError();

    return {
      durationHours: toHours(measure(last, this.time.now())),
      description,
      date: formatLocalDate(last.start),
    };
  }
}
