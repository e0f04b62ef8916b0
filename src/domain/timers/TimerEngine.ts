import type { LoggerPort } from "../../ports/sys/LoggerPort";
import type { TimePort } from "../../ports/sys/TimePort";
import { measure, sumDurations, type DurationBreakdown } from "./duration";
import { isRunning, lastRecord, stateOf, type TimerRecord, type TimerState } from "./TimerRecord";
import type { TimerRecordStore } from "./TimerStore";

export type StartResult =
  | { outcome: "started"; record: TimerRecord }
  | { outcome: "already-running"; record: TimerRecord };

export type StopResult =
  | { outcome: "stopped"; record: TimerRecord; duration: DurationBreakdown }
  | { outcome: "already-stopped" };

export interface RecordStatus {
  /** 1-based position in the history. */
  position: number;
  record: TimerRecord;
  running: boolean;
  duration: DurationBreakdown;
}

export interface StatusReport {
  state: TimerState;
  entries: RecordStatus[];
  total: DurationBreakdown;
}

export class TimerEngine {
  constructor(
    private readonly store: TimerRecordStore,
    private readonly time: TimePort,
    private readonly logger?: LoggerPort
  ) {}

  async start(): Promise<StartResult> {
    const records = await this.store.load();
    const last = lastRecord(records);
    if (last && isRunning(last)) {
      this.logger?.debug("start ignored, timer already running", { start: last.start });
      return { outcome: "already-running", record: last };
    }

    const record: TimerRecord = { start: this.time.now(), end: null };
    await this.store.save([...records, record]);
    this.logger?.debug("timer started", { start: record.start, count: records.length + 1 });
    return { outcome: "started", record };
  }

  async stop(): Promise<StopResult> {
    const records = await this.store.load();
    const last = lastRecord(records);
    if (!last || !isRunning(last)) {
      this.logger?.debug("stop ignored, no running timer");
      return { outcome: "already-stopped" };
    }

    const now = this.time.now();
    const record: TimerRecord = { start: last.start, end: Math.max(now, last.start) };
    await this.store.save([...records.slice(0, -1), record]);
    const duration = measure(record, now);
    this.logger?.debug("timer stopped", { start: record.start, end: record.end });
    return { outcome: "stopped", record, duration };
  }

  async reset(): Promise<void> {
    await this.store.clear();
    this.logger?.debug("timer state cleared");
  }

  async status(all = false): Promise<StatusReport> {
    const records = await this.store.load();
    const now = this.time.now();

    const entries = records.map((record, index) => ({
      position: index + 1,
      record,
      running: isRunning(record),
      duration: measure(record, now),
    }));
    const selected = all ? entries : entries.slice(-1);

    return {
      state: stateOf(records),
      entries: selected,
      total: sumDurations(selected.map((entry) => entry.duration)),
    };
  }
}
