import { z } from "zod";
import type { StoragePort } from "../../ports/sys/StoragePort";
import { CorruptStateError } from "../errors";
import type { TimerRecord } from "./TimerRecord";

export const STATE_VERSION = 1;

const TimestampSchema = z.string().datetime({ offset: true });

const StateDocumentSchema = z.object({
  version: z.literal(STATE_VERSION),
  timers: z.array(
    z.object({
      start: TimestampSchema,
      end: TimestampSchema.nullable(),
    })
  ),
});

type StateDocument = z.infer<typeof StateDocumentSchema>;

export interface TimerRecordStore {
  load(): Promise<TimerRecord[]>;
  save(records: readonly TimerRecord[]): Promise<void>;
  clear(): Promise<void>;
}

/**
 * Ordered timer history persisted as one JSON document under a storage key.
 * Insertion order is chronological; only the last record may still be running.
 */
export class TimerStore implements TimerRecordStore {
  constructor(
    private readonly storage: StoragePort,
    private readonly key: string
  ) {}

  async load(): Promise<TimerRecord[]> {
    let raw: string | null;
    try {
      raw = await this.storage.read(this.key);
    } catch (err) {
      throw new CorruptStateError(this.key, `unable to read (${describe(err)})`, { cause: err });
    }
    if (raw === null || raw.trim() === "") return [];

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new CorruptStateError(this.key, "not valid JSON", { cause: err });
    }

    const parsed = StateDocumentSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue.path.length ? ` at ${issue.path.join(".")}` : "";
      throw new CorruptStateError(this.key, `${issue.message}${where}`);
    }

    const records = parsed.data.timers.map((timer) => ({
      start: Date.parse(timer.start),
      end: timer.end === null ? null : Date.parse(timer.end),
    }));

    const problem = findInconsistency(records);
    if (problem) throw new CorruptStateError(this.key, problem);
    return records;
  }

  async save(records: readonly TimerRecord[]): Promise<void> {
    const problem = findInconsistency(records);
    if (problem) {
      throw new Error(`Refusing to save inconsistent timer state: ${problem}.`);
    }
    const doc: StateDocument = {
      version: STATE_VERSION,
      timers: records.map((record) => ({
        start: new Date(record.start).toISOString(),
        end: record.end === null ? null : new Date(record.end).toISOString(),
      })),
    };
    await this.storage.write(this.key, `${JSON.stringify(doc, null, 2)}\n`);
  }

  async clear(): Promise<void> {
    await this.storage.remove(this.key);
  }
}

/**
 * A running record anywhere but last, or more than one of them, means two
 * invocations raced on the file; there is no way to tell which one is right.
 */
export function findInconsistency(records: readonly TimerRecord[]): string | null {
  for (let i = 0; i < records.length; i++) {
    const { start, end } = records[i];
    if (!Number.isFinite(start)) return `timer ${i + 1} has an invalid start`;
    if (end === null) {
      if (i !== records.length - 1) {
        return `timer ${i + 1} is still running but is not the latest timer`;
      }
      continue;
    }
    if (!Number.isFinite(end)) return `timer ${i + 1} has an invalid end`;
    if (end < start) return `timer ${i + 1} ends before it starts`;
  }
  return null;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
