export interface AttendanceEntry {
  durationHours: number;
  description: string;
  /** Local calendar date the work belongs to, `YYYY-MM-DD`. */
  date: string;
}

export interface AttendanceResult {
  status: number;
  body: string;
}

export interface AttendancePort {
  submit(entry: AttendanceEntry): Promise<AttendanceResult>;
}
