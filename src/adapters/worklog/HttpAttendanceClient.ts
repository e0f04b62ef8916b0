import { ConfigurationError, RemoteSubmissionError } from "../../domain/errors";
import type { AttendanceEntry, AttendancePort, AttendanceResult } from "../../ports/worklog/AttendancePort";
import { describeError, joinUrl } from "./url";

export interface HttpAttendanceOptions {
  apiUrl?: string;
  apiToken?: string;
  attendancesPath: string;
}

export class HttpAttendanceClient implements AttendancePort {
  constructor(private readonly options: HttpAttendanceOptions) {}

  async submit(entry: AttendanceEntry): Promise<AttendanceResult> {
    const { apiUrl, apiToken, attendancesPath } = this.options;
    if (!apiUrl || !apiToken) {
      throw new ConfigurationError(
        "Please define WORKLOG_API_URL and WORKLOG_API_TOKEN env variables and try again!"
      );
    }

    const payload = {
      attendances: [
        {
          date: entry.date,
          comment: entry.description,
          duration_hours: entry.durationHours,
        },
      ],
    };

    let res: Response;
    let body: string;
    try {
      res = await fetch(joinUrl(apiUrl, attendancesPath), {
        method: "POST",
        headers: {
          Authorization: `Bearer ${apiToken}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(payload),
      });
      body = await res.text();
    } catch (err) {
      throw new RemoteSubmissionError(`Failed to reach the attendance API: ${describeError(err)}`, undefined, {
        cause: err,
      });
    }

    if (!res.ok) {
      throw new RemoteSubmissionError(
        `Failed to log work (${res.status} ${res.statusText}). Response from the attendance API: ${body}`,
        res.status
      );
    }
    return { status: res.status, body };
  }
}
