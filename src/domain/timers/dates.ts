function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

/** Local calendar date, `YYYY-MM-DD`. */
export function formatLocalDate(epochMs: number): string {
  const d = new Date(epochMs);
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/** Local wall-clock time, `YYYY-MM-DD HH:MM:SS`. */
export function formatLocalDateTime(epochMs: number): string {
  const d = new Date(epochMs);
  return `${formatLocalDate(epochMs)} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}
