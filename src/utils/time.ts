/** True once `maxAgeMs` or more has passed since `lastUpdatedMs`. */
export function isStale(lastUpdatedMs: number, maxAgeMs: number, now: number = Date.now()): boolean {
  return now - lastUpdatedMs >= maxAgeMs;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local wall-clock time at second precision: `YYYY-MM-DD HH:mm:ss`. */
export function formatLocalTimestamp(epochMs: number): string {
  const d = new Date(epochMs);
  const date = `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
  const time = `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
  return `${date} ${time}`;
}
