/**
 * Time utilities that keep the worker's local clock.
 *
 * Timestamps written by this package carry the local timezone offset
 * (e.g. "2025-06-15T08:00:00+02:00") rather than UTC. The business meaning
 * of "started at 8:00" is the local 8:00 on site. Durations are computed
 * from epoch milliseconds, so mixed offsets still subtract correctly.
 */

const pad = (n: number) => String(n).padStart(2, "0");

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Convert a Date to an ISO string with local timezone offset.
 */
export function toLocalISO(d: Date): string {
  const offsetMin = d.getTimezoneOffset(); // e.g. -120 for CET+2
  const sign = offsetMin <= 0 ? "+" : "-";
  const absMin = Math.abs(offsetMin);
  const offH = pad(Math.floor(absMin / 60));
  const offM = pad(absMin % 60);

  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}` +
    `T${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}` +
    `${sign}${offH}:${offM}`
  );
}

/**
 * Extract local YYYY-MM-DD date from any date-like value.
 * Uses the LOCAL date, not UTC, so 23:30 CET stays on the same day.
 */
export function toLocalDate(input: Date | string): string {
  const d = typeof input === "string" ? new Date(input) : input;
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}
