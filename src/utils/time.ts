export const MS_PER_SECOND = 1000;
export const SECONDS_PER_HOUR = 3600;

export function formatUtcOffset(offsetMinutes: number): string {
  const sign = offsetMinutes >= 0 ? "+" : "-";
  const absMinutes = Math.abs(offsetMinutes);
  const hours = String(Math.floor(absMinutes / 60)).padStart(2, "0");
  const mins = String(absMinutes % 60).padStart(2, "0");
  return `${sign}${hours}:${mins}`;
}

/**
 * ISO-8601 timestamp of `date` rendered at a fixed UTC offset, e.g.
 * `2024-03-05T10:15:00.000-07:00` for an offset of -420 minutes.
 */
export function toFixedOffsetIso(date: Date, offsetMinutes: number): string {
  const shifted = new Date(date.getTime() + offsetMinutes * 60_000);
  // toISOString always ends in "Z"; swap it for the offset we shifted by.
  return `${shifted.toISOString().slice(0, -1)}${formatUtcOffset(offsetMinutes)}`;
}
