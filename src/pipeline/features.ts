/** A previously recorded telemetry row, as the feature store returns it. */
export type FeatureRow = Record<string, unknown>;

export interface FeatureVector {
  RoomID: string | null;
  AmbientTemperature: number | null;
  AmbientHumidity: number | null;
  CurrentTemperature: number | null;
  TargetTemperature: number | null;
  FanSpeed: number | null;
  Humidity: number | null;
  Occupancy: boolean | null;
  PowerConsumption: number | null;
  TotalOccupantCount: number | null;
  Hour: number | null;
  DayOfWeek: number | null;
  DayOfYear: number | null;
  TotalPowerConsumption: number | null;
}

export interface ParsedTimestamp {
  instant: Date;
  /** Offset the timestamp was written in; 0 for `Z` and offset-less values. */
  offsetMinutes: number;
}

export interface CalendarParts {
  hour: number;
  dayOfWeek: number; // Monday = 0
  dayOfYear: number;
}

const OFFSET_RE = /(Z|[+-]\d{2}:?\d{2})$/i;
const MS_PER_DAY = 86_400_000;

function parseOffsetMinutes(token: string): number {
  if (token.toUpperCase() === "Z") return 0;
  const sign = token.startsWith("-") ? -1 : 1;
  const digits = token.slice(1).replace(":", "");
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

export function parseTimestamp(value: unknown): ParsedTimestamp | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : { instant: value, offsetMinutes: 0 };
  }
  if (typeof value !== "string") return null;

  // Date only understands millisecond precision.
  const trimmed = value.trim().replace(/(\.\d{3})\d+/, "$1");
  if (!trimmed) return null;

  const match = OFFSET_RE.exec(trimmed);
  let offsetMinutes = 0;
  let normalized = `${trimmed}Z`;
  if (match) {
    offsetMinutes = parseOffsetMinutes(match[1]);
    const sign = offsetMinutes < 0 ? "-" : "+";
    const abs = Math.abs(offsetMinutes);
    const canonical = `${sign}${String(Math.floor(abs / 60)).padStart(2, "0")}:${String(abs % 60).padStart(2, "0")}`;
    normalized = trimmed.slice(0, match.index) + canonical;
  }

  const instant = new Date(normalized);
  if (Number.isNaN(instant.getTime())) return null;
  return { instant, offsetMinutes };
}

/** Wall-clock calendar fields in the timestamp's own offset. */
export function calendarParts(ts: ParsedTimestamp): CalendarParts {
  const local = new Date(ts.instant.getTime() + ts.offsetMinutes * 60_000);
  const yearStart = Date.UTC(local.getUTCFullYear(), 0, 1);
  const midnight = Date.UTC(local.getUTCFullYear(), local.getUTCMonth(), local.getUTCDate());
  return {
    hour: local.getUTCHours(),
    dayOfWeek: (local.getUTCDay() + 6) % 7,
    dayOfYear: Math.round((midnight - yearStart) / MS_PER_DAY) + 1
  };
}

export function toNumberOrNull(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function toIntegerOrNull(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? Math.trunc(value) : null;
  if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) return Number.parseInt(value, 10);
  return null;
}

export function toBooleanOrNull(value: unknown): boolean | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "string") return ["true", "1", "yes"].includes(value.trim().toLowerCase());
  return Boolean(value);
}

export function buildFeatureVector(row: FeatureRow): FeatureVector {
  const parsed = parseTimestamp(row.Timestamp);
  const parts = parsed ? calendarParts(parsed) : null;
  const roomId = row.RoomID;

  return {
    RoomID: typeof roomId === "string" ? roomId : null,
    AmbientTemperature: toNumberOrNull(row.AmbientTemperature),
    AmbientHumidity: toNumberOrNull(row.AmbientHumidity),
    CurrentTemperature: toNumberOrNull(row.CurrentTemperature),
    TargetTemperature: toNumberOrNull(row.TargetTemperature),
    FanSpeed: toIntegerOrNull(row.FanSpeed),
    Humidity: toNumberOrNull(row.Humidity),
    Occupancy: toBooleanOrNull(row.Occupancy),
    PowerConsumption: toNumberOrNull(row.PowerConsumption),
    TotalOccupantCount: toIntegerOrNull(row.TotalOccupantCount),
    Hour: toIntegerOrNull(row.Hour) ?? parts?.hour ?? null,
    DayOfWeek: toIntegerOrNull(row.DayOfWeek) ?? parts?.dayOfWeek ?? null,
    DayOfYear: toIntegerOrNull(row.DayOfYear) ?? parts?.dayOfYear ?? null,
    TotalPowerConsumption: toNumberOrNull(row.TotalPowerConsumption)
  };
}
