import { FeatureRow, toBooleanOrNull, toIntegerOrNull } from "./features.js";

export const ACTION_COLORS: Record<string, string> = {
  heat: "#FFA500",
  cool: "#1E90FF",
  off: "#808080"
};
const UNKNOWN_ACTION_COLOR = "#808080";

export interface JsonPatchOperation {
  op: "replace";
  path: string;
  value: unknown;
}

export interface TwinUpdater {
  updateTwin(twinId: string, patch: JsonPatchOperation[]): Promise<void>;
}

export function mapActionColor(action: string): string {
  return Object.hasOwn(ACTION_COLORS, action) ? ACTION_COLORS[action] : UNKNOWN_ACTION_COLOR;
}

export function timestampToIso(value: unknown, now: Date): string {
  if (value instanceof Date && !Number.isNaN(value.getTime())) return value.toISOString();
  if (typeof value === "string" && value !== "") return value;
  return now.toISOString();
}

export function buildTwinPatch(params: {
  row: FeatureRow;
  action: string;
  fanSpeed: number | null;
  power: number | null;
  now: Date;
}): JsonPatchOperation[] {
  const { row, action } = params;
  const replace = (path: string, value: unknown): JsonPatchOperation => ({ op: "replace", path, value });

  return [
    replace("/currentTemp", row.CurrentTemperature ?? null),
    replace("/targetTemp", row.TargetTemperature ?? null),
    replace("/humidity", row.Humidity ?? null),
    replace("/occupancy", toBooleanOrNull(row.Occupancy) ?? false),
    replace("/occupantCount", toIntegerOrNull(row.TotalOccupantCount) ?? 0),
    replace("/ambientTemp", row.AmbientTemperature ?? null),
    replace("/ambientHumidity", row.AmbientHumidity ?? null),
    replace("/powerConsumption", params.power ?? row.PowerConsumption ?? null),
    replace("/fanSpeed", params.fanSpeed ?? row.FanSpeed ?? null),
    replace("/hvacAction", action),
    replace("/hvacActionColor", mapActionColor(action)),
    replace("/timestamp", timestampToIso(row.Timestamp, params.now))
  ];
}
