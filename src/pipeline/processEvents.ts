import { z } from "zod";
import { logger } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";
import { FeatureRow, buildFeatureVector, toIntegerOrNull, toNumberOrNull, toBooleanOrNull } from "./features.js";
import { FALLBACK_ACTION, InferenceClient, InferenceResult } from "./inference.js";
import { TwinUpdater, buildTwinPatch, timestampToIso } from "./twinPatch.js";
import { RoomSensorRecordSchema } from "../telemetry/schema.js";
import { RoomSensorRecord } from "../types.js";

export interface FeatureStore {
  /** Most recent feature row recorded for the room, or null. */
  getLatestRoomRecord(roomId: string): Promise<FeatureRow | null>;
}

export interface InferredRecordSink {
  enqueue(record: InferredRecord): Promise<void>;
}

export interface InferredRecord {
  EventType: string;
  Timestamp: string;
  UnitID: unknown;
  RoomID: string;
  AmbientTemperature: unknown;
  AmbientHumidity: unknown;
  CurrentTemperature: unknown;
  TargetTemperature: unknown;
  FanSpeed: unknown;
  Humidity: unknown;
  Occupancy: boolean;
  PowerConsumption: unknown;
  TotalOccupantCount: unknown;
  Hour: number | null;
  DayOfWeek: number | null;
  DayOfYear: number | null;
  TotalPowerConsumption: unknown;
  ControlAction: unknown;
  Scored_Probabilities_Cooling: unknown;
  Scored_Probabilities_Heating: unknown;
  Scored_Probabilities_Off: unknown;
}

export interface PipelineDeps {
  features: FeatureStore;
  inference: InferenceClient;
  twins: TwinUpdater;
  /** Without one, inferred rows are dropped. */
  inferredSink?: InferredRecordSink;
  now?: () => Date;
}

export type EventOutcome =
  | "updated"
  | "twin_failed"
  | "undecodable"
  | "ignored_type"
  | "missing_room"
  | "no_features";

export interface BatchSummary {
  received: number;
  outcomes: Record<EventOutcome, number>;
  processed_at: string;
}

type EventMessage = Record<string, unknown>;

const EventMessageSchema = z.record(z.string(), z.unknown());

/** Accepts an already-parsed object or its JSON text. */
export function decodeEvent(raw: unknown): EventMessage {
  const value: unknown = typeof raw === "string" ? JSON.parse(raw) : raw;
  const parsed = EventMessageSchema.safeParse(value);
  if (!parsed.success) throw new Error("event body is not a JSON object");
  return parsed.data;
}

function stringField(message: EventMessage, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = message[key];
    if (typeof value === "string" && value !== "") return value;
  }
  return undefined;
}

async function lookupFeatures(store: FeatureStore, roomId: string): Promise<FeatureRow | null> {
  try {
    return await store.getLatestRoomRecord(roomId);
  } catch (e) {
    logger.error({ err: e, room: roomId }, "Feature lookup failed");
    return null;
  }
}

async function infer(client: InferenceClient, row: FeatureRow, fallbackAction: string, roomId: string) {
  const features = buildFeatureVector(row);
  let result: InferenceResult;
  try {
    result = await client.predict(features, fallbackAction);
  } catch (e) {
    logger.error({ err: e, room: roomId }, `ML inference failed: ${errorMessage(e)}`);
    result = { ControlAction: fallbackAction };
  }
  return { features, result };
}

export async function processEvent(raw: unknown, deps: PipelineDeps): Promise<EventOutcome> {
  const now = deps.now ?? (() => new Date());

  let message: EventMessage;
  try {
    message = decodeEvent(raw);
  } catch (e) {
    logger.error({ err: e }, "Failed to decode telemetry event");
    return "undecodable";
  }

  const eventType = (stringField(message, "EventType", "event_type") ?? "").toLowerCase();
  if (eventType && eventType !== "sensor_reading") return "ignored_type";

  const roomId = stringField(message, "RoomID", "room_id");
  if (!roomId) {
    logger.warn({ message }, "Telemetry event missing RoomID");
    return "missing_room";
  }

  const row = await lookupFeatures(deps.features, roomId);
  if (!row) {
    logger.warn({ room: roomId }, "No feature row found for room; skipping inference");
    return "no_features";
  }

  const fallbackAction = typeof row.ControlAction === "string" ? row.ControlAction : FALLBACK_ACTION;
  const { features, result } = await infer(deps.inference, row, fallbackAction, roomId);
  const action = result.ControlAction;
  const fanSpeed = toIntegerOrNull(result.FanSpeed ?? row.FanSpeed);
  const power = toNumberOrNull(result.PowerConsumption ?? row.PowerConsumption);
  const at = now();

  const inferred: InferredRecord = {
    EventType: typeof row.EventType === "string" ? row.EventType : "sensor_reading",
    Timestamp: timestampToIso(row.Timestamp, at),
    UnitID: row.UnitID ?? null,
    RoomID: roomId,
    AmbientTemperature: row.AmbientTemperature ?? null,
    AmbientHumidity: row.AmbientHumidity ?? null,
    CurrentTemperature: row.CurrentTemperature ?? null,
    TargetTemperature: row.TargetTemperature ?? null,
    FanSpeed: fanSpeed ?? row.FanSpeed ?? null,
    Humidity: row.Humidity ?? null,
    Occupancy: toBooleanOrNull(row.Occupancy) ?? false,
    PowerConsumption: power ?? row.PowerConsumption ?? null,
    TotalOccupantCount: row.TotalOccupantCount ?? null,
    Hour: features.Hour,
    DayOfWeek: features.DayOfWeek,
    DayOfYear: features.DayOfYear,
    TotalPowerConsumption: features.TotalPowerConsumption ?? row.TotalPowerConsumption ?? null,
    ControlAction: result["Scored Labels"] ?? action,
    Scored_Probabilities_Cooling: result["Scored Probabilities_cooling"] ?? null,
    Scored_Probabilities_Heating: result["Scored Probabilities_heating"] ?? null,
    Scored_Probabilities_Off: result["Scored Probabilities_off"] ?? null
  };

  const patch = buildTwinPatch({ row, action, fanSpeed, power, now: at });

  let outcome: EventOutcome = "updated";
  try {
    await deps.twins.updateTwin(roomId, patch);
    logger.info({ room: roomId, action }, "Twin updated with ML action");
  } catch (e) {
    outcome = "twin_failed";
    logger.error({ err: e, room: roomId }, `Failed to update twin: ${errorMessage(e)}`);
  } finally {
    if (deps.inferredSink) {
      try {
        await deps.inferredSink.enqueue(inferred);
      } catch (e) {
        logger.error({ err: e, room: roomId }, "Failed to store inferred record");
      }
    }
  }
  return outcome;
}

export function emptyOutcomes(): Record<EventOutcome, number> {
  return { updated: 0, twin_failed: 0, undecodable: 0, ignored_type: 0, missing_room: 0, no_features: 0 };
}

/** Events are handled one at a time, in arrival order. */
export async function processEventBatch(events: unknown[], deps: PipelineDeps): Promise<BatchSummary> {
  const outcomes = emptyOutcomes();
  for (const event of events) {
    outcomes[await processEvent(event, deps)] += 1;
  }
  return {
    received: events.length,
    outcomes,
    processed_at: (deps.now ?? (() => new Date()))().toISOString()
  };
}

/** Well-formed sensor_reading records in a batch, for feature capture. */
export function sensorRecordsIn(events: unknown[]): RoomSensorRecord[] {
  const records: RoomSensorRecord[] = [];
  for (const raw of events) {
    let message: EventMessage;
    try {
      message = decodeEvent(raw);
    } catch (e) {
      logger.debug({ err: e }, "Skipping undecodable event for feature capture");
      continue;
    }
    const parsed = RoomSensorRecordSchema.safeParse(message);
    if (parsed.success) records.push(parsed.data);
  }
  return records;
}
