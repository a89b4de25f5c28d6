import { z } from "zod";

export const ApartmentSummaryRecordSchema = z
  .object({
    EventType: z.literal("apartment_summary"),
    Timestamp: z.string().min(1),
    UnitID: z.string().min(1),
    AmbientTemperature: z.number(),
    AmbientHumidity: z.number(),
    TotalOccupantCount: z.number().int().min(0)
  })
  .strict();

export const RoomSensorRecordSchema = z
  .object({
    EventType: z.literal("sensor_reading"),
    Timestamp: z.string().min(1),
    UnitID: z.string().min(1),
    RoomID: z.string().min(1),
    AmbientTemperature: z.number(),
    AmbientHumidity: z.number(),
    CurrentTemperature: z.number(),
    TargetTemperature: z.number(),
    FanSpeed: z.number().int().min(0).max(3),
    Humidity: z.number(),
    Occupancy: z.boolean(),
    PowerConsumption: z.number(),
    TotalOccupantCount: z.number().int().min(0)
  })
  .strict();

export const TelemetryRecordSchema = z.discriminatedUnion("EventType", [
  ApartmentSummaryRecordSchema,
  RoomSensorRecordSchema
]);
