import {
  AmbientConditions,
  ApartmentSummaryRecord,
  RoomSensorRecord,
  SensorReading
} from "../types.js";

export function buildApartmentRecord(params: {
  timestamp: string;
  unitId: string;
  ambient: AmbientConditions;
  totalOccupants: number;
}): ApartmentSummaryRecord {
  return {
    EventType: "apartment_summary",
    Timestamp: params.timestamp,
    UnitID: params.unitId,
    AmbientTemperature: params.ambient.ambientTemperature,
    AmbientHumidity: params.ambient.ambientHumidity,
    TotalOccupantCount: params.totalOccupants
  };
}

export function buildRoomRecord(params: {
  timestamp: string;
  unitId: string;
  ambient: AmbientConditions;
  reading: SensorReading;
  totalOccupants: number;
}): RoomSensorRecord {
  const { reading } = params;
  return {
    EventType: "sensor_reading",
    Timestamp: params.timestamp,
    UnitID: params.unitId,
    RoomID: reading.roomId,
    AmbientTemperature: params.ambient.ambientTemperature,
    AmbientHumidity: params.ambient.ambientHumidity,
    CurrentTemperature: reading.currentTemperature,
    TargetTemperature: reading.targetTemperature,
    FanSpeed: reading.fanSpeed,
    Humidity: reading.humidity,
    Occupancy: reading.occupancy,
    PowerConsumption: reading.powerConsumption,
    TotalOccupantCount: params.totalOccupants
  };
}
