export const ROOM_IDS = ["room1", "room2", "room3"] as const;
export type RoomId = (typeof ROOM_IDS)[number];

export type HvacMode = "heating" | "cooling" | "off";
export type FanSpeed = 0 | 1 | 2 | 3;

export interface RoomProperty {
  targetTemperature: number; // °C, 18-26
  mode: HvacMode;
  fanSpeed: FanSpeed;
}

export interface WeatherState {
  variation: number; // °C offset, -3..3
  nextChangeAtMs: number;
}

export interface OccupancyState {
  totalOccupants: number;
  roomOccupied: Record<RoomId, boolean>;
  nextChangeAtMs: number;
}

export interface PropertyState {
  rooms: Record<RoomId, RoomProperty>;
  nextChangeAtMs: number;
}

export interface SimulationState {
  startMs: number;
  weather: WeatherState;
  occupancy: OccupancyState;
  properties: PropertyState;
}

export interface ClockReading {
  hoursElapsed: number;
  hourOfDay: number;
  dayOfSimulation: number;
  isWeekend: boolean;
}

export interface AmbientConditions {
  ambientTemperature: number;
  ambientHumidity: number;
}

export interface SensorReading {
  roomId: RoomId;
  currentTemperature: number;
  humidity: number;
  powerConsumption: number; // W
  targetTemperature: number;
  fanSpeed: FanSpeed;
  occupancy: boolean;
  mode: HvacMode;
}

export interface ApartmentSummaryRecord {
  EventType: "apartment_summary";
  Timestamp: string;
  UnitID: string;
  AmbientTemperature: number;
  AmbientHumidity: number;
  TotalOccupantCount: number;
}

export interface RoomSensorRecord {
  EventType: "sensor_reading";
  Timestamp: string;
  UnitID: string;
  RoomID: string;
  AmbientTemperature: number;
  AmbientHumidity: number;
  CurrentTemperature: number;
  TargetTemperature: number;
  FanSpeed: number;
  Humidity: number;
  Occupancy: boolean;
  PowerConsumption: number;
  TotalOccupantCount: number;
}

export type TelemetryRecord = ApartmentSummaryRecord | RoomSensorRecord;

export interface TelemetrySink {
  readonly name: string;
  /** Rejects with SinkError when the record could not be delivered. */
  publish(record: TelemetryRecord): Promise<void>;
  close?(): Promise<void>;
}

export interface TickResult {
  timestamp: string;
  apartment: ApartmentSummaryRecord;
  rooms: RoomSensorRecord[];
  failedEmissions: number;
}
