import {
  AmbientConditions,
  ROOM_IDS,
  RoomSensorRecord,
  SimulationState,
  TelemetryRecord,
  TelemetrySink,
  TickResult
} from "../types.js";
import { buildApartmentRecord, buildRoomRecord } from "../telemetry/records.js";
import { errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { toFixedOffsetIso } from "../utils/time.js";
import { computeAmbient, initialWeather, refreshWeather } from "./ambient.js";
import { readClock } from "./clock.js";
import { initialOccupancy, updateOccupancy } from "./occupancy.js";
import { RandomSource, mathRandom } from "./random.js";
import { initialPropertyState, updateRoomProperties } from "./schedule.js";
import { synthesizeReading } from "./sensors.js";

export interface ApartmentSimulatorOptions {
  unitId: string;
  sink: TelemetrySink;
  random?: RandomSource;
  startMs?: number;
  /** Offset applied to record timestamps; the wire format uses UTC-7. */
  utcOffsetMinutes?: number;
}

export function createInitialState(startMs: number, rng: RandomSource): SimulationState {
  return {
    startMs,
    weather: initialWeather(startMs, rng),
    occupancy: initialOccupancy(startMs, rng),
    properties: initialPropertyState(startMs, rng)
  };
}

export class ApartmentSimulator {
  readonly unitId: string;
  private readonly sink: TelemetrySink;
  private readonly rng: RandomSource;
  private readonly utcOffsetMinutes: number;
  private state: SimulationState;
  private ticking = false;

  constructor(opts: ApartmentSimulatorOptions) {
    this.unitId = opts.unitId;
    this.sink = opts.sink;
    this.rng = opts.random ?? mathRandom;
    this.utcOffsetMinutes = opts.utcOffsetMinutes ?? -420;
    this.state = createInitialState(opts.startMs ?? Date.now(), this.rng);
  }

  get startMs(): number {
    return this.state.startMs;
  }

  /** Read-only view of the current state, for logging and tests. */
  snapshot(): Readonly<SimulationState> {
    return structuredClone(this.state);
  }

  updateOccupancy(nowMs: number): void {
    const clock = readClock(this.state.startMs, nowMs);
    this.state.occupancy = updateOccupancy(this.state.occupancy, clock, nowMs, this.rng);
  }

  updateRoomProperties(nowMs: number): void {
    const clock = readClock(this.state.startMs, nowMs);
    this.state.properties = updateRoomProperties(this.state.properties, clock, nowMs, this.rng);
  }

  /** Applies any pending weather change, so this is not a pure read. */
  ambientConditions(nowMs: number): AmbientConditions {
    this.state.weather = refreshWeather(this.state.weather, nowMs, this.rng);
    const { hourOfDay } = readClock(this.state.startMs, nowMs);
    return computeAmbient(hourOfDay, this.state.weather.variation, this.rng);
  }

  /**
   * One update-and-emit cycle. Resolves to null when another tick is still
   * emitting; sink failures are logged and counted, never thrown.
   */
  async tick(nowMs: number): Promise<TickResult | null> {
    if (this.ticking) {
      logger.warn("Tick skipped: previous tick still running");
      return null;
    }
    this.ticking = true;
    try {
      return await this.runTick(nowMs);
    } finally {
      this.ticking = false;
    }
  }

  private async runTick(nowMs: number): Promise<TickResult> {
    this.updateOccupancy(nowMs);
    this.updateRoomProperties(nowMs);
    const ambient = this.ambientConditions(nowMs);

    const { hourOfDay } = readClock(this.state.startMs, nowMs);
    const { occupancy, properties } = this.state;
    const timestamp = toFixedOffsetIso(new Date(nowMs), this.utcOffsetMinutes);
    let failedEmissions = 0;

    const apartment = buildApartmentRecord({
      timestamp,
      unitId: this.unitId,
      ambient,
      totalOccupants: occupancy.totalOccupants
    });
    if (await this.emit(apartment)) {
      logger.info(
        { ambient_c: ambient.ambientTemperature, ambient_rh_pct: ambient.ambientHumidity },
        "[APARTMENT] published"
      );
    } else {
      failedEmissions += 1;
    }

    const rooms: RoomSensorRecord[] = [];
    for (const roomId of ROOM_IDS) {
      const property = properties.rooms[roomId];
      const reading = synthesizeReading(
        { roomId, hourOfDay, occupied: occupancy.roomOccupied[roomId], property, ambient },
        this.rng
      );
      const record = buildRoomRecord({
        timestamp,
        unitId: this.unitId,
        ambient,
        reading,
        totalOccupants: occupancy.totalOccupants
      });
      rooms.push(record);

      if (await this.emit(record)) {
        logger.info(
          {
            room: roomId,
            temp_c: reading.currentTemperature,
            rh_pct: reading.humidity,
            occupied: reading.occupancy,
            power_w: reading.powerConsumption,
            mode: reading.mode
          },
          `[${roomId.toUpperCase()}] published`
        );
      } else {
        failedEmissions += 1;
      }
    }

    logger.info({ total_occupants: occupancy.totalOccupants, failed_emissions: failedEmissions }, "Tick complete");
    return { timestamp, apartment, rooms, failedEmissions };
  }

  private async emit(record: TelemetryRecord): Promise<boolean> {
    try {
      await this.sink.publish(record);
      return true;
    } catch (e) {
      const target = record.EventType === "sensor_reading" ? record.RoomID : "apartment";
      logger.error({ err: e, sink: this.sink.name, target }, `Error sending ${target} telemetry: ${errorMessage(e)}`);
      return false;
    }
  }
}
