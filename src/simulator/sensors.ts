import { AmbientConditions, FanSpeed, HvacMode, RoomId, RoomProperty, SensorReading } from "../types.js";
import { clamp, round1 } from "../utils/numbers.js";
import { BASE_OUTDOOR_TEMP_C } from "./ambient.js";
import { timeFactor } from "./clock.js";
import { RandomSource, uniform } from "./random.js";

export const ROOM_OFFSETS_C: Record<RoomId, number> = {
  room1: 0.5, // south-facing
  room2: -0.3,
  room3: 0.0
};

export const OCCUPANCY_HEAT_C = 1.5;
export const STANDBY_POWER_W: [number, number] = [5, 15];
export const MIN_POWER_W = 5.0;

const FAN_MULTIPLIERS: Record<FanSpeed, number> = { 0: 0.1, 1: 0.7, 2: 1.0, 3: 1.3 };

export interface RoomContext {
  roomId: RoomId;
  hourOfDay: number;
  occupied: boolean;
  property: RoomProperty;
  ambient: AmbientConditions;
}

/** Room temperature before any HVAC action or sensor noise. */
export function baseRoomTemperature(params: {
  roomId: RoomId;
  hourOfDay: number;
  ambientTemperature: number;
  occupied: boolean;
}): number {
  const baseIndoor = 21.0 + 2.0 * timeFactor(params.hourOfDay);
  const ambientInfluence = (params.ambientTemperature - BASE_OUTDOOR_TEMP_C) * 0.3;
  const occupancyHeat = params.occupied ? OCCUPANCY_HEAT_C : 0;
  return baseIndoor + ambientInfluence + ROOM_OFFSETS_C[params.roomId] + occupancyHeat;
}

/**
 * Push toward the setpoint, proportional to the gap and capped at 2 °C, plus a
 * 0.2-0.8 °C kick. Zero when the unit is off or already past its target.
 */
export function hvacEffect(mode: HvacMode, currentBase: number, target: number, rng: RandomSource): number {
  switch (mode) {
    case "heating":
      if (currentBase < target) {
        return Math.min((target - currentBase) * 0.3, 2.0) + uniform(rng, 0.2, 0.8);
      }
      return 0;
    case "cooling":
      if (currentBase > target) {
        return -Math.min((currentBase - target) * 0.3, 2.0) - uniform(rng, 0.2, 0.8);
      }
      return 0;
    case "off":
      return 0;
  }
}

export function roomTemperature(ctx: RoomContext, rng: RandomSource): number {
  const currentBase = baseRoomTemperature({
    roomId: ctx.roomId,
    hourOfDay: ctx.hourOfDay,
    ambientTemperature: ctx.ambient.ambientTemperature,
    occupied: ctx.occupied
  });
  const effect = hvacEffect(ctx.property.mode, currentBase, ctx.property.targetTemperature, rng);
  return round1(clamp(currentBase + effect + uniform(rng, -0.3, 0.3), 16, 30));
}

function modeHumidityEffect(mode: HvacMode, rng: RandomSource): number {
  switch (mode) {
    case "cooling":
      return -uniform(rng, 2, 5);
    case "heating":
      return -uniform(rng, 1, 3);
    case "off":
      return 0;
  }
}

export function roomHumidity(
  ctx: Pick<RoomContext, "occupied" | "ambient"> & { mode: HvacMode },
  rng: RandomSource
): number {
  const indoorBase = ctx.ambient.ambientHumidity - uniform(rng, 10, 20);
  const occupancy = ctx.occupied ? 5.0 : 0;
  const mode = modeHumidityEffect(ctx.mode, rng);
  return round1(clamp(indoorBase + occupancy + mode + uniform(rng, -3, 3), 25, 75));
}

function basePower(mode: Exclude<HvacMode, "off">, rng: RandomSource): number {
  return mode === "heating" ? uniform(rng, 800, 1200) : uniform(rng, 600, 1000);
}

/** Watts drawn by the room's unit. */
export function powerConsumption(mode: HvacMode, fanSpeed: FanSpeed, rng: RandomSource): number {
  if (mode === "off") {
    return round1(uniform(rng, ...STANDBY_POWER_W));
  }
  const multiplier = FAN_MULTIPLIERS[fanSpeed] ?? 1.0;
  const total = basePower(mode, rng) * multiplier + uniform(rng, -50, 50);
  return round1(Math.max(MIN_POWER_W, total));
}

export function synthesizeReading(ctx: RoomContext, rng: RandomSource): SensorReading {
  const currentTemperature = roomTemperature(ctx, rng);
  const humidity = roomHumidity({ occupied: ctx.occupied, ambient: ctx.ambient, mode: ctx.property.mode }, rng);
  const power = powerConsumption(ctx.property.mode, ctx.property.fanSpeed, rng);

  return {
    roomId: ctx.roomId,
    currentTemperature,
    humidity,
    powerConsumption: power,
    targetTemperature: ctx.property.targetTemperature,
    fanSpeed: ctx.property.fanSpeed,
    occupancy: ctx.occupied,
    mode: ctx.property.mode
  };
}
