import { ClockReading, FanSpeed, HvacMode, PropertyState, ROOM_IDS, RoomId, RoomProperty } from "../types.js";
import { clamp, round1 } from "../utils/numbers.js";
import { approximateAmbientTemperature } from "./ambient.js";
import { secondsToMs } from "./clock.js";
import { RandomSource, chance, pick, uniform } from "./random.js";

export const MIN_TARGET_C = 18;
export const MAX_TARGET_C = 26;
const MODE_CHANGE_PROBABILITY = 0.2;
const INITIAL_HOLD_SECONDS: [number, number] = [7200, 14400];
const HOLD_SECONDS: [number, number] = [10800, 18000];

const SELECTABLE_MODES: readonly HvacMode[] = ["off", "heating", "cooling"];
const RUNNING_FAN_SPEEDS: readonly FanSpeed[] = [1, 2, 3];

export function initialRoomProperties(): Record<RoomId, RoomProperty> {
  return {
    room1: { targetTemperature: 22.0, mode: "cooling", fanSpeed: 2 },
    room2: { targetTemperature: 21.5, mode: "heating", fanSpeed: 1 },
    room3: { targetTemperature: 23.0, mode: "off", fanSpeed: 0 }
  };
}

export function initialPropertyState(startMs: number, rng: RandomSource): PropertyState {
  return {
    rooms: initialRoomProperties(),
    nextChangeAtMs: startMs + secondsToMs(uniform(rng, ...INITIAL_HOLD_SECONDS))
  };
}

/** Setpoint the household schedule asks for, before jitter. */
export function scheduledTargetCenter(isWeekend: boolean, hourOfDay: number): number {
  const h = hourOfDay;
  if (isWeekend) {
    return h >= 22 || h <= 7 ? 20.0 : 22.0;
  }
  if (h > 8 && h < 17) return 19.0; // energy saving while out
  if (h >= 6 && h <= 8) return 22.0;
  if (h >= 17 && h <= 22) return 22.5;
  return 20.0;
}

export function drawTargetTemperature(isWeekend: boolean, hourOfDay: number, rng: RandomSource): number {
  const target = scheduledTargetCenter(isWeekend, hourOfDay) + uniform(rng, -0.5, 0.5);
  return round1(clamp(target, MIN_TARGET_C, MAX_TARGET_C));
}

export function chooseMode(approxAmbientC: number, rng: RandomSource): HvacMode {
  if (approxAmbientC > 25) return "cooling";
  if (approxAmbientC < 12) return "heating";
  return pick(rng, SELECTABLE_MODES);
}

export function fanSpeedForMode(mode: HvacMode, rng: RandomSource): FanSpeed {
  return mode === "off" ? 0 : pick(rng, RUNNING_FAN_SPEEDS);
}

export function updateRoomProperties(
  state: PropertyState,
  clock: ClockReading,
  nowMs: number,
  rng: RandomSource
): PropertyState {
  if (!(nowMs > state.nextChangeAtMs)) return state;

  const rooms = { ...state.rooms };
  for (const room of ROOM_IDS) {
    rooms[room] = {
      ...rooms[room],
      targetTemperature: drawTargetTemperature(clock.isWeekend, clock.hourOfDay, rng)
    };
  }

  if (chance(rng, MODE_CHANGE_PROBABILITY)) {
    const room = pick(rng, ROOM_IDS);
    const mode = chooseMode(approximateAmbientTemperature(clock.hourOfDay), rng);
    rooms[room] = { ...rooms[room], mode, fanSpeed: fanSpeedForMode(mode, rng) };
  }

  return {
    rooms,
    nextChangeAtMs: nowMs + secondsToMs(uniform(rng, ...HOLD_SECONDS))
  };
}
