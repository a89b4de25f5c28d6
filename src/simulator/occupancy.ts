import { ClockReading, OccupancyState, ROOM_IDS, RoomId } from "../types.js";
import { secondsToMs } from "./clock.js";
import { RandomSource, chance, pick, uniform } from "./random.js";

export const MAX_OCCUPANTS = 2;
const RELOCATION_PROBABILITY = 0.3;
const SINGLE_OCCUPANT_PROBABILITY = 0.6;
const INITIAL_HOLD_SECONDS: [number, number] = [1800, 3600];
const HOLD_SECONDS: [number, number] = [2700, 5400];

export function emptyRooms(): Record<RoomId, boolean> {
  return { room1: false, room2: false, room3: false };
}

export function initialOccupancy(startMs: number, rng: RandomSource): OccupancyState {
  return {
    totalOccupants: 0,
    roomOccupied: emptyRooms(),
    nextChangeAtMs: startMs + secondsToMs(uniform(rng, ...INITIAL_HOLD_SECONDS))
  };
}

export function occupiedRooms(roomOccupied: Record<RoomId, boolean>): RoomId[] {
  return ROOM_IDS.filter((room) => roomOccupied[room]);
}

export function vacantRooms(roomOccupied: Record<RoomId, boolean>): RoomId[] {
  return ROOM_IDS.filter((room) => !roomOccupied[room]);
}

/** Probability that the apartment is fully occupied at this hour. */
export function baseOccupancyProbability(isWeekend: boolean, hourOfDay: number): number {
  const h = hourOfDay;
  if (isWeekend) {
    return h >= 8 && h <= 23 ? 0.8 : 0.95;
  }
  if (h >= 6 && h <= 8) return 0.9; // morning routine
  if (h > 8 && h < 17) return 0.1; // at work
  if (h >= 17 && h <= 22) return 0.85; // evening
  return 0.95;
}

/**
 * Two separate draws on purpose: the second only decides between one and
 * zero occupants once "everyone home" has been ruled out.
 */
export function drawTargetOccupants(rng: RandomSource, baseProbability: number): number {
  if (chance(rng, baseProbability)) return 2;
  return chance(rng, SINGLE_OCCUPANT_PROBABILITY) ? 1 : 0;
}

function isSleepHour(h: number): boolean {
  return h >= 22 || h <= 6;
}

function isEveningHour(h: number): boolean {
  return h >= 17 && h <= 21;
}

function chooseArrivalRoom(available: RoomId[], hourOfDay: number, rng: RandomSource): RoomId {
  let preferred: RoomId | undefined;
  if (isSleepHour(hourOfDay)) {
    preferred = available[0];
  } else if (isEveningHour(hourOfDay)) {
    preferred = available.includes("room1") ? "room1" : undefined;
  }
  return preferred ?? pick(rng, available);
}

export function updateOccupancy(
  state: OccupancyState,
  clock: ClockReading,
  nowMs: number,
  rng: RandomSource
): OccupancyState {
  if (!(nowMs > state.nextChangeAtMs)) return state;

  const roomOccupied = { ...state.roomOccupied };
  let total = state.totalOccupants;
  const target = drawTargetOccupants(rng, baseOccupancyProbability(clock.isWeekend, clock.hourOfDay));

  if (target > total) {
    const available = vacantRooms(roomOccupied);
    const arrivals = Math.min(target - total, available.length);
    for (let i = 0; i < arrivals; i++) {
      const room = chooseArrivalRoom(available, clock.hourOfDay, rng);
      roomOccupied[room] = true;
      available.splice(available.indexOf(room), 1);
      total += 1;
    }
  } else if (target < total) {
    const occupied = occupiedRooms(roomOccupied);
    const departures = Math.min(total - target, occupied.length);
    for (let i = 0; i < departures; i++) {
      const room = pick(rng, occupied);
      roomOccupied[room] = false;
      occupied.splice(occupied.indexOf(room), 1);
      total -= 1;
    }
  }

  if (total > 0 && chance(rng, RELOCATION_PROBABILITY)) {
    const occupied = occupiedRooms(roomOccupied);
    const available = vacantRooms(roomOccupied);
    if (occupied.length > 0 && available.length > 0) {
      const from = pick(rng, occupied);
      const to = pick(rng, available);
      roomOccupied[from] = false;
      roomOccupied[to] = true;
    }
  }

  return {
    totalOccupants: total,
    roomOccupied,
    nextChangeAtMs: nowMs + secondsToMs(uniform(rng, ...HOLD_SECONDS))
  };
}
