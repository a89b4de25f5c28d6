import assert from "node:assert/strict";
import { test } from "node:test";
import { ClockReading, OccupancyState, ROOM_IDS } from "../types.js";
import { readClock } from "./clock.js";
import {
  MAX_OCCUPANTS,
  baseOccupancyProbability,
  drawTargetOccupants,
  emptyRooms,
  initialOccupancy,
  updateOccupancy
} from "./occupancy.js";
import { scriptedRandom, seededRandom } from "./random.js";

const NOW = 10_000_000;

function weekdayAt(hourOfDay: number): ClockReading {
  return { hoursElapsed: hourOfDay, hourOfDay, dayOfSimulation: 0, isWeekend: false };
}

function dueState(partial: Partial<OccupancyState> = {}): OccupancyState {
  return { totalOccupants: 0, roomOccupied: emptyRooms(), nextChangeAtMs: NOW - 1, ...partial };
}

test("occupancy probability table keeps each routine's boundaries", () => {
  const weekday: Array<[number, number]> = [
    [5, 0.95],
    [6, 0.9],
    [8, 0.9],
    [9, 0.1],
    [16, 0.1],
    [17, 0.85],
    [22, 0.85],
    [23, 0.95]
  ];
  for (const [hour, p] of weekday) assert.equal(baseOccupancyProbability(false, hour), p, `weekday ${hour}`);

  const weekend: Array<[number, number]> = [
    [0, 0.95],
    [7, 0.95],
    [8, 0.8],
    [23, 0.8]
  ];
  for (const [hour, p] of weekend) assert.equal(baseOccupancyProbability(true, hour), p, `weekend ${hour}`);
});

test("target occupants uses a second, independent draw below full occupancy", () => {
  const full = scriptedRandom([0.5, 0.123]);
  assert.equal(drawTargetOccupants(full, 0.9), 2);
  assert.equal(full.next(), 0.123, "only one draw when everyone is home");

  assert.equal(drawTargetOccupants(scriptedRandom([0.95, 0.5]), 0.9), 1);
  assert.equal(drawTargetOccupants(scriptedRandom([0.95, 0.7]), 0.9), 0);
});

test("initial occupancy is empty and changes within 30-60 minutes", () => {
  const state = initialOccupancy(0, scriptedRandom([0.5]));
  assert.equal(state.totalOccupants, 0);
  assert.deepEqual(state.roomOccupied, emptyRooms());
  assert.equal(state.nextChangeAtMs, 2_700_000);
});

test("update is a no-op until the change time has passed", () => {
  const state = dueState({ nextChangeAtMs: NOW });
  assert.equal(updateOccupancy(state, weekdayAt(10), NOW, scriptedRandom([0])), state);
});

test("at night arrivals fill rooms in fixed order", () => {
  // 0.1 → two occupants, 0.9 → nobody moves, 0 → hold 45 minutes
  const next = updateOccupancy(dueState(), weekdayAt(23), NOW, scriptedRandom([0.1, 0.9, 0]));
  assert.deepEqual(next.roomOccupied, { room1: true, room2: true, room3: false });
  assert.equal(next.totalOccupants, 2);
  assert.equal(next.nextChangeAtMs, NOW + 2_700_000);
});

test("in the evening the first arrival goes to room1", () => {
  // second arrival picks from [room2, room3] with 0.6 → room3
  const next = updateOccupancy(dueState(), weekdayAt(18), NOW, scriptedRandom([0.1, 0.6, 0.9, 0]));
  assert.deepEqual(next.roomOccupied, { room1: true, room2: false, room3: true });
  assert.equal(next.totalOccupants, 2);
});

test("during the day arrivals pick random vacant rooms", () => {
  const next = updateOccupancy(dueState(), weekdayAt(10), NOW, scriptedRandom([0.05, 0.5, 0.0, 0.9, 0]));
  assert.deepEqual(next.roomOccupied, { room1: true, room2: true, room3: false });
});

test("departures empty random occupied rooms", () => {
  const state = dueState({ totalOccupants: 2, roomOccupied: { room1: true, room2: true, room3: false } });
  // 0.5 and 0.9 → target 0; picks room1 then room2; no relocation draw with nobody home
  const next = updateOccupancy(state, weekdayAt(10), NOW, scriptedRandom([0.5, 0.9, 0.0, 0.7, 0.5]));
  assert.deepEqual(next.roomOccupied, emptyRooms());
  assert.equal(next.totalOccupants, 0);
  assert.equal(next.nextChangeAtMs, NOW + 4_050_000);
});

test("an occupant can move to another room without changing the total", () => {
  const state = dueState({ totalOccupants: 1, roomOccupied: { room1: true, room2: false, room3: false } });
  const next = updateOccupancy(state, weekdayAt(10), NOW, scriptedRandom([0.5, 0.3, 0.1, 0.0, 0.99, 0]));
  assert.deepEqual(next.roomOccupied, { room1: false, room2: false, room3: true });
  assert.equal(next.totalOccupants, 1);
});

test("update does not mutate the previous state", () => {
  const state = dueState();
  updateOccupancy(state, weekdayAt(23), NOW, scriptedRandom([0.1, 0.9, 0]));
  assert.deepEqual(state.roomOccupied, emptyRooms());
  assert.equal(state.totalOccupants, 0);
});

test("occupant count matches occupied rooms across two simulated weeks", () => {
  const rng = seededRandom(2024);
  let state = initialOccupancy(0, rng);
  for (let minute = 0; minute < 14 * 24 * 60; minute += 5) {
    const nowMs = minute * 60_000;
    state = updateOccupancy(state, readClock(0, nowMs), nowMs, rng);
    const occupied = ROOM_IDS.filter((room) => state.roomOccupied[room]).length;
    assert.equal(state.totalOccupants, occupied);
    assert.ok(state.totalOccupants >= 0 && state.totalOccupants <= MAX_OCCUPANTS);
  }
});
