import assert from "node:assert/strict";
import { test } from "node:test";
import { FanSpeed } from "../types.js";
import { scriptedRandom, seededRandom } from "./random.js";
import {
  RoomContext,
  baseRoomTemperature,
  hvacEffect,
  powerConsumption,
  roomHumidity,
  roomTemperature,
  synthesizeReading
} from "./sensors.js";

const near = (actual: number, expected: number) =>
  assert.ok(Math.abs(actual - expected) < 1e-9, `${actual} !== ${expected}`);

test("base temperature adds room offset and occupant heat", () => {
  assert.equal(baseRoomTemperature({ roomId: "room3", hourOfDay: 6, ambientTemperature: 15, occupied: false }), 21);
  assert.equal(baseRoomTemperature({ roomId: "room1", hourOfDay: 6, ambientTemperature: 15, occupied: true }), 23);
});

test("heating and cooling push toward the setpoint", () => {
  near(hvacEffect("heating", 19, 22, scriptedRandom([0])), 1.1);
  near(hvacEffect("cooling", 25, 22, scriptedRandom([0])), -1.1);
  assert.equal(hvacEffect("heating", 10, 22, scriptedRandom([0.5])), 2.5, "capped at 2 °C plus the kick");
});

test("hvac has no effect when off or already past the setpoint", () => {
  const rng = scriptedRandom([0.123]);
  assert.equal(hvacEffect("off", 18, 22, rng), 0);
  assert.equal(hvacEffect("heating", 23, 22, rng), 0);
  assert.equal(hvacEffect("cooling", 21, 22, rng), 0);
  assert.equal(rng.next(), 0.123, "no draws consumed");
});

test("a heated cold room reads above its passive temperature", () => {
  const ctx: RoomContext = {
    roomId: "room3",
    hourOfDay: 2,
    occupied: false,
    property: { targetTemperature: 22, mode: "heating", fanSpeed: 1 },
    ambient: { ambientTemperature: 14.1, ambientHumidity: 70 }
  };
  assert.equal(roomTemperature(ctx, scriptedRandom([0, 0])), 19.8);

  const passive = baseRoomTemperature({ roomId: "room3", hourOfDay: 2, ambientTemperature: 14.1, occupied: false });
  const rng = seededRandom(3);
  for (let i = 0; i < 100; i++) {
    assert.ok(roomTemperature(ctx, rng) > passive + 0.05);
  }
});

test("room temperature is clamped to 16-30 °C", () => {
  const hot: RoomContext = {
    roomId: "room3",
    hourOfDay: 12,
    occupied: true,
    property: { targetTemperature: 22, mode: "off", fanSpeed: 0 },
    ambient: { ambientTemperature: 60, ambientHumidity: 50 }
  };
  assert.equal(roomTemperature(hot, scriptedRandom([0.99])), 30);

  const cold: RoomContext = { ...hot, hourOfDay: 0, occupied: false, ambient: { ambientTemperature: -20, ambientHumidity: 50 } };
  assert.equal(roomTemperature(cold, scriptedRandom([0])), 16);
});

test("standby power is drawn regardless of fan speed when off", () => {
  assert.equal(powerConsumption("off", 0, scriptedRandom([0])), 5);
  assert.equal(powerConsumption("off", 0, scriptedRandom([0.5])), 10);

  const rng = seededRandom(11);
  const speeds: FanSpeed[] = [0, 1, 2, 3];
  for (const fan of speeds) {
    for (let i = 0; i < 50; i++) {
      const watts = powerConsumption("off", fan, rng);
      assert.ok(watts >= 5 && watts <= 15, `${watts} W`);
    }
  }
});

test("active power scales with fan speed", () => {
  assert.equal(powerConsumption("heating", 2, scriptedRandom([0.5, 0.5])), 1000);
  assert.equal(powerConsumption("cooling", 1, scriptedRandom([0.5, 0.5])), 560);
  assert.equal(powerConsumption("heating", 0, scriptedRandom([0, 0])), 30);
});

test("humidity follows ambient minus indoor drying and mode effect", () => {
  const ambient = { ambientTemperature: 15, ambientHumidity: 60 };
  assert.equal(roomHumidity({ occupied: false, ambient, mode: "off" }, scriptedRandom([0.5, 0.5])), 45);
  assert.equal(roomHumidity({ occupied: true, ambient, mode: "cooling" }, scriptedRandom([0.5, 0.5, 0.5])), 46.5);

  const dry = { ambientTemperature: 15, ambientHumidity: 30 };
  assert.equal(roomHumidity({ occupied: false, ambient: dry, mode: "cooling" }, scriptedRandom([0.99, 0.99, 0])), 25);
});

test("a reading carries the room's configured properties", () => {
  const reading = synthesizeReading(
    {
      roomId: "room2",
      hourOfDay: 6,
      occupied: true,
      property: { targetTemperature: 21, mode: "off", fanSpeed: 0 },
      ambient: { ambientTemperature: 15, ambientHumidity: 60 }
    },
    scriptedRandom([])
  );
  assert.deepEqual(reading, {
    roomId: "room2",
    currentTemperature: 22.2,
    humidity: 50,
    powerConsumption: 10,
    targetTemperature: 21,
    fanSpeed: 0,
    occupancy: true,
    mode: "off"
  });
});
