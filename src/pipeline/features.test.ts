import assert from "node:assert/strict";
import { test } from "node:test";
import {
  buildFeatureVector,
  calendarParts,
  parseTimestamp,
  toBooleanOrNull,
  toIntegerOrNull,
  toNumberOrNull
} from "./features.js";

function partsOf(value: string) {
  const parsed = parseTimestamp(value);
  assert.ok(parsed, `unparseable: ${value}`);
  return { parsed, parts: calendarParts(parsed) };
}

test("offset timestamps keep their local calendar fields", () => {
  const { parsed, parts } = partsOf("2024-03-05T10:15:00.000-07:00");
  assert.equal(parsed.instant.toISOString(), "2024-03-05T17:15:00.000Z");
  assert.equal(parsed.offsetMinutes, -420);
  assert.deepEqual(parts, { hour: 10, dayOfWeek: 1, dayOfYear: 65 });
});

test("sub-millisecond digits are truncated", () => {
  const { parsed } = partsOf("2024-03-05T10:15:00.123456Z");
  assert.equal(parsed.instant.toISOString(), "2024-03-05T10:15:00.123Z");
});

test("UTC and offset-less timestamps are read as UTC", () => {
  assert.deepEqual(partsOf("2024-01-01T00:30:00Z").parts, { hour: 0, dayOfWeek: 0, dayOfYear: 1 });
  assert.deepEqual(partsOf("2024-12-31T23:00:00").parts, { hour: 23, dayOfWeek: 1, dayOfYear: 366 });
});

test("compact offsets are accepted", () => {
  const { parsed, parts } = partsOf("2024-06-01T12:00:00+0530");
  assert.equal(parsed.offsetMinutes, 330);
  assert.equal(parsed.instant.toISOString(), "2024-06-01T06:30:00.000Z");
  assert.equal(parts.hour, 12);
});

test("values that are not timestamps parse to null", () => {
  assert.equal(parseTimestamp("not a date"), null);
  assert.equal(parseTimestamp(""), null);
  assert.equal(parseTimestamp(42), null);
  assert.equal(parseTimestamp(new Date(Number.NaN)), null);
});

test("numeric coercions accept numbers and numeric strings only", () => {
  assert.equal(toNumberOrNull("21.5"), 21.5);
  assert.equal(toNumberOrNull(""), null);
  assert.equal(toNumberOrNull("abc"), null);
  assert.equal(toNumberOrNull(Number.POSITIVE_INFINITY), null);

  assert.equal(toIntegerOrNull("7"), 7);
  assert.equal(toIntegerOrNull("7.5"), null);
  assert.equal(toIntegerOrNull(3.9), 3);
  assert.equal(toIntegerOrNull(Number.NaN), null);
});

test("boolean coercion reads common truthy strings", () => {
  assert.equal(toBooleanOrNull("yes"), true);
  assert.equal(toBooleanOrNull("TRUE"), true);
  assert.equal(toBooleanOrNull("false"), false);
  assert.equal(toBooleanOrNull(0), false);
  assert.equal(toBooleanOrNull(null), null);
  assert.equal(toBooleanOrNull(undefined), null);
});

test("feature vector derives calendar fields from the timestamp", () => {
  assert.deepEqual(
    buildFeatureVector({
      Timestamp: "2024-03-05T10:15:00.000-07:00",
      RoomID: "room1",
      AmbientTemperature: 17.3,
      AmbientHumidity: "58.1",
      CurrentTemperature: 21.4,
      TargetTemperature: 22,
      FanSpeed: "2",
      Humidity: 44.9,
      Occupancy: "true",
      PowerConsumption: 1000,
      TotalOccupantCount: 1
    }),
    {
      RoomID: "room1",
      AmbientTemperature: 17.3,
      AmbientHumidity: 58.1,
      CurrentTemperature: 21.4,
      TargetTemperature: 22,
      FanSpeed: 2,
      Humidity: 44.9,
      Occupancy: true,
      PowerConsumption: 1000,
      TotalOccupantCount: 1,
      Hour: 10,
      DayOfWeek: 1,
      DayOfYear: 65,
      TotalPowerConsumption: null
    }
  );
});

test("stored calendar fields win over the timestamp", () => {
  const features = buildFeatureVector({ Timestamp: "2024-03-05T10:15:00Z", Hour: 3, DayOfWeek: 6, DayOfYear: 200 });
  assert.equal(features.Hour, 3);
  assert.equal(features.DayOfWeek, 6);
  assert.equal(features.DayOfYear, 200);
  assert.equal(features.RoomID, null);
  assert.equal(buildFeatureVector({}).Hour, null);
});
