import { ClockReading } from "../types.js";
import { SECONDS_PER_HOUR, MS_PER_SECOND } from "../utils/time.js";

export function readClock(startMs: number, nowMs: number): ClockReading {
  const hoursElapsed = (nowMs - startMs) / MS_PER_SECOND / SECONDS_PER_HOUR;
  const hourOfDay = Math.floor(hoursElapsed) % 24;
  const dayOfSimulation = Math.floor(hoursElapsed / 24);
  return {
    hoursElapsed,
    hourOfDay,
    dayOfSimulation,
    isWeekend: dayOfSimulation % 7 >= 5
  };
}

/** 0 at 06:00 and 18:00, +1 at noon, -1 at midnight. */
export function timeFactor(hourOfDay: number): number {
  return Math.sin((2 * Math.PI * (hourOfDay - 6)) / 24);
}

export function secondsToMs(seconds: number): number {
  return seconds * MS_PER_SECOND;
}
