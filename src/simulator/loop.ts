import { setTimeout as delay } from "node:timers/promises";
import { TickResult } from "../types.js";
import { isAbortError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface Tickable {
  readonly startMs: number;
  tick(nowMs: number): Promise<TickResult | null>;
}

export interface RunOptions {
  durationMinutes: number;
  tickIntervalMs: number;
  errorBackoffMs: number;
  /** Simulated seconds per wall-clock second. */
  timeScale?: number;
  signal?: AbortSignal;
  now?: () => number;
  sleep?: Sleep;
}

export interface RunOutcome {
  status: "completed" | "stopped";
  ticks: number;
  tickErrors: number;
  failedEmissions: number;
}

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export async function runSimulation(simulator: Tickable, opts: RunOptions): Promise<RunOutcome> {
  const now = opts.now ?? Date.now;
  const sleep = opts.sleep ?? defaultSleep;
  const timeScale = opts.timeScale ?? 1;
  const wallStart = now();
  const wallEnd = wallStart + opts.durationMinutes * 60_000;
  const simulatedNow = (wall: number) => simulator.startMs + (wall - wallStart) * timeScale;

  const outcome: RunOutcome = { status: "completed", ticks: 0, tickErrors: 0, failedEmissions: 0 };

  logger.info(
    { duration_minutes: opts.durationMinutes, tick_interval_ms: opts.tickIntervalMs, time_scale: timeScale },
    "Starting HVAC simulation"
  );

  while (now() < wallEnd) {
    if (opts.signal?.aborted) {
      outcome.status = "stopped";
      break;
    }

    try {
      const result = await simulator.tick(simulatedNow(now()));
      if (result) {
        outcome.ticks += 1;
        outcome.failedEmissions += result.failedEmissions;
      }
      await sleep(opts.tickIntervalMs, opts.signal);
    } catch (e) {
      if (isAbortError(e)) {
        outcome.status = "stopped";
        break;
      }
      outcome.tickErrors += 1;
      logger.error({ err: e }, "Simulation error; backing off");
      try {
        await sleep(opts.errorBackoffMs, opts.signal);
      } catch (backoffErr) {
        if (!isAbortError(backoffErr)) throw backoffErr;
        outcome.status = "stopped";
        break;
      }
    }
  }

  if (opts.signal?.aborted) outcome.status = "stopped";
  return outcome;
}
