import { loadSimulatorConfig } from "./config.js";
import { createTelemetrySink } from "./adapters/sink/index.js";
import { ApartmentSimulator } from "./simulator/apartmentSimulator.js";
import { runSimulation } from "./simulator/loop.js";
import { mathRandom, seededRandom } from "./simulator/random.js";
import { ROOM_IDS } from "./types.js";
import { logger } from "./utils/logger.js";
import { promptDurationMinutes } from "./utils/prompt.js";

async function main(): Promise<void> {
  // Configuration problems surface here, before anything is published.
  const cfg = loadSimulatorConfig();
  const sink = createTelemetrySink(cfg);

  const durationMinutes = cfg.SIM_DURATION_MINUTES ?? (await promptDurationMinutes());

  const simulator = new ApartmentSimulator({
    unitId: cfg.UNIT_ID,
    sink,
    random: cfg.SIM_SEED !== undefined ? seededRandom(cfg.SIM_SEED) : mathRandom,
    utcOffsetMinutes: cfg.TIMESTAMP_UTC_OFFSET_MINUTES
  });

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.warn({ signal }, "Stop requested; finishing current tick");
    controller.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  logger.info(
    { unit_id: simulator.unitId, rooms: ROOM_IDS, sink: sink.name, duration_minutes: durationMinutes },
    "Apartment HVAC simulation configured"
  );

  const outcome = await runSimulation(simulator, {
    durationMinutes,
    tickIntervalMs: cfg.TICK_INTERVAL_SECONDS * 1000,
    errorBackoffMs: cfg.ERROR_BACKOFF_SECONDS * 1000,
    timeScale: cfg.SIM_TIME_SCALE,
    signal: controller.signal
  });

  await sink.close?.();

  const summary = {
    ticks: outcome.ticks,
    tick_errors: outcome.tickErrors,
    failed_emissions: outcome.failedEmissions
  };
  if (outcome.status === "stopped") {
    logger.info(summary, "Simulation stopped by operator");
  } else {
    logger.info(summary, "Simulation completed successfully");
  }
}

main().catch((err) => {
  logger.fatal({ err }, "Simulator failed to start");
  process.exitCode = 1;
});
