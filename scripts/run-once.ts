import { createLogSink } from "../src/adapters/sink/logSink.js";
import { ApartmentSimulator } from "../src/simulator/apartmentSimulator.js";
import { mathRandom, seededRandom } from "../src/simulator/random.js";
import { logger } from "../src/utils/logger.js";

const seed = process.env.SIM_SEED ? Number(process.env.SIM_SEED) : undefined;

const simulator = new ApartmentSimulator({
  unitId: process.env.UNIT_ID ?? "001",
  sink: createLogSink(),
  random: seed !== undefined && Number.isInteger(seed) ? seededRandom(seed) : mathRandom
});

const result = await simulator.tick(Date.now());
if (result) {
  logger.info({ apartment: result.apartment, rooms: result.rooms }, "Ran one tick");
}
