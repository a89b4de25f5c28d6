import { TelemetryRecord, TelemetrySink } from "../../types.js";
import { logger } from "../../utils/logger.js";

/** Dry-run sink: records only go to the log. */
export function createLogSink(): TelemetrySink {
  return {
    name: "log",
    async publish(record: TelemetryRecord): Promise<void> {
      logger.debug({ record }, "Telemetry record (dry run)");
    }
  };
}
