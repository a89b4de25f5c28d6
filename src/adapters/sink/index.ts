import { SimulatorConfig } from "../../config.js";
import { TelemetrySink } from "../../types.js";
import { ConfigError } from "../../utils/errors.js";
import { createEventHubSink } from "./eventHub.js";
import { createLogSink } from "./logSink.js";

export function createTelemetrySink(cfg: SimulatorConfig): TelemetrySink {
  if (cfg.TELEMETRY_SINK === "log") return createLogSink();

  if (!cfg.EVENT_HUB_CONNECTION_STRING) {
    throw new ConfigError("EVENT_HUB_CONNECTION_STRING is required for the event_hub sink");
  }
  return createEventHubSink({
    connectionString: cfg.EVENT_HUB_CONNECTION_STRING,
    eventHubName: cfg.EVENT_HUB_NAME,
    timeoutMs: cfg.HTTP_TIMEOUT_MS
  });
}
