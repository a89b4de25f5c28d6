import { loadPipelineConfig } from "./config.js";
import { startServer } from "./server.js";
import { logger } from "./utils/logger.js";
import { createMlEndpointClient } from "./adapters/inference/mlEndpoint.js";
import { createDigitalTwinsUpdater } from "./adapters/twin/digitalTwins.js";
import {
  closeMongo,
  createMongoFeatureStore,
  createMongoInferredSink,
  initMongo,
  insertFeatureRows
} from "./adapters/store/mongoStore.js";
import { BatchSummary, PipelineDeps, processEventBatch, sensorRecordsIn } from "./pipeline/processEvents.js";

async function main(): Promise<void> {
  const cfg = loadPipelineConfig();

  const store = await initMongo({
    uri: cfg.MONGODB_URI,
    dbName: cfg.MONGODB_DB_NAME,
    featureCollectionName: cfg.FEATURE_COLLECTION,
    inferredCollectionName: cfg.INFERRED_COLLECTION
  });

  const deps: PipelineDeps = {
    features: createMongoFeatureStore(store),
    inference: createMlEndpointClient({
      url: cfg.HVAC_ENDPOINT_URL,
      key: cfg.HVAC_ENDPOINT_KEY,
      timeoutMs: cfg.INFERENCE_TIMEOUT_MS
    }),
    twins: createDigitalTwinsUpdater({
      serviceUrl: cfg.ADT_SERVICE_URL,
      accessToken: cfg.ADT_ACCESS_TOKEN,
      apiVersion: cfg.ADT_API_VERSION,
      timeoutMs: cfg.HTTP_TIMEOUT_MS
    }),
    inferredSink: createMongoInferredSink(store)
  };
  if (!deps.inferredSink) {
    logger.warn("Inferred rows will not be stored (INFERRED_COLLECTION not set)");
  }

  let last: BatchSummary | null = null;

  const handleEvents = async (events: unknown[]): Promise<BatchSummary> => {
    const summary = await processEventBatch(events, deps);
    if (cfg.CAPTURE_FEATURES) {
      try {
        const inserted = await insertFeatureRows(store, sensorRecordsIn(events));
        logger.debug({ inserted }, "Captured feature rows");
      } catch (e) {
        logger.error({ err: e }, "Failed to capture feature rows");
      }
    }
    last = summary;
    logger.info({ received: summary.received, outcomes: summary.outcomes }, "Event batch processed");
    return summary;
  };

  const server = startServer({ port: cfg.PORT, handleEvents, getLast: () => last });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Shutting down ML bridge");
    server.close(() => {
      closeMongo().catch((err) => logger.error({ err }, "Failed to close MongoDB client"));
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  logger.fatal({ err }, "ML bridge failed to start");
  process.exitCode = 1;
});
