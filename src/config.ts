import { z } from "zod";
import dotenv from "dotenv";
import { ConfigError } from "./utils/errors.js";

dotenv.config();

const booleanFlag = (fallback: "true" | "false") =>
  z
    .string()
    .default(fallback)
    .transform((v) => v.trim().toLowerCase() === "true");

const SimulatorEnvSchema = z.object({
  TELEMETRY_SINK: z.enum(["event_hub", "log"]).default("event_hub"),
  EVENT_HUB_CONNECTION_STRING: z.string().optional(),
  CONNECTION_STRING: z.string().optional(),
  EVENT_HUB_NAME: z.string().optional(),

  UNIT_ID: z.string().min(1).default("001"),
  SIM_DURATION_MINUTES: z.coerce.number().int().positive().optional(),
  TICK_INTERVAL_SECONDS: z.coerce.number().positive().default(60),
  ERROR_BACKOFF_SECONDS: z.coerce.number().nonnegative().default(5),
  SIM_TIME_SCALE: z.coerce.number().positive().default(1),
  SIM_SEED: z.coerce.number().int().optional(),
  TIMESTAMP_UTC_OFFSET_MINUTES: z.coerce.number().int().min(-720).max(840).default(-420),

  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000)
});

const PipelineEnvSchema = z.object({
  ADT_SERVICE_URL: z.string().url(),
  ADT_ACCESS_TOKEN: z.string().min(1),
  ADT_API_VERSION: z.string().default("2023-10-31"),

  HVAC_ENDPOINT_URL: z.string().url(),
  HVAC_ENDPOINT_KEY: z.string().min(1),
  INFERENCE_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),

  MONGODB_URI: z.string().optional(),
  MONGO_URL: z.string().optional(),
  MONGODB_DB_NAME: z.string().default("hvac_telemetry"),
  FEATURE_COLLECTION: z.string().min(1).default("ml_features"),
  INFERRED_COLLECTION: z.string().min(1).optional(),
  CAPTURE_FEATURES: booleanFlag("true"),

  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  PORT: z.coerce.number().int().positive().default(3000)
});

export type SimulatorConfig = Omit<z.infer<typeof SimulatorEnvSchema>, "CONNECTION_STRING">;
export type PipelineConfig = Omit<z.infer<typeof PipelineEnvSchema>, "MONGO_URL"> & { MONGODB_URI: string };

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

export function loadSimulatorConfig(env: NodeJS.ProcessEnv = process.env): SimulatorConfig {
  const parsed = SimulatorEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid simulator configuration: ${describeIssues(parsed.error)}`);
  }
  const { CONNECTION_STRING, ...rest } = parsed.data;
  const connectionString = rest.EVENT_HUB_CONNECTION_STRING ?? CONNECTION_STRING;

  if (rest.TELEMETRY_SINK === "event_hub" && !connectionString) {
    throw new ConfigError("EVENT_HUB_CONNECTION_STRING (or CONNECTION_STRING) is required when TELEMETRY_SINK=event_hub");
  }
  return { ...rest, EVENT_HUB_CONNECTION_STRING: connectionString };
}

export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsed = PipelineEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ML bridge configuration: ${describeIssues(parsed.error)}`);
  }
  const { MONGO_URL, ...rest } = parsed.data;
  const uri = rest.MONGODB_URI ?? MONGO_URL;
  if (!uri) {
    throw new ConfigError("MONGODB_URI (or MONGO_URL) is required");
  }
  return { ...rest, MONGODB_URI: uri };
}
