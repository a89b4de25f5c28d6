import pino from "pino";

const redactionPaths = [
  "*.headers.authorization",
  "*.authorization",
  "*.connectionString",
  "*.sharedAccessKey",
  "*.access_token",
  "*.accessToken",
  "*.apiKey",
  "*.EVENT_HUB_CONNECTION_STRING",
  "*.CONNECTION_STRING",
  "*.HVAC_ENDPOINT_KEY",
  "*.ADT_ACCESS_TOKEN",
  "*.MONGODB_URI"
];

const env = process.env.NODE_ENV;

const pretty =
  env !== "production" && env !== "test"
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname"
        }
      }
    : undefined;

export const logger = pino({
  level: process.env.LOG_LEVEL ?? (env === "test" ? "silent" : "info"),
  redact: { paths: redactionPaths, censor: "[REDACTED]" },
  ...(pretty ? { transport: pretty } : {})
});
