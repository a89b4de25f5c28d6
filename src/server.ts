import express from "express";
import { BatchSummary } from "./pipeline/processEvents.js";
import { errorMessage } from "./utils/errors.js";
import { logger } from "./utils/logger.js";

export function startServer(params: {
  port: number;
  handleEvents: (events: unknown[]) => Promise<BatchSummary>;
  getLast: () => BatchSummary | null;
}) {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/healthz", (_req, res) => {
    const last = params.getLast();
    res.json({
      ok: true,
      last_batch_at: last?.processed_at ?? null,
      last_batch_received: last?.received ?? null,
      last_batch_outcomes: last?.outcomes ?? null
    });
  });

  app.post("/events", async (req, res) => {
    const body: unknown = req.body;
    const events = Array.isArray(body) ? body : [body];
    try {
      const summary = await params.handleEvents(events);
      res.json(summary);
    } catch (e) {
      logger.error({ err: e }, "Event batch failed");
      res.status(500).json({ ok: false, error: errorMessage(e) });
    }
  });

  const server = app.listen(params.port, () => {
    logger.info({ port: params.port }, "ML bridge listening");
  });

  return server;
}
