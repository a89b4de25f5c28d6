import { z } from "zod";
import { FeatureVector } from "./features.js";

export const FALLBACK_ACTION = "N/A";

/** One scored row; the endpoint may add label probabilities and extra predictions. */
export type InferenceResult = Record<string, unknown> & { ControlAction: string };

export interface InferenceClient {
  /** Rejects with InferenceError when the endpoint cannot produce a result. */
  predict(features: FeatureVector, fallbackAction: string): Promise<InferenceResult>;
}

const ScoredRowSchema = z.record(z.string(), z.unknown());

const ScoreResponseSchema = z
  .object({
    Results: z.unknown().optional(),
    results: z.unknown().optional()
  })
  .passthrough();

function withAction(row: Record<string, unknown>, fallbackAction: string): InferenceResult {
  const action = row.ControlAction;
  return { ...row, ControlAction: typeof action === "string" && action !== "" ? action : fallbackAction };
}

export function buildScoreRequest(features: FeatureVector) {
  return { Inputs: { input1: [features] }, GlobalParameters: {} };
}

/**
 * Reads a scoring response: the first entry of `Results`/`results` when that is
 * a non-empty list, otherwise the body itself.
 */
export function parseScoreResponse(body: unknown, fallbackAction: string): InferenceResult {
  const parsed = ScoreResponseSchema.safeParse(body);
  if (!parsed.success) return { ControlAction: fallbackAction };

  const results = parsed.data.Results ?? parsed.data.results;
  if (Array.isArray(results) && results.length > 0) {
    const first = ScoredRowSchema.safeParse(results[0]);
    return first.success ? withAction(first.data, fallbackAction) : { ControlAction: fallbackAction };
  }
  return withAction(parsed.data, fallbackAction);
}
