import { FeatureVector } from "../../pipeline/features.js";
import { InferenceClient, InferenceResult, buildScoreRequest, parseScoreResponse } from "../../pipeline/inference.js";
import { InferenceError, errorMessage } from "../../utils/errors.js";
import { fetchWithTimeout, responseText } from "../../utils/fetchWithTimeout.js";

export interface MlEndpointConfig {
  url: string;
  key: string;
  timeoutMs: number;
}

export function createMlEndpointClient(cfg: MlEndpointConfig): InferenceClient {
  return {
    async predict(features: FeatureVector, fallbackAction: string): Promise<InferenceResult> {
      let resp: Response;
      try {
        resp = await fetchWithTimeout(cfg.url, {
          method: "POST",
          timeoutMs: cfg.timeoutMs,
          headers: {
            "content-type": "application/json",
            authorization: `Bearer ${cfg.key}`
          },
          body: JSON.stringify(buildScoreRequest(features))
        });
      } catch (e) {
        throw new InferenceError(`ML endpoint unreachable: ${errorMessage(e)}`, { cause: e });
      }

      if (!resp.ok) {
        const body = await responseText(resp);
        throw new InferenceError(`ML inference failed: ${resp.status} ${resp.statusText}`, {
          status: resp.status,
          body
        });
      }

      let json: unknown;
      try {
        json = await resp.json();
      } catch (e) {
        throw new InferenceError(`ML endpoint returned invalid JSON: ${errorMessage(e)}`, { cause: e });
      }
      return parseScoreResponse(json, fallbackAction);
    }
  };
}
