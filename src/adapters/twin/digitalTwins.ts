import { JsonPatchOperation, TwinUpdater } from "../../pipeline/twinPatch.js";
import { fetchWithTimeout, responseText } from "../../utils/fetchWithTimeout.js";

export interface DigitalTwinsConfig {
  serviceUrl: string;
  accessToken: string;
  apiVersion: string;
  timeoutMs: number;
}

export function twinUrl(cfg: Pick<DigitalTwinsConfig, "serviceUrl" | "apiVersion">, twinId: string): string {
  const url = new URL(`/digitaltwins/${encodeURIComponent(twinId)}`, cfg.serviceUrl);
  url.searchParams.set("api-version", cfg.apiVersion);
  return url.toString();
}

export function createDigitalTwinsUpdater(cfg: DigitalTwinsConfig): TwinUpdater {
  return {
    async updateTwin(twinId: string, patch: JsonPatchOperation[]): Promise<void> {
      const resp = await fetchWithTimeout(twinUrl(cfg, twinId), {
        method: "PATCH",
        timeoutMs: cfg.timeoutMs,
        headers: {
          "content-type": "application/json-patch+json",
          authorization: `Bearer ${cfg.accessToken}`
        },
        body: JSON.stringify(patch)
      });

      if (!resp.ok) {
        const text = await responseText(resp);
        throw new Error(`Digital twin update failed for ${twinId}: ${resp.status} ${resp.statusText} ${text}`.trim());
      }
    }
  };
}
