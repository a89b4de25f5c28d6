import crypto from "node:crypto";
import { TelemetryRecord, TelemetrySink } from "../../types.js";
import { ConfigError, SinkError, errorMessage } from "../../utils/errors.js";
import { fetchWithTimeout, responseText } from "../../utils/fetchWithTimeout.js";

export interface EventHubConnection {
  host: string;
  keyName: string;
  key: string;
  entityPath?: string;
}

export interface EventHubSinkConfig {
  connectionString: string;
  eventHubName?: string;
  timeoutMs: number;
  tokenTtlSeconds?: number;
}

const TOKEN_REFRESH_MARGIN_SECONDS = 300;

/** Parses `Endpoint=sb://ns.servicebus.windows.net/;SharedAccessKeyName=…;SharedAccessKey=…[;EntityPath=…]`. */
export function parseConnectionString(raw: string): EventHubConnection {
  const parts = new Map<string, string>();
  for (const segment of raw.split(";")) {
    const trimmed = segment.trim();
    if (!trimmed) continue;
    const eq = trimmed.indexOf("=");
    if (eq <= 0) continue;
    parts.set(trimmed.slice(0, eq).toLowerCase(), trimmed.slice(eq + 1));
  }

  const endpoint = parts.get("endpoint");
  const keyName = parts.get("sharedaccesskeyname");
  const key = parts.get("sharedaccesskey");
  if (!endpoint || !keyName || !key) {
    throw new ConfigError("Event Hub connection string needs Endpoint, SharedAccessKeyName and SharedAccessKey");
  }

  let host: string;
  try {
    host = new URL(endpoint).host;
  } catch {
    throw new ConfigError(`Event Hub endpoint is not a URL: ${endpoint}`);
  }
  if (!host) throw new ConfigError(`Event Hub endpoint has no host: ${endpoint}`);

  return { host, keyName, key, entityPath: parts.get("entitypath") || undefined };
}

export function buildSasToken(resourceUri: string, keyName: string, key: string, expiresAtSeconds: number): string {
  const encoded = encodeURIComponent(resourceUri);
  const signature = crypto
    .createHmac("sha256", key)
    .update(`${encoded}\n${expiresAtSeconds}`, "utf8")
    .digest("base64");
  return `SharedAccessSignature sr=${encoded}&sig=${encodeURIComponent(signature)}&se=${expiresAtSeconds}&skn=${keyName}`;
}

export function createEventHubSink(cfg: EventHubSinkConfig): TelemetrySink {
  const conn = parseConnectionString(cfg.connectionString);
  const hub = cfg.eventHubName ?? conn.entityPath;
  if (!hub) {
    throw new ConfigError("EVENT_HUB_NAME is required when the connection string has no EntityPath");
  }

  const resourceUri = `https://${conn.host}/${hub}`;
  const ttl = cfg.tokenTtlSeconds ?? 3600;
  let cached: { token: string; expiresAt: number } | null = null;

  const token = () => {
    const nowSeconds = Math.floor(Date.now() / 1000);
    if (!cached || cached.expiresAt - TOKEN_REFRESH_MARGIN_SECONDS <= nowSeconds) {
      const expiresAt = nowSeconds + ttl;
      cached = { token: buildSasToken(resourceUri, conn.keyName, conn.key, expiresAt), expiresAt };
    }
    return cached.token;
  };

  return {
    name: `event_hub:${hub}`,
    async publish(record: TelemetryRecord): Promise<void> {
      let resp: Response;
      try {
        resp = await fetchWithTimeout(`${resourceUri}/messages`, {
          method: "POST",
          timeoutMs: cfg.timeoutMs,
          headers: {
            authorization: token(),
            "content-type": "application/atom+xml;type=entry;charset=utf-8"
          },
          body: JSON.stringify(record)
        });
      } catch (e) {
        throw new SinkError(`Event Hub unreachable: ${errorMessage(e)}`, { cause: e });
      }

      if (!resp.ok) {
        const text = await responseText(resp);
        throw new SinkError(`Event Hub publish failed: ${resp.status} ${resp.statusText} ${text}`.trim());
      }
    }
  };
}
