type FetchOptions = NonNullable<Parameters<typeof fetch>[1]>;

export type TimedFetchOptions = FetchOptions & { timeoutMs?: number };

export async function fetchWithTimeout(url: string, opts: TimedFetchOptions = {}): Promise<Response> {
  const { timeoutMs = 10_000, signal, ...rest } = opts;

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new Error(`timeout after ${timeoutMs}ms`)), timeoutMs);

  try {
    return await fetch(url, { ...rest, signal: signal ?? controller.signal });
  } finally {
    clearTimeout(timeout);
  }
}

/** Body of a failed response for error messages; empty when it cannot be read. */
export async function responseText(resp: Response): Promise<string> {
  return resp.text().catch(() => "");
}
