import { createInterface } from "node:readline/promises";

export const DEFAULT_DURATION_MINUTES = 5;

/** Blank, non-integer and non-positive answers fall back to the default. */
export function parseDurationMinutes(raw: string, fallback = DEFAULT_DURATION_MINUTES): number {
  const trimmed = raw.trim();
  if (!/^\+?\d+$/.test(trimmed)) return fallback;
  const minutes = Number(trimmed);
  return minutes > 0 ? minutes : fallback;
}

export async function promptDurationMinutes(fallback = DEFAULT_DURATION_MINUTES): Promise<number> {
  if (!process.stdin.isTTY) return fallback;

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`Enter simulation duration in minutes (default ${fallback}): `);
    return parseDurationMinutes(answer, fallback);
  } finally {
    rl.close();
  }
}
