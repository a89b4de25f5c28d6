import assert from "node:assert/strict";
import { once } from "node:events";
import { test } from "node:test";
import { emptyOutcomes, BatchSummary } from "./pipeline/processEvents.js";
import { startServer } from "./server.js";

async function listen(handleEvents: (events: unknown[]) => Promise<BatchSummary>) {
  let last: BatchSummary | null = null;
  const server = startServer({
    port: 0,
    handleEvents: async (events) => {
      last = await handleEvents(events);
      return last;
    },
    getLast: () => last
  });
  await once(server, "listening");
  const address = server.address();
  assert.ok(address && typeof address === "object");
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

function summaryFor(events: unknown[]): BatchSummary {
  return { received: events.length, outcomes: emptyOutcomes(), processed_at: "2024-03-05T18:00:00.000Z" };
}

test("POST /events hands the batch over and GET /healthz reports it", async (t) => {
  const batches: unknown[][] = [];
  const { server, baseUrl } = await listen(async (events) => {
    batches.push(events);
    return summaryFor(events);
  });
  t.after(() => server.close());

  const before = await (await fetch(`${baseUrl}/healthz`)).json();
  assert.deepEqual(before, { ok: true, last_batch_at: null, last_batch_received: null, last_batch_outcomes: null });

  const resp = await fetch(`${baseUrl}/events`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify([{ RoomID: "room1" }, { RoomID: "room2" }])
  });
  assert.equal(resp.status, 200);
  assert.deepEqual(await resp.json(), summaryFor([{ RoomID: "room1" }, { RoomID: "room2" }]));

  await fetch(`${baseUrl}/events`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify({ RoomID: "room3" })
  });
  assert.deepEqual(batches, [[{ RoomID: "room1" }, { RoomID: "room2" }], [{ RoomID: "room3" }]]);

  const after = await (await fetch(`${baseUrl}/healthz`)).json();
  assert.deepEqual(after, {
    ok: true,
    last_batch_at: "2024-03-05T18:00:00.000Z",
    last_batch_received: 1,
    last_batch_outcomes: emptyOutcomes()
  });
});

test("a failing batch answers 500 with the error message", async (t) => {
  const { server, baseUrl } = await listen(async () => {
    throw new Error("store offline");
  });
  t.after(() => server.close());

  const resp = await fetch(`${baseUrl}/events`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: "[]"
  });
  assert.equal(resp.status, 500);
  assert.deepEqual(await resp.json(), { ok: false, error: "store offline" });
});
