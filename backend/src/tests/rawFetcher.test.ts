import test from "node:test";
import assert from "node:assert/strict";
import { RawFetcher, createRawFetcher, trimPartialLine } from "../ingest/rawFetcher";
import { loadConfig } from "../config";
import { BLOB_PATHS, CONTAINERS } from "../models/tables";
import { MemoryObjectStore } from "../storage/memoryStore";
import { TransportError } from "../utils/errors";
import "./helpers";

const SOURCE_URL = "https://example.test/rows.csv";

const stubFetch = (result: Response | Error): typeof fetch => async () => {
  if (result instanceof Error) throw result;
  return result;
};

const createFetcher = (result: Response | Error, byteBudget: number, store = new MemoryObjectStore()) => ({
  store,
  fetcher: new RawFetcher({ sourceUrl: SOURCE_URL, byteBudget, store, fetchImpl: stubFetch(result) }),
});

const readBronze = async (store: MemoryObjectStore) =>
  (await store.get(CONTAINERS.bronze, BLOB_PATHS.raw)).toString("utf-8");

test("fetchToBronze persists a body smaller than the budget unchanged", async () => {
  const { store, fetcher } = createFetcher(new Response("a,b\n1,2\n"), 1024);
  const summary = await fetcher.fetchToBronze();
  assert.deepEqual(summary, { bytes: 8, truncated: false });
  assert.equal(await readBronze(store), "a,b\n1,2\n");
});

test("fetchToBronze persists an empty body", async () => {
  const { store, fetcher } = createFetcher(new Response(""), 1024);
  const summary = await fetcher.fetchToBronze();
  assert.deepEqual(summary, { bytes: 0, truncated: false });
  assert.equal(store.has(CONTAINERS.bronze, BLOB_PATHS.raw), true);
});

test("a body exactly the size of the budget is not treated as truncated", async () => {
  const { store, fetcher } = createFetcher(new Response("abcd\n"), 5);
  const summary = await fetcher.fetchToBronze();
  assert.deepEqual(summary, { bytes: 5, truncated: false });
  assert.equal(await readBronze(store), "abcd\n");
});

test("fetchToBronze stops at the byte budget and keeps whole lines", async () => {
  const { store, fetcher } = createFetcher(new Response("h1,h2\nrow1,aa\nrow2,bb\n"), 16);
  const summary = await fetcher.fetchToBronze();
  assert.deepEqual(summary, { bytes: 14, truncated: true });
  assert.equal(await readBronze(store), "h1,h2\nrow1,aa\n");
});

test("the stream is cancelled once the budget is filled", async () => {
  const encoder = new TextEncoder();
  let pulls = 0;
  let cancelled = false;
  const endless = new ReadableStream<Uint8Array>({
    pull(controller) {
      pulls += 1;
      controller.enqueue(encoder.encode("x,y\n"));
    },
    cancel() {
      cancelled = true;
    },
  });
  const { store, fetcher } = createFetcher(new Response(endless), 10);
  const summary = await fetcher.fetchToBronze();
  assert.deepEqual(summary, { bytes: 8, truncated: true });
  assert.equal(await readBronze(store), "x,y\nx,y\n");
  assert.equal(cancelled, true);
  assert.ok(pulls >= 3);
});

test("trimPartialLine leaves a buffer without newlines alone", () => {
  assert.equal(trimPartialLine(Buffer.from("no-newline")).toString(), "no-newline");
  assert.equal(trimPartialLine(Buffer.from("a\nb")).toString(), "a\n");
});

test("a non-success status aborts without touching bronze", async () => {
  const store = new MemoryObjectStore();
  await store.put(CONTAINERS.bronze, BLOB_PATHS.raw, Buffer.from("previous snapshot"));
  const { fetcher } = createFetcher(
    new Response("unavailable", { status: 503, statusText: "Service Unavailable" }),
    1024,
    store,
  );
  await assert.rejects(
    fetcher.fetchToBronze(),
    (error: unknown) => error instanceof TransportError && error.status === 503,
  );
  assert.equal(await readBronze(store), "previous snapshot");
});

test("a network failure surfaces as a transport error", async () => {
  const { store, fetcher } = createFetcher(new TypeError("fetch failed"), 1024);
  await assert.rejects(
    fetcher.fetchToBronze(),
    (error: unknown) => error instanceof TransportError && error.message === "Ridership source request failed: fetch failed",
  );
  assert.equal(store.has(CONTAINERS.bronze, BLOB_PATHS.raw), false);
});

test("a new fetch replaces the previous bronze snapshot", async () => {
  const store = new MemoryObjectStore();
  await store.put(CONTAINERS.bronze, BLOB_PATHS.raw, Buffer.from("old,data\n1,2\n3,4\n"));
  const { fetcher } = createFetcher(new Response("new\n"), 1024, store);
  await fetcher.fetchToBronze();
  assert.equal(await readBronze(store), "new\n");
});

test("fetch returns the sample without writing it", async () => {
  const store = new MemoryObjectStore();
  const config = { ...loadConfig({ AZURE_STORAGE_ACCOUNT_NAME: "teststorage" }), fetchByteBudget: 6 };
  const fetcher = createRawFetcher(config, store, stubFetch(new Response("a,b\n1,2\n")));
  const data = await fetcher.fetch();
  assert.equal(data.toString("utf-8"), "a,b\n");
  assert.deepEqual(store.getWriteLog(), []);
});
