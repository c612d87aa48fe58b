// unit/fetcher.spec.ts
// Retry state machine: early success, exhaustion fallback, failure kinds.

import { describe, it } from "node:test"
import assert from "node:assert/strict"
import { DataBFetcher } from "../../apps/api/src/services/fetcher.service"
import type { KeyValueStore } from "../../engine/persistence/kv"
import { StorageError } from "../../engine/errors"
import { logger, memoryStore, ok, recordingSleep, scriptedGetter, type Step } from "../helpers"

const URL_B = "http://data-b.test/menu"

function setup(steps: Step[], store: KeyValueStore = memoryStore()) {
  const http = scriptedGetter(steps)
  const sleep = recordingSleep()
  const fetcher = new DataBFetcher({
    store,
    http,
    logger,
    url: URL_B,
    maxRetries: 3,
    retryDelaySeconds: 2,
    timeoutMs: 1_000,
    sleep,
  })
  return { fetcher, http, sleep, store }
}

describe("DataBFetcher.fetchWithRetry", () => {
  it("falls back to the cached Data B after maxRetries failed attempts", async () => {
    const { fetcher, http, sleep, store } = setup([new Error("connect ECONNREFUSED")])
    await store.put("data_b", { cached: true })

    const outcome = await fetcher.fetchWithRetry(3, 2)

    assert.deepEqual(outcome, { source: "cache", document: { cached: true }, attempts: 3 })
    assert.equal(http.calls.length, 3)
    assert.deepEqual(sleep.waits, [2000, 2000])
    assert.deepEqual(await store.get("data_b"), { cached: true })
  })

  it("returns and persists the document once a retry succeeds", async () => {
    const { fetcher, http, sleep, store } = setup([new Error("socket hang up"), ok({ v: 1 })])

    const outcome = await fetcher.fetchWithRetry()

    assert.deepEqual(outcome, { source: "remote", document: { v: 1 }, attempts: 2 })
    assert.equal(http.calls.length, 2)
    assert.deepEqual(sleep.waits, [2000])
    assert.deepEqual(await store.get("data_b"), { v: 1 })
  })

  it("reports no data when every attempt fails and nothing is cached", async () => {
    const { fetcher, store } = setup([{ status: 503, body: "unavailable" }])

    const outcome = await fetcher.fetchWithRetry()

    assert.deepEqual(outcome, { source: "none", attempts: 3 })
    assert.equal(await store.get("data_b"), undefined)
  })

  it("treats non-2xx, unparseable and non-object bodies as failed attempts", async () => {
    const { fetcher, http, store } = setup([
      { status: 500, body: JSON.stringify({ v: "ignored" }) },
      { status: 200, body: "<html>oops</html>" },
      { status: 200, body: "[1, 2, 3]" },
      ok({ v: 4 }),
    ])

    const outcome = await fetcher.fetchWithRetry(4, 0)

    assert.deepEqual(outcome, { source: "remote", document: { v: 4 }, attempts: 4 })
    assert.equal(http.calls.length, 4)
    assert.deepEqual(await store.get("data_b"), { v: 4 })
  })

  it("makes a single attempt and no wait when maxRetries is 1", async () => {
    const { fetcher, http, sleep } = setup([new Error("timeout of 1000ms exceeded")])

    const outcome = await fetcher.fetchWithRetry(1, 5)

    assert.deepEqual(outcome, { source: "none", attempts: 1 })
    assert.equal(http.calls.length, 1)
    assert.deepEqual(sleep.waits, [])
  })

  it("requests the configured URL", async () => {
    const { fetcher, http } = setup([ok({ v: 1 })])
    await fetcher.fetchWithRetry()
    assert.deepEqual(http.calls, [URL_B])
  })

  it("propagates a store failure instead of retrying it", async () => {
    const failingStore: KeyValueStore = {
      put: async () => {
        throw new StorageError("disk I/O error")
      },
      get: async () => undefined,
      close: () => undefined,
    }
    const { fetcher, http, sleep } = setup([ok({ v: 1 })], failingStore)

    await assert.rejects(fetcher.fetchWithRetry(), StorageError)
    assert.equal(http.calls.length, 1)
    assert.deepEqual(sleep.waits, [])
  })
})
