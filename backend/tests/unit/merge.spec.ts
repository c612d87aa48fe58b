// unit/merge.spec.ts

import { describe, it } from "node:test"
import assert from "node:assert/strict"
import { MergeEngine, mergeDocuments } from "../../apps/api/src/services/merge.service"
import { logger, memoryStore } from "../helpers"

describe("mergeDocuments", () => {
  it("takes B's value on key collision and keeps A-only keys", () => {
    assert.deepEqual(mergeDocuments({ x: 1, y: 2 }, { y: 9, z: 3 }), { x: 1, y: 9, z: 3 })
  })

  it("replaces nested objects wholesale instead of merging them", () => {
    const a = { vatRates: { normal: { ratePct: 19 }, reduced: { ratePct: 7 } }, keep: [1, 2] }
    const b = { vatRates: { normal: { ratePct: 20 } } }
    assert.deepEqual(mergeDocuments(a, b), { vatRates: { normal: { ratePct: 20 } }, keep: [1, 2] })
  })

  it("does not mutate its inputs", () => {
    const a = { x: 1 }
    const b = { x: 2 }
    mergeDocuments(a, b)
    assert.deepEqual(a, { x: 1 })
    assert.deepEqual(b, { x: 2 })
  })
})

describe("MergeEngine", () => {
  it("writes the union of Data A and Data B to data_c", async () => {
    const store = memoryStore()
    await store.put("data_a", { x: 1, y: 2 })
    await store.put("data_b", { y: 9, z: 3 })

    const outcome = await new MergeEngine(store, logger).merge()

    assert.deepEqual(outcome, { status: "merged", document: { x: 1, y: 9, z: 3 } })
    assert.deepEqual(await store.get("data_c"), { x: 1, y: 9, z: 3 })
  })

  it("leaves data_c absent when Data B has never been fetched", async () => {
    const store = memoryStore()
    await store.put("data_a", { x: 1 })

    const outcome = await new MergeEngine(store, logger).merge()

    assert.deepEqual(outcome, { status: "skipped", missing: ["data_b"] })
    assert.equal(await store.get("data_c"), undefined)
  })

  it("leaves a stale data_c untouched when Data A is missing", async () => {
    const store = memoryStore()
    await store.put("data_b", { fresh: true })
    await store.put("data_c", { stale: true })

    const outcome = await new MergeEngine(store, logger).merge()

    assert.deepEqual(outcome, { status: "skipped", missing: ["data_a"] })
    assert.deepEqual(await store.get("data_c"), { stale: true })
  })

  it("reports both sides when neither is stored", async () => {
    const outcome = await new MergeEngine(memoryStore(), logger).merge()
    assert.deepEqual(outcome, { status: "skipped", missing: ["data_a", "data_b"] })
  })

  it("produces the same data_c when re-run on unchanged inputs", async () => {
    const store = memoryStore()
    await store.put("data_a", { menus: [], vatRates: {} })
    await store.put("data_b", { lastUpdate: "2024-05-01T10:00:00Z" })
    const engine = new MergeEngine(store, logger)

    await engine.merge()
    const first = await store.get("data_c")
    await engine.merge()

    assert.deepEqual(await store.get("data_c"), first)
    assert.deepEqual(first, { menus: [], vatRates: {}, lastUpdate: "2024-05-01T10:00:00Z" })
  })
})
