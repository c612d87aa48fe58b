/*
|--------------------------------------------------------------------------
| Data Service
|--------------------------------------------------------------------------
| Pipeline orchestrator. Two entry points share one merge step:
|   scheduled  -> fetchAndMerge()        (re-fetch Data B, then merge)
|   on-demand  -> saveDataA() -> merge   (no fetch; merges against cached B)
|
| There is no cross-key transaction: an on-demand merge can interleave with
| a scheduled one, and whichever writes data_c last wins.
|--------------------------------------------------------------------------
*/

import type { KeyValueStore } from "../../../../engine/persistence/kv"
import { isJsonObject, type JsonObject } from "../../../../engine/persistence/schema"
import type { Logger } from "../config/logger"
import type { DataBFetcher, FetchOutcome } from "./fetcher.service"
import type { MergeEngine, MergeOutcome } from "./merge.service"

export type RefreshResult = {
  fetch: FetchOutcome
  merge: MergeOutcome
}

export class DataService {
  constructor(
    private readonly deps: {
      store: KeyValueStore
      fetcher: DataBFetcher
      merger: MergeEngine
      logger: Logger
    }
  ) {}

  /* ---------------- On-demand path ---------------- */

  async saveDataA(document: JsonObject): Promise<MergeOutcome> {
    await this.deps.store.put("data_a", document)
    this.deps.logger.info("Stored new Data A")
    return this.deps.merger.merge()
  }

  /* ---------------- Scheduled path ---------------- */

  async fetchAndMerge(): Promise<RefreshResult> {
    const fetch = await this.deps.fetcher.fetchWithRetry()
    const merge = await this.deps.merger.merge()
    this.deps.logger.info(`Refresh finished: fetch=${fetch.source}, merge=${merge.status}`)
    return { fetch, merge }
  }

  /* ---------------- Reads ---------------- */

  async getDataC(): Promise<JsonObject | undefined> {
    const dataC = await this.deps.store.get("data_c")
    return isJsonObject(dataC) ? dataC : undefined
  }
}
