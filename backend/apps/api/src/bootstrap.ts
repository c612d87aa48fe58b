/*
|--------------------------------------------------------------------------
| Pipeline Composition
|--------------------------------------------------------------------------
| Wires store -> fetcher -> merge engine -> data service from one AppConfig.
| Tests pass their own store/http/sleep through `overrides`.
|--------------------------------------------------------------------------
*/

import { openStore, type KeyValueStore } from "../../../engine/persistence/kv"
import type { AppConfig } from "./config/env"
import type { Logger } from "./config/logger"
import { createAxiosGetter, type HttpGetter } from "./connectors/source/dataB.connector"
import { DataService } from "./services/data.service"
import { DataBFetcher } from "./services/fetcher.service"
import { MergeEngine } from "./services/merge.service"

export type PipelineConfig = Pick<
  AppConfig,
  "databaseUrl" | "dataBUrl" | "maxRetries" | "retryDelaySeconds" | "fetchTimeoutSeconds"
>

export type Pipeline = {
  store: KeyValueStore
  fetcher: DataBFetcher
  merger: MergeEngine
  service: DataService
}

export function createPipeline(
  config: PipelineConfig,
  logger: Logger,
  overrides: {
    store?: KeyValueStore
    http?: HttpGetter
    sleep?: (ms: number) => Promise<void>
  } = {}
): Pipeline {
  const store = overrides.store ?? openStore(config.databaseUrl)
  const fetcher = new DataBFetcher({
    store,
    http: overrides.http ?? createAxiosGetter(),
    logger,
    url: config.dataBUrl,
    maxRetries: config.maxRetries,
    retryDelaySeconds: config.retryDelaySeconds,
    timeoutMs: config.fetchTimeoutSeconds * 1000,
    sleep: overrides.sleep,
  })
  const merger = new MergeEngine(store, logger)
  const service = new DataService({ store, fetcher, merger, logger })

  return { store, fetcher, merger, service }
}
