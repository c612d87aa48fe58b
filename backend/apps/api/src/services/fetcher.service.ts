/*
|--------------------------------------------------------------------------
| Data B Fetcher
|--------------------------------------------------------------------------
| Idle -> Attempting -> { Success | RetryWait -> Attempting | Fallback }
|
| Transient failures (network, non-2xx, unparseable body) are retried with
| a fixed delay; once maxRetries attempts have failed, the last cached
| Data B is returned instead. Store failures are not retried.
|--------------------------------------------------------------------------
*/

import { FetchError, errToString } from "../../../../engine/errors"
import type { KeyValueStore } from "../../../../engine/persistence/kv"
import { isJsonObject, toJson, type Json, type JsonObject } from "../../../../engine/persistence/schema"
import { retry, sleep as defaultSleep } from "../../../../data/common/retry"
import type { HttpGetter, RawResponse } from "../connectors/source/dataB.connector"
import type { Logger } from "../config/logger"

export type FetchOutcome =
  | { source: "remote"; document: JsonObject; attempts: number }
  | { source: "cache"; document: Json; attempts: number }
  | { source: "none"; attempts: number }

export type FetcherOptions = {
  store: KeyValueStore
  http: HttpGetter
  logger: Logger
  url: string
  maxRetries: number
  retryDelaySeconds: number
  timeoutMs: number
  sleep?: (ms: number) => Promise<void>
}

export class DataBFetcher {
  private readonly store: KeyValueStore
  private readonly http: HttpGetter
  private readonly logger: Logger
  private readonly url: string
  private readonly maxRetries: number
  private readonly retryDelaySeconds: number
  private readonly timeoutMs: number
  private readonly sleep: (ms: number) => Promise<void>

  constructor(opts: FetcherOptions) {
    this.store = opts.store
    this.http = opts.http
    this.logger = opts.logger
    this.url = opts.url
    this.maxRetries = opts.maxRetries
    this.retryDelaySeconds = opts.retryDelaySeconds
    this.timeoutMs = opts.timeoutMs
    this.sleep = opts.sleep ?? defaultSleep
  }

  async fetchWithRetry(
    maxRetries = this.maxRetries,
    retryDelaySeconds = this.retryDelaySeconds
  ): Promise<FetchOutcome> {
    this.logger.debug(`Fetching Data B from ${this.url}`)
    let attempts = 0

    try {
      const document = await retry(
        async attempt => {
          attempts = attempt
          const doc = await this.requestOnce()
          await this.store.put("data_b", doc)
          return doc
        },
        {
          attempts: maxRetries,
          delayMs: retryDelaySeconds * 1000,
          shouldRetry: err => err instanceof FetchError,
          onRetry: (err, attempt) => {
            this.logger.warn(
              `Attempt ${attempt} failed to fetch Data B: ${errToString(err)}. Retrying in ${retryDelaySeconds}s`
            )
          },
          sleep: this.sleep,
        }
      )
      this.logger.info(`Fetched Data B on attempt ${attempts}`)
      return { source: "remote", document, attempts }
    } catch (err) {
      if (!(err instanceof FetchError)) throw err

      this.logger.warn(`Attempt ${attempts} failed to fetch Data B: ${errToString(err)}`)
      const cached = await this.store.get("data_b")
      if (cached === undefined) {
        this.logger.warn(`Max retries reached (${attempts}); no cached Data B available`)
        return { source: "none", attempts }
      }
      this.logger.warn(`Max retries reached (${attempts}); using cached Data B`)
      return { source: "cache", document: cached, attempts }
    }
  }

  /** One GET; resolves to the parsed body or throws FetchError. */
  private async requestOnce(): Promise<JsonObject> {
    let res: RawResponse
    try {
      res = await this.http.getText(this.url, this.timeoutMs)
    } catch (e) {
      throw new FetchError(`GET ${this.url} failed: ${errToString(e)}`, { cause: e })
    }

    if (res.status < 200 || res.status >= 300) {
      throw new FetchError(`GET ${this.url} returned HTTP ${res.status}`, { status: res.status })
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(res.body)
    } catch (e) {
      throw new FetchError(`Response from ${this.url} is not valid JSON`, { status: res.status, cause: e })
    }

    const json = toJson(parsed)
    if (!isJsonObject(json)) {
      throw new FetchError(`Response from ${this.url} is not a JSON object`, { status: res.status })
    }
    return json
  }
}
