/*
|--------------------------------------------------------------------------
| Merge Engine
|--------------------------------------------------------------------------
| Data C = shallow key union of Data A and Data B, B wins on collision.
| Nested values are replaced wholesale. If either side is missing, Data C
| is left as it is.
|--------------------------------------------------------------------------
*/

import type { KeyValueStore } from "../../../../engine/persistence/kv"
import { isJsonObject, type DataKey, type JsonObject } from "../../../../engine/persistence/schema"
import type { Logger } from "../config/logger"

export type MergeOutcome =
  | { status: "merged"; document: JsonObject }
  | { status: "skipped"; missing: DataKey[] }

export function mergeDocuments(a: JsonObject, b: JsonObject): JsonObject {
  return { ...a, ...b }
}

export class MergeEngine {
  constructor(
    private readonly store: KeyValueStore,
    private readonly logger: Logger
  ) {}

  async merge(): Promise<MergeOutcome> {
    const dataA = await this.store.get("data_a")
    const dataB = await this.store.get("data_b")

    if (!isJsonObject(dataA) || !isJsonObject(dataB)) {
      const missing: DataKey[] = []
      if (!isJsonObject(dataA)) missing.push("data_a")
      if (!isJsonObject(dataB)) missing.push("data_b")
      this.logger.info(`Merge skipped: ${missing.join(", ")} not available`)
      return { status: "skipped", missing }
    }

    const document = mergeDocuments(dataA, dataB)
    await this.store.put("data_c", document)
    this.logger.debug(`Merged Data C (${Object.keys(document).length} top-level keys)`)
    return { status: "merged", document }
  }
}
