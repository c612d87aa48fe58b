// unit/retry.spec.ts
// Bounded constant-delay retry on real timers.

import { describe, it } from "node:test"
import assert from "node:assert/strict"
import { retry } from "../../data/common/retry"

describe("retry", () => {
  it("waits between attempts without blocking other work", async () => {
    const events: string[] = []
    const other = setTimeout(() => events.push("other work"), 5)

    const started = Date.now()
    const value = await retry(
      async attempt => {
        events.push(`attempt ${attempt}`)
        if (attempt < 2) throw new Error("not yet")
        return "done"
      },
      { attempts: 3, delayMs: 50 }
    )
    clearTimeout(other)

    assert.equal(value, "done")
    assert.deepEqual(events, ["attempt 1", "other work", "attempt 2"])
    assert.ok(Date.now() - started >= 45)
  })

  it("rethrows the last error once every attempt failed", async () => {
    let calls = 0
    await assert.rejects(
      retry(async attempt => {
        calls++
        throw new Error(`failure ${attempt}`)
      }, { attempts: 3, delayMs: 1 }),
      { message: "failure 3" }
    )
    assert.equal(calls, 3)
  })

  it("stops at the first error shouldRetry refuses", async () => {
    const retried: number[] = []
    await assert.rejects(
      retry(async () => { throw new TypeError("fatal") }, {
        attempts: 5,
        delayMs: 1,
        shouldRetry: err => !(err instanceof TypeError),
        onRetry: (_err, attempt) => retried.push(attempt),
      }),
      TypeError
    )
    assert.deepEqual(retried, [])
  })
})
