// tests/helpers.ts
// Shared fakes for the pipeline specs: in-memory SQLite, scripted Data B source, silent logger.

import * as fs from "node:fs"
import * as os from "node:os"
import * as path from "node:path"
import { Writable } from "node:stream"
import winston from "winston"
import { SqliteKV } from "../engine/persistence/kv"
import { createSilentLogger, type Logger } from "../apps/api/src/config/logger"
import type { HttpGetter, RawResponse } from "../apps/api/src/connectors/source/dataB.connector"

export const logger = createSilentLogger()

/** Logger that keeps every line as "<level>: <message>". */
export function capturingLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = []
  const stream = new Writable({
    write(chunk, _encoding, done) {
      lines.push(String(chunk).trim())
      done()
    },
  })
  const captured = winston.createLogger({
    level: "debug",
    format: winston.format.printf(({ level, message }) => `${level}: ${String(message)}`),
    transports: [new winston.transports.Stream({ stream })],
  })
  return { logger: captured, lines }
}

export function memoryStore(): SqliteKV {
  return new SqliteKV(":memory:")
}

/** Fresh directory under the OS temp dir, removed by the returned cleanup. */
export function tempDir(): { dir: string; cleanup: () => void } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "menu-merger-"))
  return { dir, cleanup: () => fs.rmSync(dir, { recursive: true, force: true }) }
}

/* ---------------- Scripted Data B source ---------------- */

export type Step = RawResponse | Error

export const ok = (doc: unknown): RawResponse => ({ status: 200, body: JSON.stringify(doc) })

/**
 * Replays `steps` in order, one per request; the last step repeats once the
 * script runs out. Records every URL requested.
 */
export function scriptedGetter(steps: Step[]): HttpGetter & { calls: string[] } {
  const calls: string[] = []
  return {
    calls,
    async getText(url) {
      calls.push(url)
      const step = steps[Math.min(calls.length - 1, steps.length - 1)]
      if (step instanceof Error) throw step
      return step
    },
  }
}

/** Records requested waits and returns immediately. */
export function recordingSleep(): ((ms: number) => Promise<void>) & { waits: number[] } {
  const waits: number[] = []
  const fn = async (ms: number) => {
    waits.push(ms)
  }
  return Object.assign(fn, { waits })
}

/* ---------------- Async control ---------------- */

export type Deferred<T> = {
  promise: Promise<T>
  resolve: (value: T) => void
  reject: (err: unknown) => void
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined
  let reject: (err: unknown) => void = () => undefined
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}

/** Let queued promise callbacks run. */
export function flush(): Promise<void> {
  return new Promise(res => setImmediate(res))
}
