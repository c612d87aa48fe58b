import type { Logger } from "./config/logger"

/*
|--------------------------------------------------------------------------
| Worker Pool
|--------------------------------------------------------------------------
| Restart policy for the HTTP workers forked by the primary:
|   died after it was listening  -> fork a replacement
|   died before it ever listened -> startup failure, the pool gives up
|   died during shutdown         -> ignored
|--------------------------------------------------------------------------
*/

export type PoolWorker = {
  id: number
  process: { pid?: number }
}

export type WorkerExit = "restarted" | "failed" | "ignored"

export type WorkerPoolOptions = {
  size: number
  fork: () => PoolWorker
  logger: Logger
  /** called once when a worker dies before it started listening */
  onStartupFailure: (reason: string) => void
}

export class WorkerPool {
  private readonly listening = new Set<number>()
  private stopping = false
  private failed = false

  constructor(private readonly opts: WorkerPoolOptions) {}

  start(): void {
    for (let i = 0; i < this.opts.size; i++) this.spawn()
  }

  markListening(worker: PoolWorker): void {
    this.listening.add(worker.id)
  }

  /** Stop replacing workers; used when the primary shuts down. */
  stop(): void {
    this.stopping = true
  }

  handleExit(worker: PoolWorker, code: number | null, signal: string | null): WorkerExit {
    const listened = this.listening.delete(worker.id)
    if (this.stopping || this.failed) return "ignored"

    const how = signal || code
    if (!listened) {
      this.failed = true
      const reason = `HTTP worker ${worker.id} exited (${how}) before it started listening`
      this.opts.logger.error(reason)
      this.opts.onStartupFailure(reason)
      return "failed"
    }

    this.opts.logger.warn(`HTTP worker ${worker.id} exited (${how}); restarting`)
    this.spawn()
    return "restarted"
  }

  private spawn(): void {
    const worker = this.opts.fork()
    this.opts.logger.info(`Forked HTTP worker ${worker.id} (pid ${worker.process.pid})`)
  }
}
