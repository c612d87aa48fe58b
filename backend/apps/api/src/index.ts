import cluster from "cluster"
import type { Worker } from "cluster"
import { createApp } from "./app"
import { createPipeline } from "./bootstrap"
import { loadConfig, loadDotenv, type AppConfig } from "./config/env"
import { createLogger, type Logger } from "./config/logger"
import { closeServer, startServer } from "./server"
import { WorkerPool } from "./supervisor"
import { IntervalScheduler } from "../../../sched/scheduler"
import { ConfigError } from "../../../engine/errors"

/*
|--------------------------------------------------------------------------
| Process Entry
|--------------------------------------------------------------------------
| primary: owns the refresh scheduler (exactly one instance) and forks
|          WORKERS_COUNT HTTP workers, re-forking any that die after they
|          started listening; one that dies during startup stops the app
| worker:  serves POST /data-a and GET /data-c
| Both share the SQLite file named by DATABASE_URL.
|--------------------------------------------------------------------------
*/

async function runPrimary(config: AppConfig, logger: Logger) {
  const pipeline = createPipeline(config, logger)
  const scheduler = new IntervalScheduler({
    name: "fetch-and-merge",
    intervalMs: config.fetchIntervalSeconds * 1000,
    handler: () => pipeline.service.fetchAndMerge(),
    logger,
  })

  let shuttingDown = false

  const shutdown = async (reason: string, exitCode: number) => {
    if (shuttingDown) return
    shuttingDown = true
    pool.stop()
    logger.info(`${reason}. Shutting down...`)

    await scheduler.stop()
    await Promise.all(Object.values(cluster.workers ?? {}).map(w => (w ? stopWorker(w) : undefined)))
    pipeline.store.close()

    logger.info("All services stopped.")
    process.exit(exitCode)
  }

  const pool = new WorkerPool({
    size: config.workersCount,
    fork: () => cluster.fork(),
    logger,
    onStartupFailure: reason => void shutdown(reason, 1).catch(fatal(logger)),
  })

  cluster.on("listening", (worker: Worker) => pool.markListening(worker))
  cluster.on("exit", (worker: Worker, code: number | null, signal: string | null) => {
    pool.handleExit(worker, code, signal)
  })

  pool.start()
  scheduler.start()
  logger.info("App and scheduler running. Press Ctrl+C to stop.")

  process.on("SIGTERM", sig => void shutdown(`${sig} received`, 0).catch(fatal(logger)))
  process.on("SIGINT", sig => void shutdown(`${sig} received`, 0).catch(fatal(logger)))
}

function stopWorker(worker: Worker): Promise<void> {
  return new Promise(resolve => {
    if (worker.isDead()) {
      resolve()
      return
    }
    worker.once("exit", () => resolve())
    worker.process.kill("SIGTERM")
  })
}

async function runWorker(config: AppConfig, logger: Logger) {
  const pipeline = createPipeline(config, logger)
  const app = createApp({ service: pipeline.service, logger, corsOrigins: config.corsOrigins })
  const server = await startServer(app, { host: config.host, port: config.port }, logger)

  let closing = false
  const shutdown = async () => {
    if (closing) return
    closing = true
    await closeServer(server)
    pipeline.store.close()
    process.exit(0)
  }

  process.on("SIGTERM", () => void shutdown().catch(fatal(logger)))
  // Ctrl+C reaches the whole process group; the primary drives the shutdown
  process.on("SIGINT", () => undefined)
}

function fatal(logger: Logger) {
  return (err: unknown) => {
    logger.error(err instanceof Error ? err.stack ?? err.message : String(err))
    process.exit(1)
  }
}

async function main() {
  loadDotenv()
  const config = loadConfig()
  const logger = createLogger({
    level: config.logLevel,
    nodeEnv: config.nodeEnv,
    label: cluster.isPrimary ? "primary" : `worker ${cluster.worker?.id ?? "?"}`,
  })

  if (cluster.isPrimary) await runPrimary(config, logger)
  else await runWorker(config, logger)
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(err.message)
  } else {
    console.error(err)
  }
  process.exit(1)
})
