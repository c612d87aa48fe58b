import http from "http"
import type { RequestListener } from "http"
import type { Logger } from "./config/logger"

/* ---------------- Listen ---------------- */

export function startServer(
  app: RequestListener,
  opts: { host: string; port: number },
  logger: Logger
): Promise<http.Server> {
  const server = http.createServer(app)

  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err)
    server.once("error", onError)
    server.listen(opts.port, opts.host, () => {
      server.off("error", onError)
      logger.info(`API server listening on http://${opts.host}:${listeningPort(server, opts.port)}`)
      resolve(server)
    })
  })
}

export function listeningPort(server: http.Server, fallback = 0): number {
  const addr = server.address()
  return addr !== null && typeof addr === "object" ? addr.port : fallback
}

/* ---------------- Graceful Shutdown ---------------- */

/** Stop accepting connections and resolve once in-flight requests are done. */
export function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()))
    server.closeIdleConnections()
  })
}
