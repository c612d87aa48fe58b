import express from "express"
import morgan from "morgan"
import cors from "cors"
import { corsOptions } from "./config/cors"
import { morganStream, type Logger } from "./config/logger"
import { errorBoundary, notFound } from "./middleware/error"
import { createRoutes } from "./routes"
import type { DataService } from "./services/data.service"

export type AppDeps = {
  service: DataService
  logger: Logger
  corsOrigins?: string[]
}

export function createApp({ service, logger, corsOrigins }: AppDeps): express.Express {
  const app = express()

  /* ---------------- Middleware ---------------- */

  app.disable("x-powered-by")
  app.use(express.json({ limit: "2mb" }))
  app.use(morgan("combined", { stream: morganStream(logger) }))
  app.use(cors(corsOptions(corsOrigins)))

  /* ---------------- Routes ---------------- */

  app.use(createRoutes(service))

  /* ---------------- Error Handling ---------------- */

  app.use(notFound())
  app.use(errorBoundary(logger))

  return app
}
