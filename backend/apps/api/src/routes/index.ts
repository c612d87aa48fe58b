import { Router } from "express"
import type { DataService } from "../services/data.service"
import { dataRoutes } from "./data.routes"
import { healthRoutes } from "./health"

/* ---------------- Feature Routes ---------------- */

export function createRoutes(service: DataService): Router {
  const router = Router()

  router.use(healthRoutes())
  router.use(dataRoutes(service))

  return router
}
