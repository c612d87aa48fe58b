import { Router } from "express"
import { createDataController } from "../controllers/data.controller"
import type { DataService } from "../services/data.service"
import { asyncHandler } from "../utils/http"

/*
|--------------------------------------------------------------------------
| Data Routes
|--------------------------------------------------------------------------
| POST /data-a  store Data A, recompute Data C
| GET  /data-c  current merged document
|--------------------------------------------------------------------------
*/

export function dataRoutes(service: DataService): Router {
  const router = Router()
  const controller = createDataController(service)

  router.post("/data-a", asyncHandler(controller.postDataA))
  router.get("/data-c", asyncHandler(controller.getDataC))

  return router
}
