import type { Request, Response } from "express"
import type { DataService } from "../services/data.service"
import { dataASchema, toValidationIssues, type DetailResponse, type StatusResponse } from "../types/data.types"
import { ValidationError } from "../utils/errors"

/*
|--------------------------------------------------------------------------
| Data Controller
|--------------------------------------------------------------------------
| Thin HTTP glue over DataService. Storage failures are left to the
| error middleware.
|--------------------------------------------------------------------------
*/

export function createDataController(service: DataService) {
  // POST /data-a
  async function postDataA(req: Request, res: Response) {
    const parsed = dataASchema.safeParse(req.body)
    if (!parsed.success) {
      throw new ValidationError(toValidationIssues(parsed.error))
    }

    await service.saveDataA(parsed.data)
    const body: StatusResponse = { status: "ok" }
    res.json(body)
  }

  // GET /data-c
  async function getDataC(_req: Request, res: Response) {
    const dataC = await service.getDataC()
    if (dataC === undefined) {
      const body: DetailResponse = { detail: "DATA C not available" }
      res.status(404).json(body)
      return
    }
    res.json(dataC)
  }

  return { postDataA, getDataC }
}
