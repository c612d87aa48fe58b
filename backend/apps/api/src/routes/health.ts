// routes/health.ts
// Liveness endpoint.

import { Router } from "express"

export function healthRoutes(): Router {
  const router = Router()

  // GET /health
  router.get("/health", (_req, res) => {
    res.json({ status: "ok" })
  })

  return router
}
