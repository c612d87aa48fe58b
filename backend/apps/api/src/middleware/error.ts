// middleware/error.ts
// Terminal Express middleware: 404 fallthrough + global error boundary.
// Clients only ever see the AppError body or the generic 500 message.

import type { ErrorRequestHandler, RequestHandler } from "express"
import { PipelineError } from "../../../../engine/errors"
import type { Logger } from "../config/logger"
import { GENERIC_SERVER_ERROR, NotFoundError, ValidationError, isAppError } from "../utils/errors"

export function notFound(): RequestHandler {
  return (_req, _res, next) => {
    next(new NotFoundError())
  }
}

/** express.json() rejects malformed bodies with a SyntaxError tagged "entity.parse.failed". */
function isBodyParseError(err: unknown): boolean {
  return (
    err instanceof SyntaxError &&
    "type" in err &&
    err.type === "entity.parse.failed"
  )
}

export function errorBoundary(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err)
      return
    }

    const error = isBodyParseError(err)
      ? new ValidationError([{ loc: ["body"], msg: "Malformed JSON body" }])
      : err

    if (isAppError(error)) {
      if (error.statusCode >= 500) logger.error(`${req.method} ${req.path}: ${error.stack ?? error.message}`)
      res.status(error.statusCode).json(error.toBody())
      return
    }

    const kind = error instanceof PipelineError ? `${error.kind} failure` : "Unhandled exception"
    logger.error(
      `${kind} at ${req.method} ${req.path}: ${error instanceof Error ? error.stack ?? error.message : String(error)}`
    )
    res.status(500).json({ message: GENERIC_SERVER_ERROR })
  }
}
