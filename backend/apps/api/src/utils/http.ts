import type { NextFunction, Request, RequestHandler, Response } from "express"

/*
|--------------------------------------------------------------------------
| Async Controller Wrapper
|--------------------------------------------------------------------------
| Express 4 does not catch rejected promises; route them to next().
|--------------------------------------------------------------------------
*/

export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return function (req, res, next) {
    Promise.resolve(fn(req, res, next)).catch(next)
  }
}
