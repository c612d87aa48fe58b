/*
|--------------------------------------------------------------------------
| HTTP Error Types
|--------------------------------------------------------------------------
| Errors that carry their own status and response body. Anything else
| reaching the error middleware becomes a generic 500.
|--------------------------------------------------------------------------
*/

export type ValidationIssue = {
  loc: (string | number)[]
  msg: string
}

export class AppError extends Error {
  statusCode: number

  constructor(message: string, statusCode = 500) {
    super(message)

    this.name = new.target.name
    this.statusCode = statusCode

    Error.captureStackTrace(this, this.constructor)
  }

  /** Response body sent to the client. */
  toBody(): Record<string, unknown> {
    return { detail: this.message }
  }
}

/* ---------------- Common Errors ---------------- */

export class NotFoundError extends AppError {
  constructor(message = "Not Found") {
    super(message, 404)
  }
}

export class ValidationError extends AppError {
  readonly issues: ValidationIssue[]

  constructor(issues: ValidationIssue[], message = "Validation failed") {
    super(message, 422)
    this.issues = issues
  }

  toBody(): Record<string, unknown> {
    return { detail: this.issues }
  }
}

/* ---------------- Helper ---------------- */

export function isAppError(
  error: unknown
): error is AppError {
  return error instanceof AppError
}

export const GENERIC_SERVER_ERROR = "Unexpected server error, please contact support."
