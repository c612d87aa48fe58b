import winston from "winston"

/*
|--------------------------------------------------------------------------
| Logger Configuration
|--------------------------------------------------------------------------
| One logger per process, built from AppConfig and passed to every
| component. Also backs morgan's HTTP request log.
|--------------------------------------------------------------------------
*/

export type Logger = winston.Logger

export type LoggerOptions = {
  level?: string
  nodeEnv?: string
  /** workers tag their lines so interleaved output stays readable */
  label?: string
  silent?: boolean
}

const { combine, timestamp, printf, colorize, errors, label: withLabel } =
  winston.format

const logFormat = printf(
  ({ level, message, timestamp, stack, label }) =>
    `${timestamp} [${level}]${label ? ` (${label})` : ""} ${stack || message
    }`
)

export function createLogger(opts: LoggerOptions = {}): Logger {
  const level =
    opts.level ??
    (opts.nodeEnv === "production"
      ? "info"
      : "debug")

  return winston.createLogger({
    level,
    silent: opts.silent ?? false,
    format: combine(
      errors({ stack: true }),
      withLabel({ label: opts.label ?? "" }),
      timestamp(),
      logFormat
    ),
    transports: [
      new winston.transports.Console({
        format: combine(
          errors({ stack: true }),
          colorize(),
          withLabel({ label: opts.label ?? "" }),
          timestamp(),
          logFormat
        ),
      }),
    ],
  })
}

/** Logger that drops everything; used where a component needs one but output is noise. */
export function createSilentLogger(): Logger {
  return createLogger({ silent: true })
}

/*
|--------------------------------------------------------------------------
| Morgan Stream (HTTP Logging)
|--------------------------------------------------------------------------
| Allows: app.use(morgan("combined", { stream: morganStream(logger) }))
|--------------------------------------------------------------------------
*/

export function morganStream(logger: Logger) {
  return {
    write: (message: string) => {
      logger.http(message.trim())
    },
  }
}
