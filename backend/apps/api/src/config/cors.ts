import type { CorsOptions } from "cors"

/** No list configured -> reflect any origin. */
export function corsOptions(allowedOrigins: string[] | undefined): CorsOptions {
  return {
    origin: (origin, callback) => {
      // Allow server-to-server, curl
      if (!origin || !allowedOrigins) {
        callback(null, true)
        return
      }

      if (allowedOrigins.includes(origin)) {
        callback(null, true)
        return
      }

      callback(null, false)
    },

    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type"],
  }
}
