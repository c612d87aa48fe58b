// errors/index.ts
// Pipeline error taxonomy. Fetch failures are recovered locally (retry, then
// fallback); storage and config failures always surface to the caller.

export type ErrorKind = "Config" | "Persistence" | "Fetch";

export class PipelineError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** Persistence layer failure: connection, serialization or parse of a stored value. */
export class StorageError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super("Persistence", message, cause);
  }
}

/** Transient failure talking to the remote Data B source. Never leaves the fetcher. */
export class FetchError extends PipelineError {
  readonly status?: number;

  constructor(message: string, opts: { status?: number; cause?: unknown } = {}) {
    super("Fetch", message, opts.cause);
    if (opts.status !== undefined) this.status = opts.status;
  }
}

export class ConfigError extends PipelineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("Config", `Invalid configuration:\n  - ${issues.join("\n  - ")}`);
    this.issues = issues;
  }
}

/* ===================== Helpers ===================== */

export function errToString(e: unknown): string {
  if (e instanceof Error) return `${e.name}: ${e.message}`;
  if (typeof e === "string") return e;
  try {
    return JSON.stringify(e) ?? String(e);
  } catch {
    return String(e);
  }
}
