// src/errors.ts

export class SourceError extends Error {
  readonly code: string

  constructor(code: string, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

// transport-level failure reaching the daemon, or a response we cannot read
export class SourceUnavailableError extends SourceError {
  constructor(message: string) {
    super('SOURCE_UNAVAILABLE', message)
  }
}

export class SourceTimeoutError extends SourceError {
  constructor(message: string) {
    super('SOURCE_TIMEOUT', message)
  }
}

// a forced refresh for a live endpoint failed; there is no cached fallback for it
export class LiveRefreshError extends Error {
  readonly code = 'LIVE_REFRESH_FAILED'
  declare readonly cause: Error

  constructor(cause: Error) {
    super(`live refresh failed: ${cause.message}`, { cause })
    this.name = 'LiveRefreshError'
  }
}

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e))
}

export function errorCode(e: Error): string {
  return e instanceof SourceError ? e.code : 'INTERNAL'
}
