export class RelayError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = this.constructor.name
    Error.captureStackTrace(this, this.constructor)
  }
}

export class ConfigurationError extends RelayError {
  constructor(message: string, public readonly key?: string) {
    super(key ? `[${key}] ${message}` : message)
  }
}

export class AuthError extends RelayError {
  constructor(
    public readonly status: number,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`[auth:${status}] ${message}`, options)
  }
}

export class NetworkError extends RelayError {
  constructor(message: string, public readonly status?: number, options?: ErrorOptions) {
    super(status !== undefined ? `[http:${status}] ${message}` : message, options)
  }
}

export class RateLimitedError extends RelayError {
  constructor(public readonly remainingSeconds: number) {
    super(`Rate limited: wait ${Math.ceil(remainingSeconds)}s before sending another message (use --force to bypass)`)
  }
}

export class SendError extends RelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(`Send failed: ${message}`, options)
  }
}

export class StorageError extends RelayError {
  constructor(
    public readonly store: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`[store:${store}] ${message}`, options)
  }
}

export class InjectionError extends RelayError {
  constructor(
    public readonly path: string,
    message: string,
  ) {
    super(`[inject:${path}] ${message}`)
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  if (typeof error === "string") {
    return error
  }
  try {
    return JSON.stringify(error)
  } catch {
    return String(error)
  }
}
