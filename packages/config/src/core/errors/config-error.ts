import type { ConfigErrorCode, ErrorContext, SerializedError } from "../../ports/error"

export type ConfigErrorOptions = Readonly<{
  context?: ErrorContext
  cause?: unknown
  isOperational?: boolean
}>

/**
 * Base class of every error raised by the parser.
 *
 * `isOperational` is `false` for registration mistakes (a bug in the caller)
 * and `true` for failures caused by the configuration being read.
 */
export class ConfigError<C extends ConfigErrorCode = ConfigErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(code: C, message: string, options: ConfigErrorOptions = {}) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export function isConfigError(err: unknown): err is ConfigError {
  return err instanceof ConfigError
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any error (or thrown value) to a consistent shape.
 *
 * - ConfigError instances keep code and context
 * - Other Error instances get the code "unknown"
 * - Non-Error thrown values are wrapped with the value as context
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof ConfigError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
