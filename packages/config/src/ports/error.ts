export type ConfigErrorCode =
  | "spec_error"
  | "source_error"
  | "type_conversion_error"
  | "invalid_choice"
  | "missing_required_config"
  | "invalid_flag_value"

/**
 * Contextual metadata attached to errors.
 * Carries item and source names without string munging.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

/**
 * Serialized error shape for logging and transport.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
