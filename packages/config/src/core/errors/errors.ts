import { z } from "zod"
import { ConfigError, type ConfigErrorOptions } from "./config-error"

/**
 * Invalid registration: duplicate or malformed item name, conflicting
 * options, unknown action or source kind. Raised by `addConfig`,
 * `addSource` and `registerAction`, never by a parse.
 */
export class SpecError extends ConfigError<"spec_error"> {
  constructor(message: string, options: ConfigErrorOptions = {}) {
    super("spec_error", message, { isOperational: false, ...options })
  }
}

/**
 * A source could not produce its contributions. The original failure is the
 * `cause`.
 */
export class SourceError extends ConfigError<"source_error"> {
  readonly source: string

  constructor(source: string, cause: unknown) {
    super("source_error", `config source '${source}' failed: ${describeCause(cause)}`, {
      context: { source },
      cause,
    })
    this.source = source
  }
}

export class TypeConversionError extends ConfigError<"type_conversion_error"> {
  readonly item: string
  readonly value: unknown

  constructor(item: string, value: unknown, cause: unknown) {
    super(
      "type_conversion_error",
      `invalid value ${formatValue(value)} for config item '${item}': ${describeCause(cause)}`,
      { context: { item, value }, cause },
    )
    this.item = item
    this.value = value
  }
}

export class InvalidChoiceError extends ConfigError<"invalid_choice"> {
  readonly item: string
  readonly value: unknown
  readonly choices: readonly unknown[]

  constructor(item: string, value: unknown, choices: readonly unknown[]) {
    super(
      "invalid_choice",
      `invalid choice ${formatValue(value)} for config item '${item}'; ` +
        `valid choices are (${choices.map(formatValue).join(", ")})`,
      { context: { item, value, choices } },
    )
    this.item = item
    this.value = value
    this.choices = choices
  }
}

/**
 * Required items that no source contributed to. Lists every missing item;
 * the message leads with the first one.
 */
export class MissingRequiredConfigError extends ConfigError<"missing_required_config"> {
  readonly items: readonly string[]

  constructor(items: readonly string[]) {
    const quoted = items.map((item) => `'${item}'`)
    const message =
      quoted.length === 1
        ? `did not find value for config item ${quoted[0]}`
        : `did not find values for config items ${quoted.join(", ")}`

    super("missing_required_config", message, { context: { items: [...items] } })
    this.items = Object.freeze([...items])
  }
}

/**
 * A source saw a value for an item whose action takes none, and the value is
 * not one the source treats as "mentioned without value".
 */
export class InvalidFlagValueError extends ConfigError<"invalid_flag_value"> {
  readonly item: string
  readonly value: unknown

  constructor(item: string, value: unknown, accepted: readonly unknown[]) {
    super(
      "invalid_flag_value",
      `invalid value ${formatValue(value)} for config item '${item}', which takes no value; ` +
        `accepted values are (${accepted.map(formatValue).join(", ")})`,
      { context: { item, value } },
    )
    this.item = item
    this.value = value
  }
}

export function formatValue(value: unknown): string {
  if (typeof value === "string") return `'${value}'`
  if (typeof value === "symbol") return value.toString()

  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    return String(value)
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof z.ZodError) return z.prettifyError(cause)
  if (cause instanceof Error) return cause.message

  return String(cause)
}
