import { InvalidFlagValueError } from "../../core/errors/errors"
import { MENTIONED } from "../../core/markers"
import type { ConfigItemSpec } from "../../ports/config-item"

/**
 * Turns one raw value read for `spec` into its contributions.
 *
 * Accumulating actions take an array as one contribution per element. Items
 * whose action takes no value only accept `noneValues`, reported as
 * `MENTIONED`.
 *
 * @throws InvalidFlagValueError for any other value given to a flag
 */
export function toContributions(
  spec: ConfigItemSpec,
  value: unknown,
  noneValues: readonly unknown[],
): unknown[] | undefined {
  if (value === undefined) return undefined

  const values = spec.action.accumulates && Array.isArray(value) ? [...value] : [value]

  if (spec.action.takesValue) return values

  return values.map((v) => toMention(spec, v, noneValues))
}

export function toMention(
  spec: ConfigItemSpec,
  value: unknown,
  noneValues: readonly unknown[],
): typeof MENTIONED {
  if (!noneValues.includes(value)) {
    throw new InvalidFlagValueError(spec.name, value, noneValues)
  }

  return MENTIONED
}

/** Whether a string value should be split by a list separator. */
export function isListItem(spec: ConfigItemSpec): boolean {
  return spec.action.accumulates && spec.action.takesValue
}

/**
 * Copies arrays and plain objects at every depth. Other values, including
 * class instances and functions, are returned as they are.
 */
export function copyValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(copyValue)
  if (isPlainObject(value)) return copyRecord(value)

  return value
}

export function copyRecord(record: Readonly<Record<string, unknown>>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).map(([key, v]) => [key, copyValue(v)]))
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false

  const proto: unknown = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}
