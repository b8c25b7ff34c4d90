import type { Coercion, CoercionFn, ConfigItemSpec } from "../ports/config-item"
import { InvalidChoiceError, TypeConversionError } from "./errors/errors"

export const identity: CoercionFn = (raw) => raw

/**
 * Converts one raw contribution with the item's `type` and checks it against
 * `choices`.
 *
 * @throws TypeConversionError when the coercion throws or the schema rejects the value
 * @throws InvalidChoiceError when the converted value is not one of `choices`
 */
export function coerce(spec: ConfigItemSpec, raw: unknown, coercion: Coercion = spec.type): unknown {
  const value = applyCoercion(spec.name, coercion, raw)

  if (spec.choices && !spec.choices.includes(value)) {
    throw new InvalidChoiceError(spec.name, value, spec.choices)
  }

  return value
}

/** Like `coerce`, preferring the `elementType` action parameter. */
export function coerceElement(spec: ConfigItemSpec, raw: unknown): unknown {
  return coerce(spec, raw, spec.params.elementType ?? spec.type)
}

function applyCoercion(item: string, coercion: Coercion, raw: unknown): unknown {
  if (typeof coercion === "function") {
    try {
      return coercion(raw)
    } catch (err) {
      throw new TypeConversionError(item, raw, err)
    }
  }

  const result = coercion.safeParse(raw)

  if (!result.success) {
    throw new TypeConversionError(item, raw, result.error)
  }

  return result.data
}
