import type { ActionParams, ConfigItemSpec } from "./config-item"

export type ActionResult<T = unknown> = { found: false } | { found: true; value: T }

/**
 * Reduces the contributions every source made for one item into its value.
 *
 * `contributions` holds raw values ordered by source registration, then by
 * the order inside each source. Actions that materialize values coerce them
 * with `coerce()` / `coerceElement()`.
 */
export interface Action<T = unknown> {
  readonly name: string

  /**
   * Whether a mention carries a value. Sources report `MENTIONED` for items
   * whose action does not take one.
   */
  readonly takesValue: boolean

  /**
   * Whether every contribution counts, rather than only the winning one.
   * In-memory sources spread array values into one contribution per element
   * for accumulating actions.
   */
  readonly accumulates: boolean

  /** Default used when nothing is found and the item has no default of its own. */
  readonly implicitDefault?: unknown

  combine(spec: ConfigItemSpec, contributions: readonly unknown[]): ActionResult<T>
}

export type ActionConstructor = new (params: ActionParams) => Action

export const NOT_FOUND: ActionResult<never> = { found: false }

export function isAction(value: unknown): value is Action {
  return (
    typeof value === "object" &&
    value !== null &&
    "combine" in value &&
    typeof value.combine === "function" &&
    "name" in value &&
    typeof value.name === "string" &&
    "takesValue" in value &&
    typeof value.takesValue === "boolean" &&
    "accumulates" in value &&
    typeof value.accumulates === "boolean"
  )
}
