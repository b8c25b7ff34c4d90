import { type Action, type ActionResult, NOT_FOUND } from "../../ports/action"
import type { ActionParams, ConfigItemSpec } from "../../ports/config-item"
import { coerce } from "../coerce"
import { assertParams } from "./params"

/**
 * Keeps the last contribution: later sources override earlier ones. Every
 * contribution is converted and checked against `choices`.
 */
export class StoreAction implements Action {
  readonly name: string = "store"
  readonly takesValue = true
  readonly accumulates = false

  constructor(params: ActionParams) {
    assertParams(this.name, params, [])
  }

  combine(spec: ConfigItemSpec, contributions: readonly unknown[]): ActionResult {
    if (contributions.length === 0) return NOT_FOUND

    const values = contributions.map((c) => coerce(spec, c))

    return { found: true, value: values.at(-1) }
  }
}
