import { type Action, type ActionResult, NOT_FOUND } from "../../ports/action"
import type { ActionParams, ConfigItemSpec } from "../../ports/config-item"
import { assertParams } from "./params"

/** Number of mentions across all sources. */
export class CountAction implements Action {
  readonly name = "count"
  readonly takesValue = false
  readonly accumulates = true

  constructor(params: ActionParams) {
    assertParams(this.name, params, [])
  }

  combine(_spec: ConfigItemSpec, contributions: readonly unknown[]): ActionResult<number> {
    if (contributions.length === 0) return NOT_FOUND

    return { found: true, value: contributions.length }
  }
}
