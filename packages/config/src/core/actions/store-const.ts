import { type Action, type ActionResult, NOT_FOUND } from "../../ports/action"
import type { ActionParams, ConfigItemSpec } from "../../ports/config-item"
import { SpecError } from "../errors/errors"
import { assertParams } from "./params"

/**
 * Stores `const` when any source mentions the item. Contributed values are
 * ignored; only their presence counts.
 */
export class StoreConstAction implements Action {
  readonly name: string = "store_const"
  readonly takesValue = false
  readonly accumulates = false
  readonly implicitDefault?: unknown
  protected readonly value: unknown

  constructor(params: ActionParams) {
    assertParams(this.name, params, ["const"])

    if (params.const === undefined) {
      throw new SpecError("the store_const action requires a 'const' value")
    }

    this.value = params.const
  }

  combine(_spec: ConfigItemSpec, contributions: readonly unknown[]): ActionResult {
    if (contributions.length === 0) return NOT_FOUND

    return { found: true, value: this.value }
  }
}

/** store_const with `true`; `false` when not mentioned. */
export class StoreTrueAction extends StoreConstAction {
  override readonly name: string = "store_true"
  override readonly implicitDefault: unknown = false

  constructor(params: ActionParams) {
    assertParams("store_true", params, [])
    super({ const: true })
  }
}

/** store_const with `false`; `true` when not mentioned. */
export class StoreFalseAction extends StoreConstAction {
  override readonly name: string = "store_false"
  override readonly implicitDefault: unknown = true

  constructor(params: ActionParams) {
    assertParams("store_false", params, [])
    super({ const: false })
  }
}
