import { type Action, type ActionResult, NOT_FOUND } from "../../ports/action"
import type { ActionParams, ConfigItemSpec } from "../../ports/config-item"
import { coerceElement } from "../coerce"
import { assertParams } from "./params"

/** Collects every contribution, lowest-priority source first. */
export class AppendAction implements Action {
  readonly name: string
  readonly takesValue = true
  readonly accumulates = true

  constructor(params: ActionParams, name = "append") {
    this.name = name
    assertParams(name, params, ["elementType"])
  }

  combine(spec: ConfigItemSpec, contributions: readonly unknown[]): ActionResult<unknown[]> {
    if (contributions.length === 0) return NOT_FOUND

    return { found: true, value: contributions.map((c) => coerceElement(spec, c)) }
  }
}

/** Like append, but array contributions are flattened into the result. */
export class ExtendAction extends AppendAction {
  constructor(params: ActionParams) {
    super(params, "extend")
  }

  override combine(
    spec: ConfigItemSpec,
    contributions: readonly unknown[],
  ): ActionResult<unknown[]> {
    if (contributions.length === 0) return NOT_FOUND

    const value = contributions.flatMap((c) =>
      Array.isArray(c)
        ? c.map((element: unknown) => coerceElement(spec, element))
        : [coerceElement(spec, c)],
    )

    return { found: true, value }
  }
}
