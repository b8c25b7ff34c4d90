import type { ActionConstructor } from "../../ports/action"
import { SpecError } from "../errors/errors"
import { AppendAction, ExtendAction } from "./append"
import { CountAction } from "./count"
import { StoreAction } from "./store"
import { StoreConstAction, StoreFalseAction, StoreTrueAction } from "./store-const"

export const builtinActions = {
  store: StoreAction,
  store_const: StoreConstAction,
  store_true: StoreTrueAction,
  store_false: StoreFalseAction,
  append: AppendAction,
  extend: ExtendAction,
  count: CountAction,
} as const satisfies Record<string, ActionConstructor>

export type BuiltinActionName = keyof typeof builtinActions

/** Action kinds that `addConfig` can refer to by name. */
export class ActionRegistry {
  private readonly kinds = new Map<string, ActionConstructor>(Object.entries(builtinActions))

  register(name: string, action: ActionConstructor): void {
    if (name.length === 0) {
      throw new SpecError("action name must not be empty")
    }
    if (this.kinds.has(name)) {
      throw new SpecError(`action '${name}' is already registered`)
    }

    this.kinds.set(name, action)
  }

  resolve(name: string): ActionConstructor | undefined {
    return this.kinds.get(name)
  }

  names(): string[] {
    return [...this.kinds.keys()]
  }
}
