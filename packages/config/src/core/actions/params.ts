import type { ActionParams } from "../../ports/config-item"
import { SpecError } from "../errors/errors"

/** Rejects parameters the action does not understand. */
export function assertParams(
  action: string,
  params: ActionParams,
  allowed: readonly string[],
): void {
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && !allowed.includes(key)) {
      throw new SpecError(`'${key}' is not valid for the ${action} action`)
    }
  }
}
