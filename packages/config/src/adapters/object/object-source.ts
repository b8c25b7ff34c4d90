import { z } from "zod"
import { MENTIONED } from "../../core/markers"
import type { ConfigItemSpec } from "../../ports/config-item"
import type { ConfigSource, ContributionMap } from "../../ports/source"
import { copyRecord, copyValue, toContributions } from "../utils/contributions"

export const objectSourceOptionsSchema = z.strictObject({
  name: z.string().min(1).optional(),
  noneValues: z.array(z.unknown()).optional(),
})

export type ObjectSourceOptions = z.infer<typeof objectSourceOptionsSchema>

/**
 * Values held in memory, keyed by item name.
 *
 * - `undefined` (or a missing key) means nothing was given
 * - Arrays given to append/extend/count items are one contribution per element
 * - Flag items take one of `noneValues` (default `null` or `MENTIONED`)
 * - Every read returns fresh copies of arrays and plain objects
 */
export class ObjectSource implements ConfigSource {
  readonly name: string
  private readonly values: Readonly<Record<string, unknown>>
  private readonly noneValues: readonly unknown[]

  constructor(values: Readonly<Record<string, unknown>>, options: ObjectSourceOptions = {}) {
    const opts = objectSourceOptionsSchema.parse(options)

    this.values = copyRecord(values)
    this.name = opts.name ?? "object"
    this.noneValues = opts.noneValues ?? [null, MENTIONED]
  }

  getConfig(specs: readonly ConfigItemSpec[]): ContributionMap {
    return readObject(this.values, specs, this.noneValues)
  }
}

/**
 * Contributions of a plain object for the given items. Arrays and plain
 * objects are copied, so callers never share them with `values`.
 */
export function readObject(
  values: Readonly<Record<string, unknown>>,
  specs: readonly ConfigItemSpec[],
  noneValues: readonly unknown[],
): Record<string, unknown[]> {
  const result: Record<string, unknown[]> = {}

  for (const spec of specs) {
    if (!Object.hasOwn(values, spec.name)) continue

    const contributions = toContributions(spec, copyValue(values[spec.name]), noneValues)

    if (contributions) result[spec.name] = contributions
  }

  return result
}
