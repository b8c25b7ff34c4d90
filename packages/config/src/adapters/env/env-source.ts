import { z } from "zod"
import type { ConfigItemSpec } from "../../ports/config-item"
import type { ConfigSource, ContributionMap } from "../../ports/source"
import { isListItem, toMention } from "../utils/contributions"

export const envSourceOptionsSchema = z.strictObject({
  /** Prepended to the upper-cased item name, e.g. "APP_" reads `APP_PORT` for `port`. */
  prefix: z.string().default(""),

  /** Variables to read. Defaults to `process.env`. */
  env: z.record(z.string(), z.string().optional()).optional(),

  /**
   * Values that count as a mention of a flag item.
   *
   * @default [""]
   */
  noneValues: z.array(z.string()).default([""]),

  /**
   * Splits values of append/extend items into several contributions.
   * Without it every variable is one contribution.
   */
  listSeparator: z.string().min(1).optional(),
})

export type EnvSourceOptions = z.input<typeof envSourceOptionsSchema>

type EnvRules = Pick<z.output<typeof envSourceOptionsSchema>, "prefix" | "noneValues" | "listSeparator">

/**
 * Reads `<prefix><ITEM_NAME>` variables. Values are raw strings.
 */
export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly opts: z.output<typeof envSourceOptionsSchema>

  constructor(options: EnvSourceOptions = {}) {
    this.opts = envSourceOptionsSchema.parse(options)
  }

  getConfig(specs: readonly ConfigItemSpec[]): ContributionMap {
    return readVariables(this.opts.env ?? process.env, specs, this.opts)
  }
}

export function envVarName(prefix: string, item: string): string {
  return `${prefix}${item.toUpperCase()}`
}

/** Contributions of environment-style variables for the given items. */
export function readVariables(
  env: Readonly<Record<string, string | undefined>>,
  specs: readonly ConfigItemSpec[],
  rules: EnvRules,
): Record<string, unknown[]> {
  const result: Record<string, unknown[]> = {}

  for (const spec of specs) {
    const value = env[envVarName(rules.prefix, spec.name)]

    if (value === undefined) continue

    if (!spec.action.takesValue) {
      result[spec.name] = [toMention(spec, value, rules.noneValues)]
    } else if (rules.listSeparator !== undefined && isListItem(spec)) {
      result[spec.name] = value.split(rules.listSeparator)
    } else {
      result[spec.name] = [value]
    }
  }

  return result
}
