import yargs, { type Options } from "yargs"
import { hideBin } from "yargs/helpers"
import { z } from "zod"
import { MENTIONED } from "../../core/markers"
import type { ConfigItemSpec } from "../../ports/config-item"
import type { ConfigSource, ContributionMap } from "../../ports/source"

export const argvSourceOptionsSchema = z.strictObject({
  /** Arguments to parse, without the executable and script. Defaults to `process.argv`. */
  argv: z.array(z.string()).optional(),

  /**
   * Reject options that are not registered items.
   *
   * @default true
   */
  strict: z.boolean().default(true),
})

export type ArgvSourceOptions = z.input<typeof argvSourceOptionsSchema>

/**
 * Command-line options, one per item: `max_size` is `--max-size`.
 *
 * Items whose action takes a value need one (`--level debug`); repeating the
 * option contributes once per occurrence, in command-line order. Other items
 * are plain flags (`--verbose`), contributing a mention per occurrence.
 */
export class ArgvSource implements ConfigSource {
  readonly name = "argv"
  private readonly opts: z.output<typeof argvSourceOptionsSchema>

  constructor(options: ArgvSourceOptions = {}) {
    this.opts = argvSourceOptionsSchema.parse(options)
  }

  getConfig(specs: readonly ConfigItemSpec[]): ContributionMap {
    const options: Record<string, Options> = {}

    for (const spec of specs) {
      options[optionName(spec.name)] = spec.action.takesValue
        ? { type: "string", requiresArg: true, describe: spec.help }
        : { type: "count", describe: spec.help }
    }

    const cli = yargs(this.opts.argv ?? hideBin(process.argv))
      .parserConfiguration({
        "camel-case-expansion": false,
        "boolean-negation": false,
      })
      .options(options)
      .help(false)
      .version(false)
      .exitProcess(false)
      .fail((msg, err) => {
        throw err ?? new Error(msg)
      })

    const args = (this.opts.strict ? cli.strict() : cli).parseSync()
    const result: Record<string, unknown[]> = {}

    for (const spec of specs) {
      const contributions = toContributions(spec, args[optionName(spec.name)])

      if (contributions.length > 0) result[spec.name] = contributions
    }

    return result
  }
}

export function optionName(item: string): string {
  return item.replaceAll("_", "-")
}

function toContributions(spec: ConfigItemSpec, value: unknown): unknown[] {
  if (value === undefined) return []

  if (!spec.action.takesValue) {
    return typeof value === "number" ? Array.from({ length: value }, () => MENTIONED) : []
  }

  return Array.isArray(value) ? value.map(String) : [String(value)]
}
