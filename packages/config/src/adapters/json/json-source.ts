import { z } from "zod"
import type { ConfigItemSpec } from "../../ports/config-item"
import type { ConfigSource, ContributionMap } from "../../ports/source"
import { readObject } from "../object/object-source"
import { readOptionalFile } from "../utils/read-file"

export const jsonSourceOptionsSchema = z.strictObject({
  /**
   * Path to the JSON file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example "config.json", "./config/app.json"
   */
  file: z.string().min(1),

  /**
   * Whether the file must exist.
   *
   * - `true`: Throws if file not found.
   * - `false`: Contributes nothing if file not found.
   *
   * @default true
   */
  required: z.boolean().default(true),

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd: z.string().optional(),

  /**
   * JSON values that count as a mention of a flag item.
   *
   * @default [null]
   */
  noneValues: z.array(z.unknown()).default([null]),
})

export type JsonSourceOptions = z.input<typeof jsonSourceOptionsSchema>

/**
 * A JSON file holding one object keyed by item name. Values follow the same
 * rules as `ObjectSource`.
 */
export class JsonSource implements ConfigSource {
  readonly name: string
  private readonly opts: z.output<typeof jsonSourceOptionsSchema>

  constructor(options: JsonSourceOptions) {
    this.opts = jsonSourceOptionsSchema.parse(options)
    this.name = `json:${this.opts.file}`
  }

  getConfig(specs: readonly ConfigItemSpec[]): ContributionMap {
    const content = readOptionalFile(this.opts)

    if (content === undefined) return {}

    const parsed: unknown = JSON.parse(content)

    if (!isPlainObject(parsed)) {
      throw new TypeError(`${this.opts.file} must contain a JSON object`)
    }

    return readObject(parsed, specs, this.opts.noneValues)
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}
