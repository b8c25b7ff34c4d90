import { parse } from "dotenv"
import { z } from "zod"
import type { ConfigItemSpec } from "../../ports/config-item"
import type { ConfigSource, ContributionMap } from "../../ports/source"
import { envSourceOptionsSchema, readVariables } from "../env/env-source"
import { readOptionalFile } from "../utils/read-file"

export const dotenvSourceOptionsSchema = envSourceOptionsSchema.omit({ env: true }).extend({
  /**
   * Path to the .env file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example ".env", ".env.production", "./config/.env.defaults"
   */
  file: z.string().min(1),

  /**
   * Whether the file must exist.
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
})

export type DotenvSourceOptions = z.input<typeof dotenvSourceOptionsSchema>

/**
 * A .env file, read with the same naming and flag rules as `EnvSource`.
 * The file never touches `process.env`.
 */
export class DotenvSource implements ConfigSource {
  readonly name: string
  private readonly opts: z.output<typeof dotenvSourceOptionsSchema>

  constructor(options: DotenvSourceOptions) {
    this.opts = dotenvSourceOptionsSchema.parse(options)
    this.name = `dotenv:${this.opts.file}`
  }

  getConfig(specs: readonly ConfigItemSpec[]): ContributionMap {
    const content = readOptionalFile(this.opts)

    if (content === undefined) return {}

    return readVariables(parse(content), specs, this.opts)
  }
}
