import type { ConfigItemSpec } from "./config-item"

/**
 * Raw contributions of one source: item name to the values it found, in the
 * order the source found them. A missing key (or `undefined`) means the
 * source has nothing for that item.
 */
export type ContributionMap = Readonly<Record<string, readonly unknown[] | undefined>>

/**
 * A source of configuration values.
 *
 * A ConfigSource is responsible only for *reading* raw configuration.
 * It does not perform coercion, validation, or merging.
 *
 * Sources are evaluated in registration order; the parser alone decides
 * precedence between them.
 */
export interface ConfigSource {
  /**
   * Human-readable name for debugging and provenance, `kind` or `kind:detail`.
   * Example: "env", "dotenv:.env.defaults", "json:config.json"
   */
  readonly name: string

  /**
   * Read contributions for the given items.
   *
   * - Must depend only on `specs` and the source's external input
   * - Values are raw: env/argv sources return strings, JSON may return anything
   * - Mentions without a value are reported as `MENTIONED`
   * - Throwing aborts the parse with a SourceError
   */
  getConfig(specs: readonly ConfigItemSpec[]): ContributionMap
}

export type SourceConstructor<A extends unknown[] = unknown[]> = new (...args: A) => ConfigSource

export function isConfigSource(value: unknown): value is ConfigSource {
  return (
    typeof value === "object" &&
    value !== null &&
    "getConfig" in value &&
    typeof value.getConfig === "function" &&
    "name" in value &&
    typeof value.name === "string"
  )
}
