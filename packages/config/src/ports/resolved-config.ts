/**
 * Result of a parse: one read-only attribute per registered item, in
 * registration order.
 */
export type Namespace = Readonly<Record<string, unknown>>

/**
 * A parsed namespace together with where each value came from.
 *
 * @example
 * ```typescript
 * const parser = new ConfigParser()
 * parser.addConfig("port", { type: z.coerce.number(), default: 8080 })
 * parser.addSource("json", { file: "config.json", required: false })
 * parser.addSource("env", { prefix: "APP_" })
 *
 * const resolved = parser.resolveConfig()
 *
 * resolved.value.port      // 3000
 * resolved.explain("port") // "env"
 * ```
 */
export interface IResolvedConfig {
  /** The frozen namespace. */
  readonly value: Namespace

  /** Item names present in the namespace, in registration order. */
  keys(): string[]

  has(name: string): boolean

  get(name: string): unknown

  /**
   * Explains which source provided the final value for an item.
   *
   * @param name - The configuration item name.
   * @returns The last source that contributed to the item, or "default" when
   *   the value is a default (or `null`).
   */
  explain(name: string): string

  /**
   * Returns the distinct provenance names of the namespace's values.
   *
   * @returns Source names (and "default" when defaults were used) in the
   *   order of the items they provided.
   */
  sourcesUsed(): string[]
}
