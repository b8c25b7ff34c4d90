import { type Logger, NullLogger } from "@layerconf/logger"
import { createSource, type SourceKind, type SourceKindArgs } from "../adapters/registry"
import type { ActionConstructor } from "../ports/action"
import type { AddConfigOptions, ConfigItemSpec } from "../ports/config-item"
import type { Namespace } from "../ports/resolved-config"
import { type ConfigSource, isConfigSource, type SourceConstructor } from "../ports/source"
import { ActionRegistry } from "./actions/registry"
import { createConfigItemSpec } from "./config-item"
import { isConfigError } from "./errors/config-error"
import { SpecError } from "./errors/errors"
import { mergeConfig } from "./merge"
import type { ResolvedConfig } from "./resolved-config"

export type ConfigParserOptions = Readonly<{
  /**
   * Fallback for items that have no default of their own, are not required
   * and whose action has no implicit default. `SUPPRESS` leaves such items
   * out of the namespace.
   */
  configDefault?: unknown
  logger?: Logger
}>

export type ResolveOptions = Readonly<{
  /**
   * Fail when a required item is not found.
   *
   * @default true
   */
  checkRequired?: boolean
}>

/**
 * Collects configuration items and sources, and merges what the sources
 * report into one namespace.
 *
 * @example
 * ```ts
 * const parser = new ConfigParser()
 * parser.addConfig("port", { type: z.coerce.number().int(), default: 8080 })
 * parser.addConfig("verbose", { action: "count" })
 * parser.addSource("json", { file: "config.json", required: false })
 * parser.addSource("env", { prefix: "APP_" })
 * parser.addSource("argv")
 *
 * const config = parser.parseConfig()
 * ```
 */
export class ConfigParser {
  private readonly items = new Map<string, ConfigItemSpec>()
  private readonly sources: ConfigSource[] = []
  private readonly actions = new ActionRegistry()
  private readonly configDefault: unknown
  private readonly logger: Logger
  private parsing = false
  private parses = 0

  constructor(options: ConfigParserOptions = {}) {
    this.configDefault = options.configDefault
    this.logger = (options.logger ?? new NullLogger()).child({ module: "config-parser" })
  }

  /**
   * Registers a configuration item.
   *
   * @throws SpecError when the name is taken or invalid, or the options conflict
   */
  addConfig(name: string, options: AddConfigOptions = {}): ConfigItemSpec {
    this.assertNotParsing()

    if (this.items.has(name)) {
      throw new SpecError(`config item '${name}' is already registered`, {
        context: { item: name },
      })
    }

    const spec = createConfigItemSpec(name, options, {
      actions: this.actions,
      configDefault: this.configDefault,
    })

    this.items.set(name, spec)

    return spec
  }

  /** Makes an action class available to `addConfig` under `name`. */
  registerAction(name: string, action: ActionConstructor): void {
    this.assertNotParsing()
    this.actions.register(name, action)
  }

  /**
   * Appends a source. Later sources take precedence over earlier ones.
   *
   * @throws SpecError for an unknown kind, invalid options, or an object that
   *   is not a source
   */
  addSource<K extends SourceKind>(kind: K, ...args: SourceKindArgs[K]): ConfigSource
  addSource<A extends unknown[]>(source: SourceConstructor<A>, ...args: A): ConfigSource
  addSource(source: ConfigSource): ConfigSource
  addSource(kind: string | SourceConstructor | ConfigSource, ...args: unknown[]): ConfigSource {
    this.assertNotParsing()

    const source = this.instantiate(kind, args)

    this.sources.push(source)

    return source
  }

  /** Registered items, in registration order. */
  configItems(): ConfigItemSpec[] {
    return [...this.items.values()]
  }

  /** Registered sources, lowest precedence first. */
  configSources(): ConfigSource[] {
    return [...this.sources]
  }

  /**
   * Reads every source and returns the frozen namespace.
   *
   * @throws SourceError when a source fails
   * @throws TypeConversionError | InvalidChoiceError when a value is rejected
   * @throws MissingRequiredConfigError when required items are not found
   */
  parseConfig(): Namespace {
    return this.resolveConfig().value
  }

  /** Like `parseConfig`, with missing required items set to `null`. */
  partiallyParseConfig(): Namespace {
    return this.resolveConfig({ checkRequired: false }).value
  }

  /** Parses and keeps track of which source provided each value. */
  resolveConfig(options: ResolveOptions = {}): ResolvedConfig {
    this.assertNotParsing()

    const parseId = `parse-${++this.parses}`
    const logger = this.logger.child({ parseId })

    this.parsing = true

    try {
      return mergeConfig({
        specs: this.configItems(),
        sources: this.configSources(),
        checkRequired: options.checkRequired ?? true,
        logger,
      })
    } catch (err) {
      logger.error("Config parse failed", { err })
      throw err
    } finally {
      this.parsing = false
    }
  }

  private instantiate(
    kind: string | SourceConstructor | ConfigSource,
    args: readonly unknown[],
  ): ConfigSource {
    if (typeof kind === "string") return createSource(kind, args)

    if (typeof kind !== "function") {
      if (!isConfigSource(kind)) {
        throw new SpecError("source must have a name and a getConfig(specs) method")
      }
      return kind
    }

    let source: unknown

    try {
      source = new kind(...args)
    } catch (err) {
      if (isConfigError(err)) throw err

      throw new SpecError(`could not create source ${kind.name}`, { cause: err })
    }

    if (!isConfigSource(source)) {
      throw new SpecError(`${kind.name} does not create a source with a name and getConfig(specs)`)
    }

    return source
  }

  private assertNotParsing(): void {
    if (this.parsing) {
      throw new SpecError("the parser cannot be changed while a parse is in progress")
    }
  }
}
