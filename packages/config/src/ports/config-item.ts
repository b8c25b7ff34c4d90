import type { ZodType } from "zod"
import type { Action, ActionConstructor } from "./action"

export type CoercionFn = (raw: unknown) => unknown

/**
 * Converts one raw contribution into the item's value.
 *
 * Either a plain function that throws on bad input, or a zod schema
 * (e.g. `z.coerce.number().int()`), whose failures are reported the same way.
 */
export type Coercion = CoercionFn | ZodType

/**
 * Parameters handed to an action's constructor.
 *
 * Built-in actions understand `const` (store_const) and `elementType`
 * (append, extend). User-defined actions receive anything passed through
 * `params` as well.
 */
export type ActionParams = Readonly<{
  const?: unknown
  elementType?: Coercion
  [key: string]: unknown
}>

/**
 * Options accepted by `ConfigParser.addConfig`.
 *
 * @example
 * ```ts
 * parser.addConfig("port", { type: z.coerce.number().int(), default: 8080 })
 * parser.addConfig("verbose", { action: "count" })
 * parser.addConfig("plugin", { action: "append", excludeSources: ["env"] })
 * ```
 */
export type AddConfigOptions = {
  /** Fail the parse when no source contributes. Cannot be combined with `default`. */
  required?: boolean

  /**
   * Value used when no source contributes. Used as is, never coerced.
   * Pass `SUPPRESS` to leave the item out of the namespace instead.
   */
  default?: unknown

  /**
   * How contributions from all sources combine into one value.
   *
   * A built-in name ("store", "store_const", "store_true", "store_false",
   * "append", "extend", "count"), a name registered with
   * `registerAction`, an action class, or an action instance.
   *
   * @default "store"
   */
  action?: string | ActionConstructor | Action

  /** Applied to every raw contribution the action keeps. Defaults to identity. */
  type?: Coercion

  /** Applied to each element of append/extend values instead of `type`. */
  elementType?: Coercion

  /** Value stored by store_const when the item is mentioned. */
  const?: unknown

  /** Coerced values must be one of these. */
  choices?: readonly unknown[]

  /** Shown as the description of the command-line option. */
  help?: string

  /** Only these sources are asked for the item. Matches a source name or its kind prefix. */
  includeSources?: readonly string[]

  /** These sources are never asked for the item. */
  excludeSources?: readonly string[]

  /** Extra parameters for user-defined actions. */
  params?: Readonly<Record<string, unknown>>
}

/**
 * Immutable description of one registered configuration item.
 */
export type ConfigItemSpec = Readonly<{
  name: string
  required: boolean
  /** Fallback when nothing was found. `undefined` means the namespace gets `null`. */
  default: unknown
  type: Coercion
  choices?: readonly unknown[]
  help?: string
  includeSources?: readonly string[]
  excludeSources?: readonly string[]
  action: Action
  params: ActionParams
}>
