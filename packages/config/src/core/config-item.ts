import { z } from "zod"
import { type Action, type ActionConstructor, isAction } from "../ports/action"
import type {
  ActionParams,
  AddConfigOptions,
  Coercion,
  ConfigItemSpec,
} from "../ports/config-item"
import type { ActionRegistry } from "./actions/registry"
import { identity } from "./coerce"
import { isConfigError } from "./errors/config-error"
import { SpecError } from "./errors/errors"

const ITEM_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/

const coercionSchema = z.custom<Coercion>(
  (v) => typeof v === "function" || v instanceof z.ZodType,
  "expected a function or a zod schema",
)

const addConfigOptionsSchema = z.strictObject({
  required: z.boolean().optional(),
  default: z.unknown().optional(),
  action: z
    .union([
      z.string().min(1),
      z.custom<ActionConstructor | Action>(
        (v) => typeof v === "function" || isAction(v),
        "expected an action name, class or instance",
      ),
    ])
    .optional(),
  type: coercionSchema.optional(),
  elementType: coercionSchema.optional(),
  const: z.unknown().optional(),
  choices: z.array(z.unknown()).optional(),
  help: z.string().optional(),
  includeSources: z.array(z.string().min(1)).optional(),
  excludeSources: z.array(z.string().min(1)).optional(),
  params: z.record(z.string(), z.unknown()).optional(),
})

export type ConfigItemContext = Readonly<{
  actions: ActionRegistry
  /** Parser-wide fallback for items without a default of their own. */
  configDefault: unknown
}>

/**
 * Validates `addConfig` arguments and builds the frozen spec.
 *
 * @throws SpecError for any invalid combination
 */
export function createConfigItemSpec(
  name: string,
  options: AddConfigOptions,
  ctx: ConfigItemContext,
): ConfigItemSpec {
  if (!ITEM_NAME.test(name)) {
    throw new SpecError(
      `invalid config item name '${name}'; use letters, digits and underscores, not starting with a digit`,
      { context: { item: name } },
    )
  }

  if (name === "__proto__") {
    throw new SpecError("'__proto__' cannot be used as a config item name", {
      context: { item: name },
    })
  }

  const checked = addConfigOptionsSchema.safeParse(options)

  if (!checked.success) {
    throw new SpecError(`invalid options for config item '${name}':\n${z.prettifyError(checked.error)}`, {
      context: { item: name },
      cause: checked.error,
    })
  }

  const required = options.required ?? false

  if (required && options.default !== undefined) {
    throw new SpecError(`config item '${name}' cannot be both required and have a default`, {
      context: { item: name },
    })
  }

  if (options.includeSources && options.excludeSources) {
    throw new SpecError(
      `config item '${name}' cannot set both includeSources and excludeSources`,
      { context: { item: name } },
    )
  }

  const params: ActionParams = {
    ...options.params,
    ...(options.const !== undefined && { const: options.const }),
    ...(options.elementType !== undefined && { elementType: options.elementType }),
  }
  const action = createAction(name, options.action ?? "store", params, ctx.actions)

  if (!action.takesValue) {
    const unused = (["type", "choices"] as const).find((key) => options[key] !== undefined)

    if (unused) {
      throw new SpecError(`'${unused}' is not used by the ${action.name} action`, {
        context: { item: name },
      })
    }
  }

  if (required && action.implicitDefault !== undefined) {
    throw new SpecError(`config item '${name}' with the ${action.name} action cannot be required`, {
      context: { item: name },
    })
  }

  return Object.freeze({
    name,
    required,
    default: resolveDefault(options, action, required, ctx.configDefault),
    type: options.type ?? identity,
    choices: options.choices && Object.freeze([...options.choices]),
    help: options.help,
    includeSources: options.includeSources && Object.freeze([...options.includeSources]),
    excludeSources: options.excludeSources && Object.freeze([...options.excludeSources]),
    action,
    params: Object.freeze(params),
  })
}

function resolveDefault(
  options: AddConfigOptions,
  action: Action,
  required: boolean,
  configDefault: unknown,
): unknown {
  if (options.default !== undefined) return options.default
  if (action.implicitDefault !== undefined) return action.implicitDefault
  if (!required) return configDefault

  return undefined
}

function createAction(
  item: string,
  kind: string | ActionConstructor | Action,
  params: ActionParams,
  actions: ActionRegistry,
): Action {
  if (typeof kind === "object") return kind

  const ctor = typeof kind === "string" ? actions.resolve(kind) : kind

  if (!ctor) {
    throw new SpecError(
      `unknown action '${String(kind)}' for config item '${item}'; known actions: ${actions.names().join(", ")}`,
      { context: { item } },
    )
  }

  let action: unknown

  try {
    action = new ctor(params)
  } catch (err) {
    if (isConfigError(err)) throw err

    throw new SpecError(`action for config item '${item}' rejected its parameters`, {
      context: { item },
      cause: err,
    })
  }

  if (!isAction(action)) {
    throw new SpecError(`action for config item '${item}' does not implement combine(spec, contributions)`, {
      context: { item },
    })
  }

  return action
}
