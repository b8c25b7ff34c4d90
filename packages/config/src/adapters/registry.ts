import { z } from "zod"
import { SpecError } from "../core/errors/errors"
import type { ConfigSource } from "../ports/source"
import { ArgvSource, type ArgvSourceOptions, argvSourceOptionsSchema } from "./argv/argv-source"
import {
  DotenvSource,
  type DotenvSourceOptions,
  dotenvSourceOptionsSchema,
} from "./dotenv/dotenv-source"
import { EnvSource, type EnvSourceOptions, envSourceOptionsSchema } from "./env/env-source"
import { JsonSource, type JsonSourceOptions, jsonSourceOptionsSchema } from "./json/json-source"
import {
  ObjectSource,
  type ObjectSourceOptions,
  objectSourceOptionsSchema,
} from "./object/object-source"

/** Constructor arguments of each source kind `addSource` knows by name. */
export type SourceKindArgs = {
  object: [values: Readonly<Record<string, unknown>>, options?: ObjectSourceOptions]
  json: [options: JsonSourceOptions]
  env: [options?: EnvSourceOptions]
  dotenv: [options: DotenvSourceOptions]
  argv: [options?: ArgvSourceOptions]
}

export type SourceKind = keyof SourceKindArgs

const objectValues = z.record(z.string(), z.unknown())

const builtinSources: {
  [K in SourceKind]: (args: readonly unknown[]) => ConfigSource
} = {
  object: (args) =>
    new ObjectSource(objectValues.parse(args[0]), objectSourceOptionsSchema.optional().parse(args[1])),
  json: (args) => new JsonSource(jsonSourceOptionsSchema.parse(args[0])),
  env: (args) => new EnvSource(envSourceOptionsSchema.optional().parse(args[0])),
  dotenv: (args) => new DotenvSource(dotenvSourceOptionsSchema.parse(args[0])),
  argv: (args) => new ArgvSource(argvSourceOptionsSchema.optional().parse(args[0])),
}

export function isSourceKind(kind: string): kind is SourceKind {
  return Object.hasOwn(builtinSources, kind)
}

export function sourceKinds(): SourceKind[] {
  return Object.keys(builtinSources).filter(isSourceKind)
}

/**
 * Creates a built-in source by kind name.
 *
 * @throws SpecError for an unknown kind or invalid options
 */
export function createSource(kind: string, args: readonly unknown[]): ConfigSource {
  if (!isSourceKind(kind)) {
    throw new SpecError(`unknown source kind '${kind}'; known kinds: ${sourceKinds().join(", ")}`, {
      context: { source: kind },
    })
  }

  try {
    return builtinSources[kind](args)
  } catch (err) {
    if (err instanceof z.ZodError) {
      throw new SpecError(`invalid options for source '${kind}':\n${z.prettifyError(err)}`, {
        context: { source: kind },
        cause: err,
      })
    }
    throw err
  }
}
