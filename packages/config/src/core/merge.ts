import type { Logger } from "@layerconf/logger"
import { z } from "zod"
import type { ConfigItemSpec } from "../ports/config-item"
import type { ConfigSource } from "../ports/source"
import { ResolvedConfig } from "./resolved-config"
import { MissingRequiredConfigError, SourceError, SpecError } from "./errors/errors"
import { SUPPRESS } from "./markers"

const contributionMapSchema = z.record(z.string(), z.array(z.unknown()).optional())

export type MergeInput = Readonly<{
  specs: readonly ConfigItemSpec[]
  sources: readonly ConfigSource[]
  /** When false, missing required items become `null` instead of failing. */
  checkRequired: boolean
  logger: Logger
}>

/**
 * Runs one parse: reads every source in order, combines each item's
 * contributions with its action and applies the required/default policy.
 *
 * Either returns a complete result or throws; nothing partial escapes.
 */
export function mergeConfig({
  specs,
  sources,
  checkRequired,
  logger,
}: MergeInput): ResolvedConfig {
  const contributions = new Map<string, unknown[]>(specs.map((spec) => [spec.name, []]))
  const provenance = new Map<string, string>()

  for (const source of sources) {
    const applicable = specs.filter((spec) => appliesTo(spec, source.name))
    const values = readSource(source, applicable)
    const known = new Set(applicable.map((spec) => spec.name))
    let items = 0

    for (const [name, raw] of Object.entries(values)) {
      if (raw === undefined || raw.length === 0) continue

      if (!known.has(name)) {
        logger.debug("Ignoring contribution for unregistered item", {
          source: source.name,
          item: name,
        })
        continue
      }

      contributions.get(name)?.push(...raw)
      provenance.set(name, source.name)
      items += 1
    }

    logger.debug("Config source read", { source: source.name, items })
  }

  const entries: [string, unknown][] = []
  const missing: string[] = []

  for (const spec of specs) {
    const result = spec.action.combine(spec, contributions.get(spec.name) ?? [])

    if (result.found) {
      entries.push([spec.name, result.value])
      continue
    }

    provenance.delete(spec.name)

    if (spec.required) {
      missing.push(spec.name)
      entries.push([spec.name, null])
      continue
    }

    if (spec.default !== SUPPRESS) {
      entries.push([spec.name, spec.default ?? null])
    }
  }

  if (missing.length > 0) {
    logger.warn("Required config items not found", { items: missing })

    if (checkRequired) {
      throw new MissingRequiredConfigError(missing)
    }
  }

  const config = new ResolvedConfig(Object.fromEntries(entries), provenance)

  logger.info("Config parsed", { items: entries.length, sources: config.sourcesUsed() })

  return config
}

function readSource(source: ConfigSource, specs: readonly ConfigItemSpec[]) {
  let raw: unknown

  try {
    raw = source.getConfig(specs)
  } catch (err) {
    if (err instanceof SpecError) throw err

    throw new SourceError(source.name, err)
  }

  const parsed = contributionMapSchema.safeParse(raw)

  if (!parsed.success) {
    throw new SourceError(source.name, parsed.error)
  }

  return parsed.data
}

/**
 * Whether the item is read from the source. A filter entry matches the full
 * source name ("json:app.json") or its kind ("json").
 */
export function appliesTo(spec: ConfigItemSpec, sourceName: string): boolean {
  const matches = (pattern: string) =>
    sourceName === pattern || sourceName.startsWith(`${pattern}:`)

  if (spec.excludeSources) return !spec.excludeSources.some(matches)
  if (spec.includeSources) return spec.includeSources.some(matches)

  return true
}
