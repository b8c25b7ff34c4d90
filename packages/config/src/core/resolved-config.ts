import type { IResolvedConfig, Namespace } from "../ports/resolved-config"

export class ResolvedConfig implements IResolvedConfig {
  constructor(
    private readonly data: Namespace,
    private readonly provenance: ReadonlyMap<string, string>,
  ) {
    Object.freeze(this.data)
  }

  get value(): Namespace {
    return this.data
  }

  keys(): string[] {
    return Object.keys(this.data)
  }

  has(name: string): boolean {
    return Object.hasOwn(this.data, name)
  }

  get(name: string): unknown {
    return this.has(name) ? this.data[name] : undefined
  }

  explain(name: string): string {
    return this.provenance.get(name) ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(this.keys().map((name) => this.explain(name)))]
  }
}
