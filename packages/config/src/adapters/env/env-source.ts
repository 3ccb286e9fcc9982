import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /**
   * Only variables starting with this prefix are read, and the prefix is
   * stripped from the resulting keys.
   */
  prefix?: string

  /**
   * @default process.env
   */
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor({ prefix = "", env = process.env }: EnvSourceOptions = {}) {
    this.name = prefix ? `env:${prefix}` : "env"
    this.prefix = prefix
    this.env = env
  }

  async load(): Promise<Record<string, unknown>> {
    const out: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(this.prefix)) out[key.slice(this.prefix.length)] = value
    }

    return out
  }
}
