import { DotenvFormat } from "../adapters/dotenv/dotenv-format"
import { IniFormat } from "../adapters/ini/ini-format"
import { JsonFormat } from "../adapters/json/json-format"
import { RonFormat } from "../adapters/ron/ron-format"
import { TomlFormat } from "../adapters/toml/toml-format"
import { YamlFormat } from "../adapters/yaml/yaml-format"
import type { FormatAdapter, FormatTag } from "../ports/format"

/**
 * Format adapters keyed by tag. Registering a tag again replaces its adapter.
 */
export class FormatRegistry {
  private readonly adapters = new Map<FormatTag, FormatAdapter>()

  constructor(adapters: Iterable<FormatAdapter> = []) {
    for (const adapter of adapters) this.register(adapter)
  }

  register(adapter: FormatAdapter): this {
    this.adapters.set(adapter.format, adapter)
    return this
  }

  get(format: FormatTag): FormatAdapter | undefined {
    return this.adapters.get(format)
  }

  has(format: FormatTag): boolean {
    return this.adapters.has(format)
  }

  formats(): FormatTag[] {
    return [...this.adapters.keys()]
  }
}

export function defaultFormatAdapters(): FormatAdapter[] {
  return [
    new JsonFormat(),
    new YamlFormat(),
    new TomlFormat(),
    new IniFormat(),
    new RonFormat(),
    new DotenvFormat(),
  ]
}

/**
 * Pass a subset of adapters to leave formats out; sources in a missing
 * format then fail to parse with `format_unavailable`.
 */
export function createFormatRegistry(
  adapters: Iterable<FormatAdapter> = defaultFormatAdapters(),
): FormatRegistry {
  return new FormatRegistry(adapters)
}
