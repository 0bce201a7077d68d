import { EnvOverride, type EnvOverrideOptions } from "../adapters/env/env-override"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { BuildError } from "./errors/build-error"
import { ParseError } from "./errors/parse-error"
import { type LoadedLayers, loadLayers } from "./load"
import { type ConfigBuilderOptions, type ResolvedBuilderOptions, resolveBuilderOptions } from "./options"

/**
 * Collects sources in priority order. Sources added later override earlier
 * ones; the env override always applies above every source, and restored
 * changes above that.
 *
 * @example
 * ```typescript
 * const config = Config.builder({ logger })
 *   .add(new FileSource({ file: "defaults.toml" }))
 *   .add(new StringSource("inline", "json", '{"debug":true}'))
 *   .env({ prefix: "APP_" })
 *   .restore(new FileSource({ file: "changes.json", required: false }))
 *   .build()
 * ```
 */
export class ConfigBuilder {
  private readonly options: ResolvedBuilderOptions
  private readonly sources: ConfigSource[] = []
  private readonly restores: ConfigSource[] = []
  private envOverride: EnvOverride | undefined

  constructor(options: ConfigBuilderOptions = {}) {
    this.options = resolveBuilderOptions(options)
  }

  add(source: ConfigSource): this {
    this.sources.push(source)
    return this
  }

  env(options: EnvOverrideOptions): this {
    this.envOverride = new EnvOverride(options)
    return this
  }

  restore(source: ConfigSource): this {
    this.restores.push(source)
    return this
  }

  /**
   * @throws BuildError `build_parse_failed` with the `ParseError` as cause,
   * or `root_not_table`
   */
  build(): Config {
    const started = Date.now()
    const { formats, ordered, logger } = this.options
    const sources = [...this.sources]

    const loaded = asBuildError((): LoadedLayers => loadLayers(sources, this.envOverride, this.options))
    const config = new Config({ sources, envOverride: this.envOverride, formats, ordered, logger }, loaded)

    for (const source of this.restores) {
      asBuildError(() => config.restore(source))
    }

    logger.info("config built", {
      operation: "build",
      durationMs: Date.now() - started,
      sources: sources.length,
      env: this.envOverride !== undefined,
    })

    return config
  }
}

function asBuildError<T>(step: () => T): T {
  try {
    return step()
  } catch (err) {
    throw err instanceof ParseError ? BuildError.parseFailed(err) : err
  }
}
