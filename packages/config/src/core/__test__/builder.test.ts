import { JsonFormat } from "../../adapters/json/json-format"
import { StringSource } from "../../adapters/string/string-source"
import { ConfigBuilder } from "../builder"
import { Config } from "../config"
import { BuildError } from "../errors/build-error"
import { ParseError } from "../errors/parse-error"
import { createFormatRegistry } from "../format-registry"
import { captureLogs } from "./log-capture"

function buildError(builder: ConfigBuilder): BuildError {
  try {
    builder.build()
  } catch (err) {
    if (err instanceof BuildError) return err
    throw err
  }
  throw new Error("expected build to fail")
}

describe("ConfigBuilder", () => {
  it("is returned by Config.builder()", () => {
    expect(Config.builder()).toBeInstanceOf(ConfigBuilder)
  })

  it("builds an empty config from no sources", () => {
    const config = Config.builder().build()

    expect(config.keys()).toEqual([])
    expect(config.sourcesUsed()).toEqual([])
  })

  it("fails fast on the first unparsable source", () => {
    const err = buildError(
      Config.builder()
        .add(new StringSource("good", "json", "{}"))
        .add(new StringSource("bad", "json", "{ nope"))
        .add(new StringSource("worse", "yaml", "[")),
    )

    expect(err.code).toBe("build_parse_failed")
    expect(err.context).toEqual({ source: "bad" })
    expect(err.cause).toBeInstanceOf(ParseError)
    expect(err.cause).toMatchObject({ code: "parse_failed", context: { source: "bad", format: "json" } })
  })

  it("fails when a source's format is not registered", () => {
    const err = buildError(
      Config.builder({ formats: createFormatRegistry([new JsonFormat()]) }).add(
        new StringSource("settings", "yaml", "a: 1"),
      ),
    )

    expect(err.code).toBe("build_parse_failed")
    expect(err.cause).toMatchObject({ code: "format_unavailable" })
  })

  it("fails when a source does not hold a table", () => {
    const err = buildError(Config.builder().add(new StringSource("list", "json", "[1, 2]")))

    expect(err.code).toBe("root_not_table")
    expect(err.context).toEqual({ source: "list", kind: "array" })
  })

  it("treats restore parse failures as build failures", () => {
    const err = buildError(
      Config.builder()
        .add(new StringSource("base", "json", '{"a":1}'))
        .restore(new StringSource("saved", "json", "{ nope")),
    )

    expect(err.code).toBe("build_parse_failed")
    expect(err.context).toEqual({ source: "saved" })
  })

  it("lets env create paths no source defines", () => {
    const config = Config.builder()
      .add(new StringSource("base", "json", '{"server":{"port":80}}'))
      .env({ prefix: "APP_", env: { APP_DB_POOL: "5", APP_SERVER_HOST: "db" } })
      .build()

    expect(config.get("db.pool", "int")).toBe(5)
    expect(config.get("server", "table")).toEqual({ port: 80, host: "db" })
    expect(config.explain("db.pool")).toBe("env")
  })

  it("applies restored changes above env", () => {
    const config = Config.builder()
      .add(new StringSource("base", "json", '{"a":1,"b":1}'))
      .env({ prefix: "APP_", env: { APP_A: "2" } })
      .restore(new StringSource("saved", "json", '{"a":3,"c":4}'))
      .build()

    expect(config.get("a", "int")).toBe(3)
    expect(config.has("c")).toBe(false)
    expect(config.explain("a")).toBe("changes")
  })

  it("logs each parsed source and the finished build", () => {
    const { lines, logger } = captureLogs()

    Config.builder({ logger })
      .add(new StringSource("base", "json", '{"a":1,"b":2}'))
      .env({ prefix: "APP_", env: {} })
      .build()

    expect(lines).toEqual([
      expect.objectContaining({
        level: 20,
        msg: "source parsed",
        module: "config",
        source: "base",
        format: "json",
        keys: 2,
      }),
      expect.objectContaining({
        level: 30,
        msg: "config built",
        module: "config",
        operation: "build",
        sources: 1,
        env: true,
      }),
    ])
  })

  it("warns when a reload fails", () => {
    const { lines, logger } = captureLogs()
    let content = '{"a":1}'
    const config = Config.builder({ logger })
      .add({ name: "live", format: "json", read: () => content })
      .build()

    content = "{ nope"

    expect(() => config.reload()).toThrow()
    expect(lines.at(-1)).toMatchObject({
      level: 40,
      msg: "config reload failed, keeping previous state",
      operation: "reload",
      err: { type: "ParseError" },
    })
  })
})
