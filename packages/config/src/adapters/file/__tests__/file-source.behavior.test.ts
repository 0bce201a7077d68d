import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { SourceError } from "../../../core/errors/source-error"
import { FileSource } from "../file-source"

describe("FileSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "file-source-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("infers the format from the extension", () => {
    expect(new FileSource({ file: "settings.yml", cwd }).format).toBe("yaml")
  })

  it("prefers an explicit format", () => {
    expect(new FileSource({ file: "settings.conf", format: "ini", cwd }).format).toBe("ini")
  })

  it("is named after the file unless a name is given", () => {
    expect(new FileSource({ file: "config/app.json", cwd }).name).toBe("config/app.json")
    expect(new FileSource({ file: "config/app.json", name: "app", cwd }).name).toBe("app")
  })

  it("throws on an unknown extension", () => {
    expect(() => new FileSource({ file: "settings.conf", cwd })).toThrow(SourceError)
  })

  it("reads undefined when the file is missing and not required", () => {
    const source = new FileSource({ file: "config.json", required: false, cwd })

    expect(source.read()).toBeUndefined()
  })

  it("throws when the file is missing and required", () => {
    const source = new FileSource({ file: "config.json", cwd })

    expect(() => source.read()).toThrow(expect.objectContaining({ code: "ENOENT" }))
  })

  it("resolves path relative to cwd", async () => {
    const subdir = path.join(cwd, "config")
    await fs.mkdir(subdir)
    await fs.writeFile(path.join(subdir, "app.json"), '{"KEY":"value"}')

    const source = new FileSource({ file: "app.json", cwd: subdir })

    expect(source.path).toBe(path.join(subdir, "app.json"))
    expect(source.read()).toBe('{"KEY":"value"}')
  })

  it("sees changes on disk on every read", async () => {
    const file = path.join(cwd, "config.json")
    await fs.writeFile(file, '{"v":1}')
    const source = new FileSource({ file: "config.json", cwd })

    expect(source.read()).toBe('{"v":1}')

    await fs.writeFile(file, '{"v":2}')

    expect(source.read()).toBe('{"v":2}')
  })

  it("writes content to the resolved path", async () => {
    const source = new FileSource({ file: "out.toml", required: false, cwd })

    source.write('a = 1\n')

    expect(await fs.readFile(path.join(cwd, "out.toml"), "utf-8")).toBe("a = 1\n")
  })
})
