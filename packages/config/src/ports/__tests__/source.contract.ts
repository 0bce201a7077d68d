import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import type { ConfigSource } from "../source"

export type ConfigSourceHarness = {
  name: string
  make: (cwd: string) => Promise<{
    source: ConfigSource
    cleanup?: () => Promise<void>
  }>
  setup: (cwd: string) => Promise<void>
  expectedContent: () => string
}

export function describeConfigSourceContract(h: ConfigSourceHarness) {
  describe(`${h.name} (ConfigSource contract)`, () => {
    let cwd: string
    let source: ConfigSource
    let cleanup: (() => Promise<void>) | undefined

    beforeEach(async () => {
      cwd = await fs.mkdtemp(path.join(os.tmpdir(), "config-test-"))
      await h.setup(cwd)
      const result = await h.make(cwd)

      source = result.source
      cleanup = result.cleanup
    })

    afterEach(async () => {
      await cleanup?.()
      await fs.rm(cwd, { recursive: true, force: true })
    })

    it("has a name", () => {
      expect(typeof source.name).toBe("string")
      expect(source.name).not.toBe("")
    })

    it("has a format tag", () => {
      expect(typeof source.format).toBe("string")
      expect(source.format).not.toBe("")
    })

    it("read() returns a string", () => {
      expect(typeof source.read()).toBe("string")
    })

    it("read() is idempotent", () => {
      expect(source.read()).toBe(source.read())
    })

    it("read() returns expected content", () => {
      expect(source.read()).toBe(h.expectedContent())
    })
  })
}
