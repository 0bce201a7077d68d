import { Writable } from "node:stream"
import { PinoLogger } from "@stratum/logger"

export function captureLogs() {
  const lines: Record<string, unknown>[] = []

  const destination = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(JSON.parse(line))
      callback()
    },
  })

  return { lines, logger: new PinoLogger({ destination }, { level: "debug" }) }
}
