import path from "node:path"
import { SourceError } from "../../core/errors/source-error"
import type { BuiltinFormat } from "../../ports/format"

const EXTENSIONS: Readonly<Record<string, BuiltinFormat>> = {
  json: "json",
  yaml: "yaml",
  yml: "yaml",
  toml: "toml",
  ini: "ini",
  ron: "ron",
  env: "dotenv",
}

/**
 * Infers a format from a file name. `.env`, `.env.<stage>` and `*.env` are
 * dotenv.
 *
 * @throws SourceError `unknown_format`
 */
export function detectFormat(file: string): BuiltinFormat {
  const base = path.basename(file)
  const format = EXTENSIONS[path.extname(base).slice(1).toLowerCase()]

  if (format !== undefined) return format
  if (base === ".env" || base.startsWith(".env.")) return "dotenv"

  throw SourceError.unknownFormat(file)
}
