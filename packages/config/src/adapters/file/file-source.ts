// adapters/file/file-source.ts
import fs from "node:fs"
import path from "node:path"
import type { FormatTag } from "../../ports/format"
import type { WritableConfigSource } from "../../ports/source"
import { detectFormat } from "./detect-format"

/**
 * Options for creating a file-backed configuration source.
 */
export type FileSourceOptions = {
  /**
   * Path to the file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example "config.json", "./config/app.yaml", ".env.production"
   */
  file: string

  /**
   * Format of the file.
   *
   * @default inferred from the extension
   */
  format?: FormatTag

  /**
   * Identifier used for provenance and as a save target.
   *
   * @default file
   */
  name?: string

  /**
   * Whether the file must exist.
   *
   * - `true`: Reading fails if the file is not found.
   * - `false`: A missing file reads as an empty table.
   *
   * @default true
   */
  required?: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

export class FileSource implements WritableConfigSource {
  readonly name: string
  readonly format: FormatTag
  readonly path: string

  /**
   * @throws SourceError `unknown_format` when no format is given and the
   * extension is not recognised
   */
  constructor(private readonly opts: FileSourceOptions) {
    this.name = opts.name ?? opts.file
    this.format = opts.format ?? detectFormat(opts.file)
    this.path = path.resolve(opts.cwd ?? process.cwd(), opts.file)
  }

  read(): string | undefined {
    try {
      return fs.readFileSync(this.path, "utf-8")
    } catch (err) {
      if (!(this.opts.required ?? true) && isErrnoException(err) && err.code === "ENOENT") {
        return undefined
      }
      throw err
    }
  }

  write(content: string): void {
    fs.writeFileSync(this.path, content, "utf-8")
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err
}
