import { parse } from "ini"
import { fromNative } from "../../core/value/native"
import type { FormatAdapter, ParseOptions } from "../../ports/format"
import type { Value } from "../../ports/value"

/**
 * INI through `ini`. Sections become tables; values stay strings apart from
 * the `true`, `false` and `null` literals `ini` recognises.
 *
 * Read-only: there is no `serialize`.
 */
export class IniFormat implements FormatAdapter {
  readonly format = "ini"

  parse(content: string, { ordered }: ParseOptions): Value {
    return fromNative(parse(content), { ordered })
  }
}
