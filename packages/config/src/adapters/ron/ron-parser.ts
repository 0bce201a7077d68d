import type { Value } from "../../ports/value"
import { array, bool, float, int, nullValue, str, table } from "../../core/value/value"

export class RonSyntaxError extends SyntaxError {
  constructor(
    message: string,
    readonly line: number,
    readonly column: number,
  ) {
    super(`${message} at line ${line}, column ${column}`)
    this.name = "RonSyntaxError"
  }
}

const IDENT_START = /[A-Za-z_]/
const IDENT_CHAR = /[A-Za-z0-9_]/
const DIGIT = /[0-9]/
const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  n: "\n",
  r: "\r",
  t: "\t",
  "0": "\0",
  "\\": "\\",
  '"': '"',
  "'": "'",
}

/**
 * Parses one RON document.
 *
 * Structs and maps become tables, lists and tuples arrays. `None` and `()`
 * are null, `Some(x)` is `x`, a unit enum variant is its name as a string.
 * Struct and variant names are dropped.
 */
export function parseRon(source: string, ordered: boolean): Value {
  return new RonParser(source, ordered).document()
}

class RonParser {
  private pos = 0

  constructor(
    private readonly src: string,
    private readonly ordered: boolean,
  ) {}

  document(): Value {
    this.skipTrivia()
    while (this.src.startsWith("#!", this.pos)) {
      const end = this.src.indexOf("]", this.pos)
      if (end === -1) this.fail("Unterminated attribute")
      this.pos = end + 1
      this.skipTrivia()
    }

    const value = this.value()
    this.skipTrivia()
    if (this.pos < this.src.length) this.fail(`Unexpected "${this.peek()}"`)

    return value
  }

  private value(): Value {
    this.skipTrivia()
    const c = this.peek()

    if (c === "(") return this.parenthesized(false)
    if (c === "[") return this.list()
    if (c === "{") return this.map()
    if (c === '"') return str(this.quoted())
    if (c === "'") return str(this.char())
    if (c === "r" && (this.peek(1) === '"' || this.peek(1) === "#")) return str(this.raw())
    if (c === "b" && this.peek(1) === '"') {
      this.pos++
      return str(this.quoted())
    }
    if (c !== undefined && (DIGIT.test(c) || c === "+" || c === "-" || c === ".")) return this.number()
    if (c !== undefined && IDENT_START.test(c)) return this.identified()

    return this.fail(c === undefined ? "Unexpected end of input" : `Unexpected "${c}"`)
  }

  private identified(): Value {
    const name = this.ident()

    switch (name) {
      case "true":
        return bool(true)
      case "false":
        return bool(false)
      case "None":
        return nullValue()
      case "inf":
        return float(Number.POSITIVE_INFINITY)
      case "NaN":
        return float(Number.NaN)
      case "Some": {
        this.expect("(")
        const inner = this.value()
        this.skipTrivia()
        this.eat(",")
        this.expect(")")
        return inner
      }
    }

    this.skipTrivia()
    return this.peek() === "(" ? this.parenthesized(true) : str(name)
  }

  /** `()`, a tuple, or a struct body. */
  private parenthesized(named: boolean): Value {
    this.expect("(")
    this.skipTrivia()

    if (this.eat(")")) return named ? table([], this.ordered) : nullValue()

    if (this.startsField()) {
      const entries: Array<[string, Value]> = []
      this.sequence(")", () => {
        const key = this.ident()
        this.expect(":")
        entries.push([key, this.value()])
      })
      return table(entries, this.ordered)
    }

    const items: Value[] = []
    this.sequence(")", () => items.push(this.value()))
    return array(items)
  }

  private startsField(): boolean {
    const start = this.pos
    const c = this.peek()
    if (c === undefined || !IDENT_START.test(c)) return false

    this.ident()
    this.skipTrivia()
    const isField = this.peek() === ":"
    this.pos = start

    return isField
  }

  private list(): Value {
    this.expect("[")
    const items: Value[] = []
    this.sequence("]", () => items.push(this.value()))

    return array(items)
  }

  private map(): Value {
    this.expect("{")
    const entries: Array<[string, Value]> = []
    this.sequence("}", () => {
      const key = this.mapKey(this.value())
      this.expect(":")
      entries.push([key, this.value()])
    })

    return table(entries, this.ordered)
  }

  private mapKey(key: Value): string {
    switch (key.kind) {
      case "string":
        return key.value
      case "bool":
      case "int":
      case "float":
        return String(key.value)
      default:
        return this.fail(`A ${key.kind} cannot be a map key`)
    }
  }

  /** Comma-separated items up to `close`; a trailing comma is allowed. */
  private sequence(close: string, item: () => void): void {
    for (;;) {
      this.skipTrivia()
      if (this.eat(close)) return

      item()
      this.skipTrivia()
      if (this.eat(close)) return
      this.expect(",")
    }
  }

  private number(): Value {
    const start = this.pos
    let sign = ""
    const c = this.peek()
    if (c === "+" || c === "-") {
      sign = c
      this.pos++
    }

    if (this.src.startsWith("inf", this.pos)) {
      this.pos += 3
      return float(sign === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY)
    }
    if (this.src.startsWith("NaN", this.pos)) {
      this.pos += 3
      return float(Number.NaN)
    }

    const radix = this.src.slice(this.pos, this.pos + 2)
    if (radix === "0x" || radix === "0b" || radix === "0o") {
      this.pos += 2
      const digits = this.take(/[0-9A-Fa-f_]/).replaceAll("_", "")
      if (digits === "") this.fail("Missing digits after radix prefix")

      const magnitude = this.bigint(`${radix}${digits}`, start)
      return this.integer(sign === "-" ? -magnitude : magnitude, start)
    }

    let text = this.take(/[0-9_]/)
    let isFloat = false
    if (this.peek() === "." && this.peek(1) !== ".") {
      this.pos++
      text += `.${this.take(/[0-9_]/)}`
      isFloat = true
    }
    const e = this.peek()
    if (e === "e" || e === "E") {
      this.pos++
      let exponent = "e"
      const es = this.peek()
      if (es === "+" || es === "-") {
        exponent += es
        this.pos++
      }
      const digits = this.take(/[0-9_]/)
      if (digits === "") this.fail("Missing exponent digits")
      text += exponent + digits
      isFloat = true
    }

    const clean = text.replaceAll("_", "")
    if (!/[0-9]/.test(clean)) {
      this.pos = start
      this.fail("Invalid number")
    }

    if (isFloat) return float(Number(`${sign}${clean}`))

    return this.integer(this.bigint(`${sign}${clean}`, start), start)
  }

  private bigint(text: string, start: number): bigint {
    try {
      return BigInt(text)
    } catch {
      this.pos = start
      return this.fail(`Invalid integer "${text}"`)
    }
  }

  private integer(value: bigint, start: number): Value {
    if (BigInt.asIntN(64, value) !== value) {
      this.pos = start
      this.fail(`Integer ${value} does not fit in 64 bits`)
    }

    return int(value)
  }

  private quoted(): string {
    this.expect('"')
    let out = ""

    for (;;) {
      const c = this.next()
      if (c === undefined) this.fail("Unterminated string")
      if (c === '"') return out
      out += c === "\\" ? this.escape() : c
    }
  }

  private raw(): string {
    this.expect("r")
    const hashes = this.take(/#/)
    this.expect('"')

    const terminator = `"${hashes}`
    const end = this.src.indexOf(terminator, this.pos)
    if (end === -1) this.fail("Unterminated raw string")

    const out = this.src.slice(this.pos, end)
    this.pos = end + terminator.length
    return out
  }

  private char(): string {
    this.expect("'")
    const c = this.next()
    if (c === undefined) this.fail("Unterminated char")

    const out = c === "\\" ? this.escape() : c
    this.expect("'")
    return out
  }

  private escape(): string {
    const c = this.next()
    if (c === undefined) return this.fail("Unterminated escape")

    const simple = SIMPLE_ESCAPES[c]
    if (simple !== undefined) return simple

    if (c === "x") return this.codePoint(this.src.slice(this.pos, this.pos + 2), 2)
    if (c === "u") {
      this.expect("{")
      const end = this.src.indexOf("}", this.pos)
      if (end === -1) this.fail("Unterminated unicode escape")
      const hex = this.src.slice(this.pos, end)
      const out = this.codePoint(hex, hex.length)
      this.expect("}")
      return out
    }
    if (c === "\n") {
      this.take(/\s/)
      return ""
    }

    return this.fail(`Unknown escape "\\${c}"`)
  }

  private codePoint(hex: string, length: number): string {
    if (!/^[0-9A-Fa-f]{1,6}$/.test(hex)) this.fail(`Invalid escape digits "${hex}"`)

    const point = Number.parseInt(hex, 16)
    if (point > 0x10ffff) this.fail(`Invalid code point "${hex}"`)

    this.pos += length
    return String.fromCodePoint(point)
  }

  private ident(): string {
    const c = this.peek()
    if (c === undefined || !IDENT_START.test(c)) this.fail("Expected an identifier")

    if (this.src.startsWith("r#", this.pos)) this.pos += 2
    return this.take(IDENT_CHAR)
  }

  private skipTrivia(): void {
    for (;;) {
      this.take(/\s/)

      if (this.src.startsWith("//", this.pos)) {
        const end = this.src.indexOf("\n", this.pos)
        this.pos = end === -1 ? this.src.length : end + 1
      } else if (this.src.startsWith("/*", this.pos)) {
        this.blockComment()
      } else {
        return
      }
    }
  }

  private blockComment(): void {
    let depth = 0

    do {
      if (this.src.startsWith("/*", this.pos)) {
        depth++
        this.pos += 2
      } else if (this.src.startsWith("*/", this.pos)) {
        depth--
        this.pos += 2
      } else if (this.pos >= this.src.length) {
        this.fail("Unterminated block comment")
      } else {
        this.pos++
      }
    } while (depth > 0)
  }

  private take(pattern: RegExp): string {
    const start = this.pos
    for (let c = this.peek(); c !== undefined && pattern.test(c); c = this.peek()) {
      this.pos++
    }

    return this.src.slice(start, this.pos)
  }

  private peek(offset = 0): string | undefined {
    return this.src[this.pos + offset]
  }

  private next(): string | undefined {
    const c = this.src[this.pos]
    if (c !== undefined) this.pos++
    return c
  }

  private eat(token: string): boolean {
    if (!this.src.startsWith(token, this.pos)) return false

    this.pos += token.length
    return true
  }

  private expect(token: string): void {
    this.skipTrivia()
    if (!this.eat(token)) {
      const found = this.peek()
      this.fail(`Expected "${token}" but found ${found === undefined ? "end of input" : `"${found}"`}`)
    }
  }

  private fail(message: string): never {
    const before = this.src.slice(0, this.pos)
    const line = before.split("\n").length
    const column = this.pos - before.lastIndexOf("\n")

    throw new RonSyntaxError(message, line, column)
  }
}
