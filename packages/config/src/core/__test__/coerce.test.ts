import type { Value } from "../../ports/value"
import { coerce } from "../coerce/coerce"
import { GetError } from "../errors/get-error"
import { array, bool, float, int, nullValue, str, table } from "../value/value"

function failure(value: Value, kind: Parameters<typeof coerce>[1]): GetError {
  try {
    coerce(value, kind, "key")
  } catch (err) {
    if (err instanceof GetError) return err
    throw err
  }
  throw new Error("expected coercion to fail")
}

describe("coerce", () => {
  describe("exact matches", () => {
    it("returns the stored value", () => {
      expect(coerce(bool(true), "bool", "key")).toBe(true)
      expect(coerce(int(42), "int", "key")).toBe(42)
      expect(coerce(int(42), "bigint", "key")).toBe(42n)
      expect(coerce(float(1.5), "float", "key")).toBe(1.5)
      expect(coerce(str("s"), "string", "key")).toBe("s")
    })

    it("returns native arrays and tables", () => {
      expect(coerce(array([int(1), str("a")]), "array", "key")).toEqual([1, "a"])
      expect(coerce(table([["x", nullValue()]]), "table", "key")).toEqual({ x: null })
    })

    it("returns a copy for the value kind", () => {
      const stored = table([["x", int(1)]])
      const result = coerce(stored, "value", "key")

      expect(result).toEqual(stored)
      expect(result).not.toBe(stored)
    })
  })

  describe("numbers", () => {
    it("widens ints to floats", () => {
      expect(coerce(int(2), "float", "key")).toBe(2)
    })

    it("narrows integral floats to ints", () => {
      expect(coerce(float(3), "int", "key")).toBe(3)
      expect(coerce(float(1e18), "bigint", "key")).toBe(1000000000000000000n)
    })

    it("refuses floats with a fractional part", () => {
      const err = failure(float(1.5), "int")

      expect(err.code).toBe("coercion_failure")
      expect(err.context).toEqual({ path: "key", expected: "int", actual: "float" })
    })

    it("refuses bigints that do not fit in 64 bits", () => {
      const err = failure(float(1e30), "bigint")

      expect(err.code).toBe("coercion_failure")
      expect(err.context).toEqual({ path: "key", expected: "bigint", actual: "float" })
      expect(failure(float(2 ** 63), "bigint").code).toBe("coercion_failure")
      expect(failure(str("99999999999999999999999"), "bigint").context).toEqual({
        path: "key",
        expected: "bigint",
        actual: "string",
      })
    })

    it("refuses ints outside the safe range for the int kind", () => {
      expect(failure(int(2n ** 60n), "int").code).toBe("coercion_failure")
      expect(coerce(int(2n ** 60n), "bigint", "key")).toBe(2n ** 60n)
    })
  })

  describe("strings", () => {
    it.each([
      ["true", true],
      ["T", true],
      ["1", true],
      ["FALSE", false],
      ["f", false],
      ["0", false],
    ])("parses %s as a bool", (text, expected) => {
      expect(coerce(str(text), "bool", "key")).toBe(expected)
    })

    it("parses integers and floats", () => {
      expect(coerce(str("-12"), "int", "key")).toBe(-12)
      expect(coerce(str("9223372036854775807"), "bigint", "key")).toBe(9223372036854775807n)
      expect(coerce(str("-9223372036854775808"), "bigint", "key")).toBe(-9223372036854775808n)
      expect(coerce(str("2.5e1"), "float", "key")).toBe(25)
      expect(coerce(str("-inf"), "float", "key")).toBe(Number.NEGATIVE_INFINITY)
    })

    it("fails to parse with coercion_failure", () => {
      expect(failure(str("yes"), "bool").code).toBe("coercion_failure")
      expect(failure(str("1.5"), "int").code).toBe("coercion_failure")
      expect(failure(str("abc"), "float").code).toBe("coercion_failure")
      expect(failure(str(""), "float").code).toBe("coercion_failure")
    })
  })

  describe("mismatches", () => {
    it.each<[Value, Parameters<typeof coerce>[1]]>([
      [int(1), "string"],
      [bool(true), "string"],
      [bool(true), "int"],
      [int(1), "bool"],
      [nullValue(), "bool"],
      [nullValue(), "string"],
      [table(), "array"],
      [array([]), "table"],
      [str("x"), "array"],
    ])("refuses %o as %s", (value, kind) => {
      expect(failure(value, kind).code).toBe("type_mismatch")
    })
  })
})
