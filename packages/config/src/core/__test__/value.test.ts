import type { Value } from "../../ports/value"
import { formatValue } from "../value/format-value"
import { fromNative, toNative } from "../value/native"
import { lookup, parsePath, setPath } from "../value/path"
import {
  array,
  bool,
  cloneValue,
  float,
  int,
  nullValue,
  str,
  table,
  tableEntries,
  tableKeys,
  valueEquals,
} from "../value/value"

describe("value tree", () => {
  describe("table", () => {
    it("keeps the first position of a repeated key", () => {
      const t = table([
        ["a", int(1)],
        ["b", int(2)],
        ["a", int(3)],
      ])

      expect(tableEntries(t)).toEqual([
        ["a", int(3)],
        ["b", int(2)],
      ])
    })

    it("iterates sorted by key when unordered", () => {
      const t = table(
        [
          ["zeta", int(1)],
          ["alpha", int(2)],
          ["mid", int(3)],
        ],
        false,
      )

      expect(tableKeys(t)).toEqual(["alpha", "mid", "zeta"])
    })
  })

  describe("int", () => {
    it("rejects fractions", () => {
      expect(() => int(1.5)).toThrow(RangeError)
    })

    it("rejects values beyond 64 bits", () => {
      expect(() => int(2n ** 63n)).toThrow(RangeError)
      expect(int(-(2n ** 63n)).value).toBe(-(2n ** 63n))
    })
  })

  describe("valueEquals", () => {
    it("ignores table key order", () => {
      const a = table([
        ["x", int(1)],
        ["y", int(2)],
      ])
      const b = table([
        ["y", int(2)],
        ["x", int(1)],
      ])

      expect(valueEquals(a, b)).toBe(true)
    })

    it("tells ints and floats apart", () => {
      expect(valueEquals(int(1), float(1))).toBe(false)
    })

    it("treats NaN as equal to itself", () => {
      expect(valueEquals(float(Number.NaN), float(Number.NaN))).toBe(true)
    })

    it("compares arrays element-wise", () => {
      expect(valueEquals(array([int(1), str("a")]), array([int(1), str("a")]))).toBe(true)
      expect(valueEquals(array([int(1)]), array([int(1), int(2)]))).toBe(false)
    })
  })

  describe("cloneValue", () => {
    it("copies nested containers", () => {
      const inner = table([["x", array([int(1)])]])
      const original = table([["inner", inner]])
      const clone = cloneValue(original)

      expect(valueEquals(clone, original)).toBe(true)
      expect(clone.entries).not.toBe(original.entries)
      expect(clone.entries.get("inner")).not.toBe(inner)
    })
  })

  describe("fromNative", () => {
    it("infers ints from integral numbers", () => {
      expect(fromNative({ a: 1, b: 1.5 })).toEqual(
        table([
          ["a", int(1)],
          ["b", float(1.5)],
        ]),
      )
    })

    it("treats every number as a float in float mode", () => {
      expect(fromNative({ a: 1, b: 2n }, { numbers: "float" })).toEqual(
        table([
          ["a", float(1)],
          ["b", int(2)],
        ]),
      )
    })

    it("converts dates, maps and null-prototype objects", () => {
      const bare: Record<string, unknown> = Object.create(null)
      bare.k = "v"

      const value = fromNative({
        at: new Date("2025-03-02T08:00:00.000Z"),
        map: new Map([[1, true]]),
        bare,
      })

      expect(value).toEqual(
        table([
          ["at", str("2025-03-02T08:00:00.000Z")],
          ["map", table([["1", bool(true)]])],
          ["bare", table([["k", str("v")]])],
        ]),
      )
    })

    it("rejects functions with their path", () => {
      expect(() => fromNative({ a: { b: () => 1 } })).toThrow(
        'Cannot represent function at "a.b" as a config value',
      )
    })
  })

  describe("toNative", () => {
    it("returns safe ints as numbers and larger ones as bigints", () => {
      const value = table([
        ["small", int(7)],
        ["large", int(2n ** 60n)],
        ["list", array([nullValue(), bool(false)])],
      ])

      expect(toNative(value)).toEqual({ small: 7, large: 2n ** 60n, list: [null, false] })
    })

    it("returns every int as a bigint when asked", () => {
      const value = table([
        ["port", int(80)],
        ["ratio", float(2)],
        ["list", array([int(1)])],
      ])

      expect(toNative(value, { ints: "bigint" })).toEqual({ port: 80n, ratio: 2, list: [1n] })
    })
  })

  describe("paths", () => {
    const root = table([
      [
        "server",
        table([
          ["hosts", array([str("a"), str("b")])],
          ["port", int(80)],
        ]),
      ],
    ])

    it("splits on dots and treats the empty path as the root", () => {
      expect(parsePath("a.b.0")).toEqual(["a", "b", "0"])
      expect(parsePath("")).toEqual([])
      expect(lookup(root, "")).toBe(root)
    })

    it("indexes arrays with numeric segments", () => {
      expect(lookup(root, "server.hosts.1")).toEqual(str("b"))
      expect(lookup(root, "server.hosts.2")).toBeUndefined()
      expect(lookup(root, "server.hosts.01")).toBeUndefined()
      expect(lookup(root, "server.hosts.first")).toBeUndefined()
    })

    it("finds nothing below a scalar", () => {
      expect(lookup(root, "server.port.value")).toBeUndefined()
    })

    it("creates intermediate tables", () => {
      const updated = setPath(table(), "a.b.c", int(1))

      expect(updated).toEqual(table([["a", table([["b", table([["c", int(1)]])]])]]))
    })

    it("replaces scalars and arrays in the way", () => {
      const updated = setPath(root, "server.hosts.extra", bool(true))

      expect(lookup(updated, "server.hosts")).toEqual(table([["extra", bool(true)]]))
      expect(lookup(updated, "server.port")).toEqual(int(80))
    })

    it("leaves its input untouched", () => {
      const before = cloneValue(root)
      setPath(root, "server.port", int(81))

      expect(valueEquals(root, before)).toBe(true)
    })

    it("rejects the empty path", () => {
      expect(() => setPath(root, "", int(1))).toThrow(RangeError)
    })
  })

  describe("formatValue", () => {
    it("renders every kind", () => {
      const value: Value = table([
        ["name", str("x")],
        ["list", array([int(1), float(2.5), nullValue()])],
        ["flag", bool(true)],
      ])

      expect(formatValue(value)).toBe('{(name: "x"), (list: [1, 2.5, null]), (flag: true)}')
    })
  })
})
