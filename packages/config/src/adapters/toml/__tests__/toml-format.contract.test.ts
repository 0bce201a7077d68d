import { array, bool, float, int, str, table } from "../../../core/value/value"
import { describeFormatAdapterContract } from "../../../ports/__tests__/format.contract"
import { TomlFormat } from "../toml-format"

describeFormatAdapterContract({
  name: "TomlFormat",
  make: () => new TomlFormat(),
  format: "toml",
  sample: [
    'name = "stratum"',
    "port = 8080",
    "ratio = 0.5",
    "debug = true",
    "",
    "[server]",
    'host = "localhost"',
    'tags = ["a", "b"]',
    "",
  ].join("\n"),
  expected: () =>
    table([
      ["name", str("stratum")],
      ["port", int(8080)],
      ["ratio", float(0.5)],
      ["debug", bool(true)],
      [
        "server",
        table([
          ["host", str("localhost")],
          ["tags", array([str("a"), str("b")])],
        ]),
      ],
    ]),
  malformed: "name = ",
})
