import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { makeFormatProvider } from "../../src/core/display-formatter.js"
import { InvalidArgument } from "../../src/core/errors.js"
import type { FormatterState } from "../../src/core/formatter.js"
import { makeJsonValueFormatter } from "../../src/core/json-formatter.js"
import { makeStringOutput } from "../../src/core/output.js"
import { noColorTheme } from "../../src/core/theme.js"
import {
  booleanScalar,
  charScalar,
  dateTimeOffsetScalar,
  dateTimeScalar,
  decimalScalar,
  dictionary,
  entry,
  float32Scalar,
  float64Scalar,
  integerScalar,
  nullScalar,
  otherScalar,
  property,
  sequence,
  stringScalar,
  structure
} from "../../src/core/value.js"
import { capture, plainJson, scopeCost, stripTags, taggedJson } from "./fixtures.js"

const instant = new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 678))

const freshState = (): FormatterState => ({ output: makeStringOutput(), format: undefined, isTopLevel: false })

describe("scalar rendering", () => {
  it.effect("renders null, booleans and strings", () =>
    Effect.sync(() => {
      expect(capture(taggedJson, nullScalar)).toEqual({ text: "<0>null</0>", invisible: scopeCost })
      expect(capture(taggedJson, booleanScalar(true)).text).toBe("<b>true</b>")
      expect(capture(taggedJson, booleanScalar(false)).text).toBe("<b>false</b>")
      expect(capture(taggedJson, stringScalar("say \"hi\"\n")).text).toBe("<s>\"say \\\"hi\\\"\\n\"</s>")
    }))

  it.effect("renders integers of any size exactly", () =>
    Effect.sync(() => {
      expect(capture(taggedJson, integerScalar(12345678901234567890n)).text).toBe("<#>12345678901234567890</#>")
      expect(capture(plainJson, integerScalar(-7n)).text).toBe("-7")
    }))

  it.effect("renders decimals without grouping or exponent", () =>
    Effect.sync(() => {
      expect(capture(taggedJson, decimalScalar(123456789n, 2)).text).toBe("<#>1234567.89</#>")
    }))

  it.effect("renders finite doubles as round-trippable numbers", () =>
    Effect.sync(() => {
      const samples = [0.1, 1 / 3, -2.5e-8, 1234567.5, Number.MAX_VALUE, 1e21]
      for (const sample of samples) {
        const rendered = capture(plainJson, float64Scalar(sample))
        expect(JSON.parse(rendered.text)).toBe(sample)
      }
      expect(capture(taggedJson, float64Scalar(0.1)).text).toBe("<#>0.1</#>")
    }))

  it.effect("renders finite singles at single precision", () =>
    Effect.sync(() => {
      expect(capture(taggedJson, float32Scalar(1 / 3)).text).toBe("<#>0.33333334</#>")
      const samples = [0.1, 2.75, 1e-7, 123456.789].map(Math.fround)
      for (const sample of samples) {
        expect(Math.fround(JSON.parse(capture(plainJson, float32Scalar(sample)).text))).toBe(sample)
      }
    }))

  it.effect("renders NaN and infinities as String-styled quoted text", () =>
    Effect.sync(() => {
      expect(capture(taggedJson, float64Scalar(Number.NaN)).text).toBe("<s>\"NaN\"</s>")
      expect(capture(taggedJson, float64Scalar(Number.POSITIVE_INFINITY)).text).toBe("<s>\"Infinity\"</s>")
      expect(capture(taggedJson, float64Scalar(Number.NEGATIVE_INFINITY)).text).toBe("<s>\"-Infinity\"</s>")
      expect(capture(taggedJson, float32Scalar(Number.NaN)).text).toBe("<s>\"NaN\"</s>")
      expect(capture(taggedJson, float32Scalar(Number.NEGATIVE_INFINITY)).text).toBe("<s>\"-Infinity\"</s>")
    }))

  it.effect("renders characters as one-character strings", () =>
    Effect.sync(() => {
      expect(capture(taggedJson, charScalar("\"")).text).toBe("<s>\"\\\"\"</s>")
      expect(capture(taggedJson, charScalar("x")).text).toBe("<s>\"x\"</s>")
    }))

  it.effect("renders dates as quoted ISO-8601 text", () =>
    Effect.sync(() => {
      expect(capture(taggedJson, dateTimeScalar(instant)).text).toBe("<s>\"2024-01-02T03:04:05.678Z\"</s>")
      expect(capture(plainJson, dateTimeOffsetScalar(instant, 120)).text).toBe("\"2024-01-02T05:04:05.678+02:00\"")
    }))

  it.effect("falls back to the quoted text form of other values", () =>
    Effect.sync(() => {
      const custom = otherScalar({ toString: () => "Version \"1.2\"" })
      expect(capture(taggedJson, custom).text).toBe("<s>\"Version \\\"1.2\\\"\"</s>")
    }))

  it.effect("ignores the format provider for numbers", () =>
    Effect.sync(() => {
      const german = makeJsonValueFormatter(noColorTheme, makeFormatProvider("de-DE"))
      expect(capture(german, float64Scalar(1234567.5)).text).toBe("1234567.5")
      expect(capture(german, decimalScalar(123456789n, 2)).text).toBe("1234567.89")
      expect(capture(german, integerScalar(1234567n)).text).toBe("1234567")
    }))

  it.effect("delegates scalars with an explicit format to the display formatter", () =>
    Effect.sync(() => {
      expect(capture(taggedJson, float64Scalar(1234.5), "N1")).toEqual({ text: "<#>1,234.5</#>", invisible: scopeCost })
      expect(capture(plainJson, stringScalar("raw"), "l").text).toBe("raw")
    }))
})

describe("sequence rendering", () => {
  it.effect("renders an empty sequence as []", () =>
    Effect.sync(() => {
      expect(capture(plainJson, sequence([]))).toEqual({ text: "[]", invisible: 0 })
      expect(capture(taggedJson, sequence([]))).toEqual({ text: "<t>[</t><t>]</t>", invisible: 2 * scopeCost })
    }))

  it.effect("separates elements with comma and space", () =>
    Effect.sync(() => {
      const value = sequence([integerScalar(1n), stringScalar("a"), nullScalar])
      expect(capture(plainJson, value).text).toBe("[1, \"a\", null]")
    }))

  it.effect("accumulates invisible characters of nested values", () =>
    Effect.sync(() => {
      const value = sequence([integerScalar(1n), sequence([])])
      const rendered = capture(taggedJson, value)
      expect(rendered.text).toBe("<t>[</t><#>1</#><t>, </t><t>[</t><t>]</t><t>]</t>")
      expect(rendered.invisible).toBe(6 * scopeCost)
      expect(rendered.text.length - rendered.invisible).toBe("[1, []]".length)
    }))
})

describe("structure rendering", () => {
  it.effect("renders an empty untagged structure as {}", () =>
    Effect.sync(() => {
      expect(capture(plainJson, structure([])).text).toBe("{}")
    }))

  it.effect("renders properties in declared order", () =>
    Effect.sync(() => {
      const value = structure([property("b", integerScalar(2n)), property("a", integerScalar(1n))])
      expect(capture(plainJson, value).text).toBe("{\"b\": 2, \"a\": 1}")
    }))

  it.effect("styles names as Name and punctuation as TertiaryText", () =>
    Effect.sync(() => {
      const value = structure([property("a", integerScalar(1n)), property("b", integerScalar(2n))])
      const rendered = capture(taggedJson, value)
      expect(rendered.text).toBe(
        "<t>{</t><n>\"a\"</n><t>: </t><#>1</#><t>, </t><n>\"b\"</n><t>: </t><#>2</#><t>}</t>"
      )
      expect(rendered.invisible).toBe(9 * scopeCost)
      expect(stripTags(rendered.text)).toBe("{\"a\": 1, \"b\": 2}")
    }))

  it.effect("appends the type tag as a trailing $type member", () =>
    Effect.sync(() => {
      const value = structure([property("x", integerScalar(1n))], "Point")
      expect(capture(plainJson, value).text).toBe("{\"x\": 1, \"$type\": \"Point\"}")
    }))

  it.effect("renders a type tag without properties and without a leading separator", () =>
    Effect.sync(() => {
      const rendered = capture(taggedJson, structure([], "Point"))
      expect(rendered.text).toBe("<t>{</t><n>\"$type\"</n><t>: </t><s>\"Point\"</s><t>}</t>")
      expect(rendered.invisible).toBe(5 * scopeCost)
      expect(stripTags(rendered.text)).toBe("{\"$type\": \"Point\"}")
    }))

  it.effect("escapes property names", () =>
    Effect.sync(() => {
      const value = structure([property("we\"ird\\name", booleanScalar(true))])
      expect(capture(plainJson, value).text).toBe("{\"we\\\"ird\\\\name\": true}")
    }))
})

describe("dictionary rendering", () => {
  it.effect("renders a null key as the text null", () =>
    Effect.sync(() => {
      expect(capture(plainJson, dictionary([entry(nullScalar, integerScalar(5n))])).text).toBe("{\"null\": 5}")
    }))

  it.effect("preserves entry order", () =>
    Effect.sync(() => {
      const value = dictionary([
        entry(stringScalar("zeta"), integerScalar(1n)),
        entry(stringScalar("alpha"), integerScalar(2n)),
        entry(stringScalar("mid"), integerScalar(3n))
      ])
      expect(capture(plainJson, value).text).toBe("{\"zeta\": 1, \"alpha\": 2, \"mid\": 3}")
    }))

  it.effect("quotes keys of any scalar kind with the String style", () =>
    Effect.sync(() => {
      const value = dictionary([
        entry(integerScalar(1n), booleanScalar(true)),
        entry(booleanScalar(false), nullScalar)
      ])
      const rendered = capture(taggedJson, value)
      expect(rendered.text).toBe(
        "<t>{</t><s>\"1\"</s><t>: </t><b>true</b><t>, </t><s>\"false\"</s><t>: </t><0>null</0><t>}</t>"
      )
      expect(rendered.invisible).toBe(9 * scopeCost)
    }))

  it.effect("renders an empty dictionary as {}", () =>
    Effect.sync(() => {
      expect(capture(plainJson, dictionary([])).text).toBe("{}")
    }))
})

describe("nested values", () => {
  it.effect("produces valid JSON for a mixed tree", () =>
    Effect.sync(() => {
      const value = structure([
        property("user", structure([property("id", integerScalar(7n)), property("name", stringScalar("Ada"))], "User")),
        property("tags", sequence([stringScalar("a"), stringScalar("b")])),
        property("scores", dictionary([entry(stringScalar("x"), float64Scalar(0.5))])),
        property("ratio", float64Scalar(Number.NaN))
      ])
      const rendered = capture(taggedJson, value)
      expect(JSON.parse(stripTags(rendered.text))).toEqual({
        user: { id: 7, name: "Ada", $type: "User" },
        tags: ["a", "b"],
        scores: { x: 0.5 },
        ratio: "NaN"
      })
      expect(rendered.text.length - rendered.invisible).toBe(stripTags(rendered.text).length)
    }))
})

describe("absent values", () => {
  it.effect("rejects an absent value at every entry point", () =>
    Effect.sync(() => {
      expect(() => plainJson.visit(freshState(), undefined)).toThrow(InvalidArgument)
      expect(() => plainJson.visit(freshState(), null)).toThrow(InvalidArgument)
      expect(() => plainJson.visitScalar(freshState(), undefined)).toThrow(InvalidArgument)
      expect(() => plainJson.visitSequence(freshState(), null)).toThrow(InvalidArgument)
      expect(() => plainJson.visitStructure(freshState(), undefined)).toThrow(InvalidArgument)
      expect(() => plainJson.visitDictionary(freshState(), null)).toThrow(InvalidArgument)
    }))

  it.effect("names the missing argument", () =>
    Effect.sync(() => {
      expect(() => plainJson.visitSequence(freshState(), undefined)).toThrow("Value cannot be absent: sequence")
    }))
})

describe("switchTheme", () => {
  it.effect("returns a new formatter that differs only in style codes", () =>
    Effect.sync(() => {
      const switched = taggedJson.switchTheme(noColorTheme)
      const value = structure([
        property("list", sequence([integerScalar(1n), stringScalar("two")])),
        property("map", dictionary([entry(nullScalar, booleanScalar(true))]))
      ], "Sample")
      const tagged = capture(taggedJson, value)
      const plain = capture(switched, value)
      expect(plain.invisible).toBe(0)
      expect(plain.text).toBe(stripTags(tagged.text))
      expect(switched.theme).toBe(noColorTheme)
      expect(taggedJson.theme.name).toBe("tags")
    }))

  it.effect("keeps the format provider", () =>
    Effect.sync(() => {
      const german = makeJsonValueFormatter(noColorTheme, makeFormatProvider("de-DE"))
      const switched = german.switchTheme(noColorTheme)
      expect(capture(switched, float64Scalar(1234.5), "N1").text).toBe("1.234,5")
    }))
})
