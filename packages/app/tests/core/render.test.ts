import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { makeDisplayValueFormatter } from "../../src/core/display-formatter.js"
import { InvalidArgument } from "../../src/core/errors.js"
import { padRendered, renderValue, visibleWidth } from "../../src/core/render.js"
import { literateTheme } from "../../src/core/theme.js"
import { dateTimeOffsetScalar, integerScalar, otherScalar, sequence, stringScalar } from "../../src/core/value.js"
import { plainJson, scopeCost, taggedJson } from "./fixtures.js"

describe("renderValue", () => {
  it.effect("returns the text together with its invisible count", () =>
    Effect.sync(() => {
      const result = renderValue(taggedJson, integerScalar(1n))
      expect(result).toEqual(Either.right({ text: "<#>1</#>", invisible: scopeCost }))
    }))

  it.effect("maps an absent root value to InvalidArgument", () =>
    Effect.sync(() => {
      const result = renderValue(plainJson, undefined)
      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left).toBeInstanceOf(InvalidArgument)
        expect(result.left.argument).toBe("value")
      }
    }))

  it.effect("renders offset dates at the edges of the Date range", () =>
    Effect.sync(() => {
      expect(renderValue(plainJson, dateTimeOffsetScalar(new Date(8.64e15), 60))).toEqual(
        Either.right({ text: "\"+275760-09-13T01:00:00.000+01:00\"", invisible: 0 })
      )
      expect(renderValue(plainJson, dateTimeOffsetScalar(new Date(-8.64e15), -60))).toEqual(
        Either.right({ text: "\"-271821-04-19T23:00:00.000-01:00\"", invisible: 0 })
      )
    }))

  it.effect("propagates failures other than absent values", () =>
    Effect.sync(() => {
      const exploding = otherScalar({
        toString: () => {
          throw new Error("boom")
        }
      })
      expect(() => renderValue(plainJson, exploding)).toThrow("boom")
    }))

  it.effect("forwards the literal top-level flag", () =>
    Effect.sync(() => {
      const display = makeDisplayValueFormatter(literateTheme, { locale: "en-US" })
      const result = renderValue(display, stringScalar("hi"), undefined, true)
      expect(Either.map(result, (rendered) => visibleWidth(rendered))).toEqual(Either.right(2))
    }))

  it.effect("measures ANSI output by its visible width", () =>
    Effect.sync(() => {
      const result = renderValue(plainJson.switchTheme(literateTheme), sequence([]))
      expect(Either.map(result, (rendered) => rendered.invisible)).toEqual(Either.right(32))
      expect(Either.map(result, visibleWidth)).toEqual(Either.right(2))
    }))
})

describe("padRendered", () => {
  it.effect("pads by visible width, ignoring style codes", () =>
    Effect.sync(() => {
      const padded = padRendered({ text: "<#>1</#>", invisible: scopeCost }, 4)
      expect(padded).toEqual({ text: "<#>1</#>   ", invisible: scopeCost })
      expect(visibleWidth(padded)).toBe(4)
    }))

  it.effect("counts a surrogate pair as one column", () =>
    Effect.sync(() => {
      const rendered = { text: "<s>\"\u{1F600}\"</s>", invisible: scopeCost }
      expect(visibleWidth(rendered)).toBe(3)
      expect(padRendered(rendered, 5).text).toBe("<s>\"\u{1F600}\"</s>  ")
    }))

  it.effect("leaves text at or beyond the width unchanged", () =>
    Effect.sync(() => {
      const rendered = { text: "abcdef", invisible: 0 }
      expect(padRendered(rendered, 3)).toBe(rendered)
      expect(padRendered(rendered, 6)).toBe(rendered)
    }))
})
