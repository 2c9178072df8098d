import { Match } from "effect"

import type { Literal } from "./value.js"

// CHANGE: culture-invariant text for every scalar literal kind
// PURITY: CORE
// EFFECT: n/a
// FORMAT THEOREM: ∀x ∈ Float64, isFinite(x): Number(formatFloat64(x)) = x
// FORMAT THEOREM: ∀x ∈ Float32, isFinite(x): fround(Number(formatFloat32(x))) = x
// INVARIANT: no output depends on the host locale; no grouping separators
// COMPLEXITY: O(n)/O(n) in the number of digits

export const isNonFinite = (value: number): boolean => !Number.isFinite(value)

/**
 * Text of NaN and the infinities, matching how `Number.prototype.toString` spells them.
 */
export const nonFiniteText = (value: number): string => {
  if (Number.isNaN(value)) {
    return "NaN"
  }
  return value > 0 ? "Infinity" : "-Infinity"
}

export const formatInteger = (value: bigint): string => value.toString()

export const formatDecimal = (coefficient: bigint, scale: number): string => {
  const negative = coefficient < 0n
  const magnitude = (negative ? -coefficient : coefficient).toString()
  const sign = negative ? "-" : ""
  if (scale <= 0) {
    return `${sign}${magnitude}${"0".repeat(-scale)}`
  }
  const digits = magnitude.padStart(scale + 1, "0")
  const split = digits.length - scale
  return `${sign}${digits.slice(0, split)}.${digits.slice(split)}`
}

export const formatFloat64 = (value: number): string => Object.is(value, -0) ? "-0" : String(value)

const maxSinglePrecisionDigits = 9

/**
 * Shortest decimal text that rounds back to the same 32-bit value.
 *
 * @pure true
 * @invariant Math.fround(Number(result)) === Math.fround(value) for finite input
 * @complexity O(1)
 */
export const formatFloat32 = (value: number): string => {
  const single = Math.fround(value)
  if (Object.is(single, -0)) {
    return "-0"
  }
  for (let precision = 1; precision <= maxSinglePrecisionDigits; precision++) {
    const candidate = Number(single.toPrecision(precision))
    if (Math.fround(candidate) === single) {
      return String(candidate)
    }
  }
  return String(single)
}

const pad2 = (value: number): string => String(Math.trunc(value)).padStart(2, "0")

export const formatOffset = (offsetMinutes: number): string => {
  const sign = offsetMinutes < 0 ? "-" : "+"
  const absolute = Math.abs(offsetMinutes)
  return `${sign}${pad2(absolute / 60)}:${pad2(absolute % 60)}`
}

const invalidDateText = "Invalid Date"

const isValidDate = (value: Date): boolean => !Number.isNaN(value.getTime())

export const formatDateTime = (value: Date): string => isValidDate(value) ? value.toISOString() : invalidDateText

const msPerDay = 86_400_000
const msPerMinute = 60_000

interface CivilDate {
  readonly year: number
  readonly month: number
  readonly day: number
}

// Proleptic Gregorian date of a day count relative to 1970-01-01.
const civilFromDays = (days: number): CivilDate => {
  const shifted = days + 719_468
  const era = Math.floor(shifted / 146_097)
  const dayOfEra = shifted - era * 146_097
  const yearOfEra = Math.floor(
    (dayOfEra - Math.floor(dayOfEra / 1460) + Math.floor(dayOfEra / 36_524) - Math.floor(dayOfEra / 146_096)) / 365
  )
  const dayOfYear = dayOfEra - (365 * yearOfEra + Math.floor(yearOfEra / 4) - Math.floor(yearOfEra / 100))
  const monthIndex = Math.floor((5 * dayOfYear + 2) / 153)
  const day = dayOfYear - Math.floor((153 * monthIndex + 2) / 5) + 1
  const month = monthIndex < 10 ? monthIndex + 3 : monthIndex - 9
  const year = yearOfEra + era * 400 + (month <= 2 ? 1 : 0)
  return { year, month, day }
}

const formatIsoYear = (year: number): string => {
  if (year >= 0 && year <= 9999) {
    return String(year).padStart(4, "0")
  }
  return `${year < 0 ? "-" : "+"}${String(Math.abs(year)).padStart(6, "0")}`
}

/**
 * ISO-8601 text without a zone designator for milliseconds since the epoch.
 *
 * Matches `Date.prototype.toISOString` minus the trailing `Z`, but accepts instants
 * beyond the range a `Date` can hold.
 *
 * @pure true
 * @invariant for |epochMs| <= 8.64e15: result = new Date(epochMs).toISOString().slice(0, -1)
 */
export const formatWallClock = (epochMs: number): string => {
  const days = Math.floor(epochMs / msPerDay)
  const msOfDay = epochMs - days * msPerDay
  const { day, month, year } = civilFromDays(days)
  const hours = Math.floor(msOfDay / 3_600_000)
  const minutes = Math.floor((msOfDay % 3_600_000) / msPerMinute)
  const seconds = Math.floor((msOfDay % msPerMinute) / 1000)
  const millis = msOfDay % 1000
  return `${formatIsoYear(year)}-${pad2(month)}-${pad2(day)}T${pad2(hours)}:${pad2(minutes)}:${pad2(seconds)}.${
    String(millis).padStart(3, "0")
  }`
}

/**
 * Instant shifted into the wall time of `offsetMinutes`, or undefined when the shifted
 * instant falls outside the range of `Date`.
 */
export const wallClockDate = (value: Date, offsetMinutes: number): Date | undefined => {
  const shifted = new Date(value.getTime() + offsetMinutes * msPerMinute)
  return isValidDate(shifted) ? shifted : undefined
}

/**
 * Wall-clock time at the given offset, e.g. `2024-03-01T12:00:00.000+02:00`.
 */
export const formatDateTimeOffset = (value: Date, offsetMinutes: number): string => {
  if (!isValidDate(value)) {
    return invalidDateText
  }
  return `${formatWallClock(value.getTime() + offsetMinutes * msPerMinute)}${formatOffset(offsetMinutes)}`
}

const floatText = (value: number, format: (value: number) => string): string =>
  isNonFinite(value) ? nonFiniteText(value) : format(value)

/**
 * Text representation of any literal, as used for dictionary keys and fallbacks.
 *
 * @pure true
 * @invariant Null renders as "null"
 * @complexity O(n)
 */
export const literalText = (literal: Literal): string =>
  Match.value(literal).pipe(
    Match.tag("Null", () => "null"),
    Match.tag("String", (value) => value.value),
    Match.tag("Boolean", (value) => value.value ? "true" : "false"),
    Match.tag("Char", (value) => value.value),
    Match.tag("Integer", (value) => formatInteger(value.value)),
    Match.tag("Decimal", (value) => formatDecimal(value.coefficient, value.scale)),
    Match.tag("Float32", (value) => floatText(value.value, formatFloat32)),
    Match.tag("Float64", (value) => floatText(value.value, formatFloat64)),
    Match.tag("DateTime", (value) => formatDateTime(value.value)),
    Match.tag("DateTimeOffset", (value) => formatDateTimeOffset(value.value, value.offsetMinutes)),
    Match.tag("Other", (value) => value.value.toString()),
    Match.exhaustive
  )
