// CHANGE: closed value model for structured log event properties
// PURITY: CORE
// EFFECT: n/a
// FORMAT THEOREM: ∀v ∈ Value: v._tag ∈ {Scalar, Sequence, Structure, Dictionary}
// INVARIANT: property and entry order is the order given by the producer
// COMPLEXITY: O(1)/O(1)

export interface Textual {
  readonly toString: () => string
}

export type Literal =
  | { readonly _tag: "Null" }
  | { readonly _tag: "String"; readonly value: string }
  | { readonly _tag: "Boolean"; readonly value: boolean }
  | { readonly _tag: "Char"; readonly value: string }
  | { readonly _tag: "Integer"; readonly value: bigint }
  | { readonly _tag: "Decimal"; readonly coefficient: bigint; readonly scale: number }
  | { readonly _tag: "Float32"; readonly value: number }
  | { readonly _tag: "Float64"; readonly value: number }
  | { readonly _tag: "DateTime"; readonly value: Date }
  | { readonly _tag: "DateTimeOffset"; readonly value: Date; readonly offsetMinutes: number }
  | { readonly _tag: "Other"; readonly value: Textual }

export type LiteralTag = Literal["_tag"]

export interface ScalarValue {
  readonly _tag: "Scalar"
  readonly literal: Literal
}

export interface SequenceValue {
  readonly _tag: "Sequence"
  readonly elements: ReadonlyArray<Value>
}

export interface StructureProperty {
  readonly name: string
  readonly value: Value
}

export interface StructureValue {
  readonly _tag: "Structure"
  readonly properties: ReadonlyArray<StructureProperty>
  readonly typeTag: string | undefined
}

export interface DictionaryEntry {
  readonly key: ScalarValue
  readonly value: Value
}

export interface DictionaryValue {
  readonly _tag: "Dictionary"
  readonly entries: ReadonlyArray<DictionaryEntry>
}

export type Value = ScalarValue | SequenceValue | StructureValue | DictionaryValue

export const scalar = (literal: Literal): ScalarValue => ({ _tag: "Scalar", literal })

export const nullScalar: ScalarValue = scalar({ _tag: "Null" })

export const stringScalar = (value: string): ScalarValue => scalar({ _tag: "String", value })

export const booleanScalar = (value: boolean): ScalarValue => scalar({ _tag: "Boolean", value })

export const charScalar = (value: string): ScalarValue => scalar({ _tag: "Char", value })

export const integerScalar = (value: bigint): ScalarValue => scalar({ _tag: "Integer", value })

/**
 * Exact decimal `coefficient × 10^-scale`, e.g. `decimalScalar(1250n, 2)` is 12.50.
 */
export const decimalScalar = (coefficient: bigint, scale: number): ScalarValue =>
  scalar({ _tag: "Decimal", coefficient, scale })

export const float32Scalar = (value: number): ScalarValue => scalar({ _tag: "Float32", value: Math.fround(value) })

export const float64Scalar = (value: number): ScalarValue => scalar({ _tag: "Float64", value })

export const dateTimeScalar = (value: Date): ScalarValue => scalar({ _tag: "DateTime", value })

export const dateTimeOffsetScalar = (value: Date, offsetMinutes: number): ScalarValue =>
  scalar({ _tag: "DateTimeOffset", value, offsetMinutes })

export const otherScalar = (value: Textual): ScalarValue => scalar({ _tag: "Other", value })

export const sequence = (elements: ReadonlyArray<Value>): SequenceValue => ({ _tag: "Sequence", elements })

export const property = (name: string, value: Value): StructureProperty => ({ name, value })

export const structure = (
  properties: ReadonlyArray<StructureProperty>,
  typeTag?: string
): StructureValue => ({ _tag: "Structure", properties, typeTag })

export const entry = (key: ScalarValue, value: Value): DictionaryEntry => ({ key, value })

export const dictionary = (entries: ReadonlyArray<DictionaryEntry>): DictionaryValue => ({
  _tag: "Dictionary",
  entries
})
