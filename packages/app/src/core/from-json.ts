import type { Json } from "./json.js"
import { isJsonObject } from "./json.js"
import type { Value } from "./value.js"
import {
  booleanScalar,
  dictionary,
  entry,
  float64Scalar,
  integerScalar,
  nullScalar,
  property,
  sequence,
  stringScalar,
  structure
} from "./value.js"

// CHANGE: lift parsed JSON documents into the structured value model
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: member order of the parsed object is kept
// INVARIANT: a string "$type" member becomes the structure type tag
// COMPLEXITY: O(n)/O(n)

export type ObjectMode = "structure" | "dictionary"

export interface FromJsonOptions {
  readonly objects: ObjectMode
}

const typeTagMember = "$type"

const numberValue = (value: number): Value =>
  Number.isSafeInteger(value) ? integerScalar(BigInt(value)) : float64Scalar(value)

const objectValue = (value: { readonly [key: string]: Json }, options: FromJsonOptions): Value => {
  const members = Object.entries(value)
  if (options.objects === "dictionary") {
    return dictionary(members.map(([key, member]) => entry(stringScalar(key), valueFromJson(member, options))))
  }
  const tag = value[typeTagMember]
  const typeTag = typeof tag === "string" ? tag : undefined
  const properties = members
    .filter(([key]) => typeTag === undefined || key !== typeTagMember)
    .map(([key, member]) => property(key, valueFromJson(member, options)))
  return structure(properties, typeTag)
}

/**
 * Convert a JSON document into a Value tree.
 *
 * @param json - Parsed JSON.
 * @param options - Whether objects become structures or dictionaries.
 * @returns Value mirroring the document.
 *
 * @pure true
 * @invariant safe integers map to Integer scalars, other numbers to Float64
 * @complexity O(n)
 */
export const valueFromJson = (json: Json, options: FromJsonOptions = { objects: "structure" }): Value => {
  if (json === null) {
    return nullScalar
  }
  if (typeof json === "boolean") {
    return booleanScalar(json)
  }
  if (typeof json === "number") {
    return numberValue(json)
  }
  if (typeof json === "string") {
    return stringScalar(json)
  }
  if (isJsonObject(json)) {
    return objectValue(json, options)
  }
  return sequence(json.map((element) => valueFromJson(element, options)))
}
