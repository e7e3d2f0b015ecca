import { Match } from "effect"

import type { Json } from "./json.js"
import { isJsonArray } from "./json.js"

// CHANGE: model the nested document as a closed tagged variant
// WHY: pruning, counting and serialization match exhaustively over node kinds
// QUOTE(TZ): n/a
// REF: req-tree-1
// SOURCE: n/a
// FORMAT THEOREM: ∀n ∈ TreeNode: n._tag ∈ {"Object","Array","Scalar"}
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: object entry keys are unique and keep insertion order
// COMPLEXITY: O(n) where n = number of nodes

export type Scalar = string | number | boolean | null

export type ObjectEntry = readonly [string, TreeNode]

export interface ObjectNode {
  readonly _tag: "Object"
  readonly entries: ReadonlyArray<ObjectEntry>
}

export interface ArrayNode {
  readonly _tag: "Array"
  readonly items: ReadonlyArray<TreeNode>
}

// `text` is the JSON text of the value as it was read; numbers keep their source digits
export interface ScalarNode {
  readonly _tag: "Scalar"
  readonly value: Scalar
  readonly text: string
}

export type TreeNode = ObjectNode | ArrayNode | ScalarNode

// a repeated key keeps its first position and its last value
export const objectNode = (entries: Iterable<ObjectEntry>): ObjectNode => ({
  _tag: "Object",
  entries: [...new Map(entries)]
})

export const arrayNode = (items: ReadonlyArray<TreeNode>): ArrayNode => ({
  _tag: "Array",
  items: [...items]
})

export const serializeScalar = (value: Scalar): string => JSON.stringify(value)

export const scalarNode = (value: Scalar, text: string = serializeScalar(value)): ScalarNode => ({
  _tag: "Scalar",
  value,
  text
})

/**
 * Lift an in-memory JSON value into the tree model.
 *
 * Key order is that of `Object.entries`, which lists integer-like keys first;
 * document text goes through `parseDocument` instead.
 *
 * @pure true
 * @invariant object entries follow the key order of the JSON value
 * @complexity O(n)
 */
export const fromJson = (json: Json): TreeNode => {
  if (json === null || typeof json !== "object") {
    return scalarNode(json)
  }
  if (isJsonArray(json)) {
    return arrayNode(json.map((item) => fromJson(item)))
  }
  return objectNode(Object.entries(json).map(([key, value]): ObjectEntry => [key, fromJson(value)]))
}

export const toJson = (node: TreeNode): Json =>
  Match.value(node).pipe(
    Match.tag("Scalar", (scalar): Json => scalar.value),
    Match.tag("Array", (array): Json => array.items.map((item) => toJson(item))),
    Match.tag("Object", (object): Json =>
      Object.fromEntries(object.entries.map(([key, value]) => [key, toJson(value)]))),
    Match.exhaustive
  )

export const copyTree = (node: TreeNode): TreeNode =>
  Match.value(node).pipe(
    Match.tag("Scalar", (scalar): TreeNode => scalarNode(scalar.value, scalar.text)),
    Match.tag("Array", (array): TreeNode => arrayNode(array.items.map((item) => copyTree(item)))),
    Match.tag("Object", (object): TreeNode =>
      objectNode(object.entries.map(([key, value]): ObjectEntry => [key, copyTree(value)]))),
    Match.exhaustive
  )

const isTruthyScalar = (value: Scalar): boolean =>
  value !== null && value !== false && value !== 0 && value !== ""

/**
 * Empty containers and `null`, `false`, `0`, `""` are falsy.
 *
 * @pure true
 * @complexity O(1)
 */
export const isTruthy = (node: TreeNode): boolean =>
  Match.value(node).pipe(
    Match.tag("Scalar", (scalar) => isTruthyScalar(scalar.value)),
    Match.tag("Array", (array) => array.items.length > 0),
    Match.tag("Object", (object) => object.entries.length > 0),
    Match.exhaustive
  )

const indent = (depth: number): string => "  ".repeat(depth)

const renderNode = (node: TreeNode, depth: number): string =>
  Match.value(node).pipe(
    Match.tag("Scalar", (scalar) => scalar.text),
    Match.tag("Array", (array) => {
      if (array.items.length === 0) {
        return "[]"
      }
      const lines = array.items.map((item) => `${indent(depth + 1)}${renderNode(item, depth + 1)}`)
      return `[\n${lines.join(",\n")}\n${indent(depth)}]`
    }),
    Match.tag("Object", (object) => {
      if (object.entries.length === 0) {
        return "{}"
      }
      const lines = object.entries.map(([key, value]) =>
        `${indent(depth + 1)}${JSON.stringify(key)}: ${renderNode(value, depth + 1)}`
      )
      return `{\n${lines.join(",\n")}\n${indent(depth)}}`
    }),
    Match.exhaustive
  )

/**
 * Render the canonical text of a tree: two-space indented JSON in entry order.
 * Occurrence counting and the written output both use this text.
 *
 * @pure true
 * @invariant serializeTree(fromJson(j)) = JSON.stringify(j, null, 2)
 * @invariant number scalars are written with the digits they were read with
 * @complexity O(n)
 */
export const serializeTree = (node: TreeNode): string => renderNode(node, 0)
