import { Match } from "effect"
import * as Either from "effect/Either"
import * as jsonc from "jsonc-parser"
import type { Node as SyntaxNode, ParseError } from "jsonc-parser"

import type { ObjectEntry, TreeNode } from "./tree.js"
import { arrayNode, objectNode, scalarNode } from "./tree.js"

// CHANGE: parse document text straight into the tree model using the jsonc-parser syntax tree
// WHY: going through JSON.parse reorders integer-like keys, drops "__proto__" and rounds wide numbers
// QUOTE(TZ): n/a
// REF: req-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀s ∈ JSON: parse(s) = Right(t) → serializeTree(t) ≡ s up to whitespace and string escapes
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: object entries follow source order; number scalars keep their source text
// COMPLEXITY: O(n) where n = text length

type Lifted = Either.Either<TreeNode, string>

const position = (text: string, offset: number): string => {
  const before = text.slice(0, offset)
  const line = before.split("\n").length
  const column = offset - before.lastIndexOf("\n")
  return `line ${line}, column ${column}`
}

const describeError = (text: string, error: ParseError): string =>
  `${jsonc.printParseErrorCode(error.error)} at ${position(text, error.offset)}`

const malformed = (node: SyntaxNode, text: string): Either.Either<never, string> =>
  Either.left(`Malformed ${node.type} at ${position(text, node.offset)}`)

const liftString = (node: SyntaxNode, text: string): Lifted => {
  const value: unknown = node.value
  return typeof value === "string" ? Either.right(scalarNode(value)) : malformed(node, text)
}

const liftNumber = (node: SyntaxNode, text: string): Lifted => {
  const value: unknown = node.value
  return typeof value === "number"
    ? Either.right(scalarNode(value, text.slice(node.offset, node.offset + node.length)))
    : malformed(node, text)
}

const liftBoolean = (node: SyntaxNode, text: string): Lifted => {
  const value: unknown = node.value
  return typeof value === "boolean" ? Either.right(scalarNode(value)) : malformed(node, text)
}

const liftEntry = (property: SyntaxNode, text: string): Either.Either<ObjectEntry, string> => {
  const [keyNode, valueNode] = property.children ?? []
  const key: unknown = keyNode?.value
  if (property.type !== "property" || typeof key !== "string" || valueNode === undefined) {
    return malformed(property, text)
  }
  return Either.map(liftNode(valueNode, text), (value): ObjectEntry => [key, value])
}

const liftNode = (node: SyntaxNode, text: string): Lifted =>
  Match.value(node.type).pipe(
    Match.when("object", (): Lifted =>
      Either.map(
        Either.all((node.children ?? []).map((property) => liftEntry(property, text))),
        (entries) => objectNode(entries)
      )),
    Match.when("array", (): Lifted =>
      Either.map(
        Either.all((node.children ?? []).map((item) => liftNode(item, text))),
        (items) => arrayNode(items)
      )),
    Match.when("string", () => liftString(node, text)),
    Match.when("number", () => liftNumber(node, text)),
    Match.when("boolean", () => liftBoolean(node, text)),
    Match.when("null", (): Lifted => Either.right(scalarNode(null))),
    Match.when("property", () => malformed(node, text)),
    Match.exhaustive
  )

/**
 * Parse a JSON document, with `//` and `/* *\/` comments allowed, into the tree model.
 *
 * The first syntax error is reported with its line and column. A repeated
 * key keeps its first position and its last value.
 *
 * @pure true
 * @invariant parseDocument(serializeTree(t)) = Right(t) for every parsed t
 * @complexity O(n)
 */
export const parseDocument = (text: string): Lifted => {
  const errors: Array<ParseError> = []
  const root = jsonc.parseTree(text, errors)
  const [first] = errors
  if (first !== undefined) {
    return Either.left(describeError(text, first))
  }
  if (root === undefined) {
    return Either.left("Document is empty")
  }
  return liftNode(root, text)
}
