import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import type { CleanSettings } from "../../src/core/fixpoint.js"
import { clean, runFixpoint } from "../../src/core/fixpoint.js"
import type { Json } from "../../src/core/json.js"
import { parseDocument } from "../../src/core/parse.js"
import { fromJson, scalarNode, serializeTree, toJson } from "../../src/core/tree.js"

const defaults: CleanSettings = {
  searchKeys: ["name", "fromDict", "sourceName"],
  cleanKeys: ["name"],
  ignorePaths: []
}

const dictionaries: Json = {
  dicts: [
    { name: "base" },
    { name: "child", fromDict: "base" }
  ],
  used: ["other"]
}

const cleanJson = (json: Json, settings: CleanSettings): Json | undefined => {
  const cleaned = clean(fromJson(json), settings.searchKeys, settings.cleanKeys, settings.ignorePaths)
  return Either.isRight(cleaned) ? toJson(cleaned.right) : undefined
}

describe("runFixpoint", () => {
  it.effect("removes a value referenced only where it is defined", () =>
    Effect.sync(() => {
      const input: Json = { items: [{ name: "a" }, { name: "b" }], refs: ["b"] }
      expect(cleanJson(input, { searchKeys: ["name"], cleanKeys: ["name"], ignorePaths: [] })).toEqual({
        items: [{ name: "b" }],
        refs: ["b"]
      })
    }))

  it.effect("keeps an item whose value also appears under its clean key", () =>
    Effect.sync(() => {
      const input: Json = { items: [{ name: "a", ref: "a" }, { name: "b" }], refs: ["b"] }
      const outcome = runFixpoint(fromJson(input), { searchKeys: ["name"], cleanKeys: ["ref"], ignorePaths: [] })
      expect(Either.isRight(outcome)).toBe(true)
      if (Either.isRight(outcome)) {
        expect(toJson(outcome.right.tree)).toEqual(input)
        expect(outcome.right.passes).toEqual([])
      }
    }))

  it.effect("removes a wide integer by the digits it was written with", () =>
    Effect.sync(() => {
      const parsed = parseDocument("{\"defs\": [{\"name\": 12345678901234567890}]}")
      expect(Either.isRight(parsed)).toBe(true)
      if (Either.isRight(parsed)) {
        const cleaned = clean(parsed.right, ["name"], ["name"])
        expect(Either.isRight(cleaned)).toBe(true)
        if (Either.isRight(cleaned)) {
          expect(serializeTree(cleaned.right)).toBe("{\n  \"defs\": []\n}")
        }
      }
    }))

  it.effect("cascades once a removal orphans another value", () =>
    Effect.sync(() => {
      const outcome = runFixpoint(fromJson(dictionaries), defaults)
      expect(Either.isRight(outcome)).toBe(true)
      if (Either.isRight(outcome)) {
        expect(toJson(outcome.right.tree)).toEqual({ dicts: [], used: ["other"] })
        expect(outcome.right.candidates).toEqual(["base", "child"])
        expect(outcome.right.passes).toEqual([
          { orphaned: ["child"], removed: ["child"], totalBefore: 3, totalAfter: 1 },
          { orphaned: ["base"], removed: ["base"], totalBefore: 1, totalAfter: 0 }
        ])
      }
    }))

  it.effect("keeps values that occur more than once", () =>
    Effect.sync(() => {
      const input: Json = { dicts: [{ name: "base" }], refs: [{ fromDict: "base" }] }
      const outcome = runFixpoint(fromJson(input), defaults)
      expect(Either.isRight(outcome)).toBe(true)
      if (Either.isRight(outcome)) {
        expect(toJson(outcome.right.tree)).toEqual(input)
        expect(outcome.right.passes).toEqual([])
      }
    }))

  it.effect("stops without progress when the orphan sits under an ignored path", () =>
    Effect.sync(() => {
      const outcome = runFixpoint(fromJson(dictionaries), { ...defaults, ignorePaths: ["dicts"] })
      expect(Either.isRight(outcome)).toBe(true)
      if (Either.isRight(outcome)) {
        expect(serializeTree(outcome.right.tree)).toBe(serializeTree(fromJson(dictionaries)))
        expect(outcome.right.passes).toEqual([
          { orphaned: ["child"], removed: [], totalBefore: 3, totalAfter: 3 }
        ])
      }
    }))

  it.effect("follows textual counts through numeric identifiers", () =>
    Effect.sync(() => {
      const input: Json = { rows: [{ id: 4 }, { id: 42 }] }
      expect(cleanJson(input, { searchKeys: ["id"], cleanKeys: ["id"], ignorePaths: [] })).toEqual({ rows: [] })
    }))

  it.effect("preserves falsy values", () =>
    Effect.sync(() => {
      const input: Json = { name: "x", ref: "", list: [0, false, null, "", {}, []], meta: {} }
      expect(cleanJson(input, { searchKeys: ["name"], cleanKeys: ["ref"], ignorePaths: [] })).toEqual(input)
    }))

  it.effect("empties a discarded root instead of dropping it", () =>
    Effect.sync(() => {
      expect(cleanJson({ name: "lonely" }, defaults)).toEqual({})
      expect(cleanJson([{ name: "lonely" }], defaults)).toEqual([])
    }))

  it.effect("is idempotent", () =>
    Effect.sync(() => {
      const once = clean(fromJson(dictionaries), defaults.searchKeys, defaults.cleanKeys)
      expect(Either.isRight(once)).toBe(true)
      if (Either.isRight(once)) {
        const twice = clean(once.right, defaults.searchKeys, defaults.cleanKeys)
        expect(Either.isRight(twice)).toBe(true)
        if (Either.isRight(twice)) {
          expect(serializeTree(twice.right)).toBe(serializeTree(once.right))
        }
      }
    }))

  it.effect("returns a copy and leaves the input untouched", () =>
    Effect.sync(() => {
      const tree = fromJson(dictionaries)
      const before = serializeTree(tree)
      const cleaned = clean(tree, ["name"], ["name"], ["dicts", "used"])
      expect(serializeTree(tree)).toBe(before)
      expect(Either.isRight(cleaned)).toBe(true)
      if (Either.isRight(cleaned)) {
        expect(cleaned.right).not.toBe(tree)
        expect(serializeTree(cleaned.right)).toBe(before)
      }
    }))

  it.effect("rejects a scalar root", () =>
    Effect.sync(() => {
      const cleaned = clean(scalarNode("text"), ["name"], ["name"])
      expect(Either.isLeft(cleaned)).toBe(true)
      if (Either.isLeft(cleaned)) {
        expect(cleaned.left).toEqual({
          _tag: "InvalidRoot",
          message: "root must be an object or an array, got string"
        })
      }
    }))

  it.effect("surfaces an unhashable candidate", () =>
    Effect.sync(() => {
      const cleaned = clean(fromJson({ name: ["a"] }), ["name"], ["name"])
      expect(Either.isLeft(cleaned)).toBe(true)
      if (Either.isLeft(cleaned)) {
        expect(cleaned.left._tag).toBe("UnhashableCandidate")
      }
    }))
})
