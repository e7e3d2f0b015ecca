import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"

import { runCli } from "../../src/app/program.js"
import { cliArgv, provideNodeContext, withTempDir } from "./test-helpers.js"

const dictionaries = [
  "{",
  "  // dictionaries and the items built from them",
  "  \"dicts\": [",
  "    { \"name\": \"base\" },",
  "    { \"name\": \"child\", \"fromDict\": \"base\" } /* unused */",
  "  ],",
  "  \"used\": [\"other\"]",
  "}",
  ""
].join("\n")

describe("runCli", () => {
  it.effect("writes the cleaned copy beside the input", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const input = path.join(tempDir, "data.json")
        yield* _(fs.writeFileString(input, dictionaries))

        const result = yield* _(runCli(cliArgv(input, "--silent")))
        const written = yield* _(fs.readFileString(path.join(tempDir, "cleaned_data.json")))
        const original = yield* _(fs.readFileString(input))

        expect(result.exitCode).toBe(0)
        expect(result.report.removedValues).toEqual(["child", "base"])
        expect(result.report.written).toBe(true)
        expect(written).toBe("{\n  \"dicts\": [],\n  \"used\": [\n    \"other\"\n  ]\n}\n")
        expect(original).toBe(dictionaries)
      })
    ).pipe(provideNodeContext))

  it.effect("writes an unpruned document back unchanged", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const input = path.join(tempDir, "data.json")
        yield* _(
          fs.writeFileString(input, "{\"b\": {\"__proto__\": {\"x\": 1}}, \"2\": 12345678901234567890, \"f\": 1.0}")
        )

        yield* _(runCli(cliArgv(input, "--search-in=", "--target-keys=", "--silent")))
        const written = yield* _(fs.readFileString(path.join(tempDir, "cleaned_data.json")))

        expect(written).toBe(
          [
            "{",
            "  \"b\": {",
            "    \"__proto__\": {",
            "      \"x\": 1",
            "    }",
            "  },",
            "  \"2\": 12345678901234567890,",
            "  \"f\": 1.0",
            "}",
            ""
          ].join("\n")
        )
      })
    ).pipe(provideNodeContext))

  it.effect("writes nothing on a dry run", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const input = path.join(tempDir, "data.json")
        yield* _(fs.writeFileString(input, dictionaries))

        const result = yield* _(runCli(cliArgv(input, "--dry-run", "--silent")))
        const exists = yield* _(fs.exists(path.join(tempDir, "cleaned_data.json")))

        expect(result.report.written).toBe(false)
        expect(result.report.passes.length).toBe(2)
        expect(exists).toBe(false)
      })
    ).pipe(provideNodeContext))

  it.effect("reads arguments from an @file and settings from a config file", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const input = path.join(tempDir, "graph.json")
        const output = path.join(tempDir, "graph.out.json")
        const configPath = path.join(tempDir, "prune.json")
        const argsPath = path.join(tempDir, "args.txt")
        yield* _(
          fs.writeFileString(input, "{\"defs\": [{\"id\": \"a\"}, {\"id\": \"b\"}], \"links\": [{\"ref\": \"b\"}]}")
        )
        yield* _(
          fs.writeFileString(configPath, JSON.stringify({ searchKeys: ["id"], cleanKeys: ["id"], output }))
        )
        yield* _(fs.writeFileString(argsPath, [input, "--config", configPath, "--silent"].join("\n")))

        const result = yield* _(runCli(cliArgv(`@${argsPath}`)))
        const written = yield* _(fs.readFileString(output))

        expect(result.report.output).toBe(output)
        expect(written).toBe(
          [
            "{",
            "  \"defs\": [",
            "    {",
            "      \"id\": \"b\"",
            "    }",
            "  ],",
            "  \"links\": [",
            "    {",
            "      \"ref\": \"b\"",
            "    }",
            "  ]",
            "}",
            ""
          ].join("\n")
        )
      })
    ).pipe(provideNodeContext))

  it.effect("exits with 2 when --fail-on-removal sees a removal", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const input = path.join(tempDir, "data.json")
        yield* _(fs.writeFileString(input, dictionaries))

        const result = yield* _(runCli(cliArgv(input, "--fail-on-removal", "--dry-run", "--silent")))

        expect(result.exitCode).toBe(2)
      })
    ).pipe(provideNodeContext))

  it.effect("fails on invalid JSON and writes no output", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const input = path.join(tempDir, "broken.json")
        yield* _(fs.writeFileString(input, "{\"name\": "))

        const result = yield* _(Effect.either(runCli(cliArgv(input, "--silent"))))
        const exists = yield* _(fs.exists(path.join(tempDir, "cleaned_broken.json")))

        expect(Either.isLeft(result)).toBe(true)
        if (Either.isLeft(result)) {
          expect(result.left._tag).toBe("ParseError")
        }
        expect(exists).toBe(false)
      })
    ).pipe(provideNodeContext))

  it.effect("fails on a scalar document", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const input = path.join(tempDir, "scalar.json")
        yield* _(fs.writeFileString(input, "42\n"))

        const result = yield* _(Effect.either(runCli(cliArgv(input, "--silent"))))

        expect(result).toEqual(
          Either.left({ _tag: "InvalidRoot", message: "root must be an object or an array, got number" })
        )
      })
    ).pipe(provideNodeContext))

  it.effect("fails when an explicit config file is missing", () =>
    withTempDir(({ fs, path, tempDir }) =>
      Effect.gen(function*(_) {
        const input = path.join(tempDir, "data.json")
        yield* _(fs.writeFileString(input, dictionaries))
        const missing = path.join(tempDir, "missing.json")

        const result = yield* _(Effect.either(runCli(cliArgv(input, "--config", missing, "--silent"))))

        expect(result).toEqual(Either.left({ _tag: "FileError", message: `Config file not found: ${missing}` }))
      })
    ).pipe(provideNodeContext))
})
