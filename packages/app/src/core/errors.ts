import { Match } from "effect"

import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for the cleaner and its CLI
// WHY: provide typed failures for program flow and exit codes
// QUOTE(TZ): n/a
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type ParseFileError = { readonly _tag: "ParseError"; readonly file: string; readonly message: string }
export type InvalidRoot = { readonly _tag: "InvalidRoot"; readonly message: string }
export type UnhashableCandidate = {
  readonly _tag: "UnhashableCandidate"
  readonly path: string
  readonly message: string
}

export type CleanError = InvalidRoot | UnhashableCandidate

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | ParseFileError
  | CleanError

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const parseFileError = (file: string, message: string): ParseFileError => ({
  _tag: "ParseError",
  file,
  message
})

export const invalidRoot = (kind: string): InvalidRoot => ({
  _tag: "InvalidRoot",
  message: `root must be an object or an array, got ${kind}`
})

export const unhashableCandidate = (path: string): UnhashableCandidate => ({
  _tag: "UnhashableCandidate",
  path,
  message: `value at ${path} is a container and cannot identify an item`
})

/**
 * Render an error as a single line for stderr.
 *
 * @pure true
 * @complexity O(1)
 */
export const renderError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("CliError", (value) => `Invalid arguments: ${value.message}`),
    Match.tag("ConfigError", (value) => `Invalid config: ${value.message}`),
    Match.tag("FileError", (value) => `File error: ${value.message}`),
    Match.tag("ParseError", (value) => `Cannot parse ${value.file}: ${value.message}`),
    Match.tag("InvalidRoot", (value) => `Cannot clean: ${value.message}`),
    Match.tag("UnhashableCandidate", (value) => `Cannot clean: ${value.message}`),
    Match.exhaustive
  )
