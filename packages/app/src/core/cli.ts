import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for orphan-prune
// WHY: keep CLI decoding pure and testable at the boundary
// QUOTE(TZ): n/a
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀args: parse(args) = Right(cli) → cli.file is the single positional argument
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and extra positionals are rejected
// COMPLEXITY: O(n) where n = argv length

export interface CliArgs {
  readonly file: string
  readonly searchKeys: ReadonlyArray<string> | undefined
  readonly cleanKeys: ReadonlyArray<string> | undefined
  readonly ignorePaths: ReadonlyArray<string> | undefined
  readonly output: string | undefined
  readonly configPath: string | undefined
  readonly dryRun: boolean
  readonly json: boolean
  readonly silent: boolean
  readonly verbose: boolean
  readonly failOnRemoval: boolean
}

type CliDraft = Omit<CliArgs, "file"> & { readonly file: string | undefined }

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-") && value.length > 1

export const splitList = (value: string): ReadonlyArray<string> =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)

/**
 * Split the contents of an `@file` into arguments, one per non-empty line.
 *
 * @pure true
 * @complexity O(n)
 */
export const splitArgLines = (contents: string): ReadonlyArray<string> =>
  contents
    .split(/\r?\n/u)
    .filter((line) => line.trim().length > 0)

const defaultDraft: CliDraft = {
  file: undefined,
  searchKeys: undefined,
  cleanKeys: undefined,
  ignorePaths: undefined,
  output: undefined,
  configPath: undefined,
  dryRun: false,
  json: false,
  silent: false,
  verbose: false,
  failOnRemoval: false
}

interface ParsedFlag {
  readonly next: CliDraft
  readonly consumed: number
}

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

const setParsedFlag = (next: CliDraft): Either.Either<ParsedFlag, CliError> => Either.right({ next, consumed: 1 })

const parseValueFlag = (
  flagName: string,
  current: CliDraft,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliDraft, value: string) => CliDraft
): Either.Either<ParsedFlag, CliError> =>
  Either.map(readFlagValue(flagName, inlineValue, nextValue), (value) => ({
    next: update(current, value),
    consumed: inlineValue === undefined ? 2 : 1
  }))

// a list flag takes its inline value, or every following argument up to the next flag
const parseListFlag = (
  current: CliDraft,
  inlineValue: string | undefined,
  rest: ReadonlyArray<string>,
  update: (args: CliDraft, values: ReadonlyArray<string>) => CliDraft
): Either.Either<ParsedFlag, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right({ next: update(current, splitList(inlineValue)), consumed: 1 })
  }
  const end = rest.findIndex((value) => isFlag(value))
  const taken = end === -1 ? rest : rest.slice(0, end)
  return Either.right({
    next: update(current, taken.flatMap((value) => splitList(value))),
    consumed: taken.length + 1
  })
}

type FlagParser = (
  current: CliDraft,
  inlineValue: string | undefined,
  rest: ReadonlyArray<string>
) => Either.Either<ParsedFlag, CliError>

const flagParsers: Record<string, FlagParser> = {
  "dry-run": (current) => setParsedFlag({ ...current, dryRun: true }),
  json: (current) => setParsedFlag({ ...current, json: true }),
  silent: (current) => setParsedFlag({ ...current, silent: true }),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }),
  "fail-on-removal": (current) => setParsedFlag({ ...current, failOnRemoval: true }),
  "search-in": (current, inlineValue, rest) =>
    parseListFlag(current, inlineValue, rest, (args, values) => ({ ...args, searchKeys: values })),
  "target-keys": (current, inlineValue, rest) =>
    parseListFlag(current, inlineValue, rest, (args, values) => ({ ...args, cleanKeys: values })),
  "ignore-paths": (current, inlineValue, rest) =>
    parseListFlag(current, inlineValue, rest, (args, values) => ({ ...args, ignorePaths: values })),
  output: (current, inlineValue, rest) =>
    parseValueFlag("output", current, inlineValue, rest[0], (args, value) => ({
      ...args,
      output: value
    })),
  config: (current, inlineValue, rest) =>
    parseValueFlag("config", current, inlineValue, rest[0], (args, value) => ({
      ...args,
      configPath: value
    }))
}

const shortFlags: Readonly<Record<string, string>> = {
  s: "search-in",
  t: "target-keys",
  i: "ignore-paths",
  o: "output"
}

interface FlagName {
  readonly name: string
  readonly inlineValue: string | undefined
}

const readFlagName = (raw: string): Either.Either<FlagName, CliError> => {
  if (raw.startsWith("--")) {
    const body = raw.slice(2)
    const separator = body.indexOf("=")
    return Either.right(
      separator === -1
        ? { name: body, inlineValue: undefined }
        : { name: body.slice(0, separator), inlineValue: body.slice(separator + 1) }
    )
  }
  const long = shortFlags[raw.slice(1)]
  if (long === undefined) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  return Either.right({ name: long, inlineValue: undefined })
}

const parseFlag = (
  raw: string,
  rest: ReadonlyArray<string>,
  current: CliDraft
): Either.Either<ParsedFlag, CliError> => {
  const flagEither = readFlagName(raw)
  if (Either.isLeft(flagEither)) {
    return Either.left(flagEither.left)
  }
  const { inlineValue, name } = flagEither.right
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, rest)
}

const parsePositional = (
  value: string,
  current: CliDraft
): Either.Either<ParsedFlag, CliError> => {
  if (current.file !== undefined) {
    return Either.left(cliError(`Unexpected positional argument: ${value}`))
  }
  return Either.right({ next: { ...current, file: value }, consumed: 1 })
}

const finalize = (draft: CliDraft): Either.Either<CliArgs, CliError> => {
  const { file, ...rest } = draft
  if (file === undefined) {
    return Either.left(cliError("Missing target file"))
  }
  return Either.right({ ...rest, file })
}

/**
 * Parse CLI arguments (without the node and script entries) into typed flags.
 *
 * @param rawArgs - User arguments, after `@file` expansion.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant list flags keep `undefined` when absent so lower layers can apply
 * @invariant a list flag without an inline value consumes arguments up to the next flag
 * @complexity O(n)
 */
export const parseCliArgs = (
  rawArgs: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  let args = defaultDraft
  let index = 0
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    const parsed = isFlag(current)
      ? parseFlag(current, rawArgs.slice(index + 1), args)
      : parsePositional(current, args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return finalize(args)
}
