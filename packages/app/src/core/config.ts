import type { CliArgs } from "./cli.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// QUOTE(TZ): n/a
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved lists hold no duplicates
// COMPLEXITY: O(n)/O(1)

export const DEFAULT_SEARCH_KEYS: ReadonlyArray<string> = ["name", "fromDict", "sourceName"]
export const DEFAULT_CLEAN_KEYS: ReadonlyArray<string> = ["name"]
export const DEFAULT_IGNORE_PATHS: ReadonlyArray<string> = []
export const DEFAULT_CONFIG_PATH = "./.orphan-prune.json"

export interface FileConfig {
  readonly searchKeys?: ReadonlyArray<string>
  readonly cleanKeys?: ReadonlyArray<string>
  readonly ignorePaths?: ReadonlyArray<string>
  readonly output?: string
}

export interface ResolvedConfig {
  readonly searchKeys: ReadonlyArray<string>
  readonly cleanKeys: ReadonlyArray<string>
  readonly ignorePaths: ReadonlyArray<string>
  readonly output: string | undefined
}

const unique = (values: ReadonlyArray<string>): ReadonlyArray<string> => [...new Set(values)]

const resolveList = (
  fromCli: ReadonlyArray<string> | undefined,
  fromFile: ReadonlyArray<string> | undefined,
  fallback: ReadonlyArray<string>
): ReadonlyArray<string> => unique(fromCli ?? fromFile ?? fallback)

/**
 * Resolve the effective settings from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .orphan-prune.json.
 * @returns Resolved configuration; lists replace each other, they are not merged.
 *
 * @pure true
 * @complexity O(n)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  searchKeys: resolveList(cli.searchKeys, fileConfig?.searchKeys, DEFAULT_SEARCH_KEYS),
  cleanKeys: resolveList(cli.cleanKeys, fileConfig?.cleanKeys, DEFAULT_CLEAN_KEYS),
  ignorePaths: resolveList(cli.ignorePaths, fileConfig?.ignorePaths, DEFAULT_IGNORE_PATHS),
  output: cli.output ?? fileConfig?.output
})
