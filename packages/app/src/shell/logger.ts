import * as Layer from "effect/Layer"
import * as Logger from "effect/Logger"
import * as LogLevel from "effect/LogLevel"

// CHANGE: route effect logs to stderr with a CLI-selected minimum level
// WHY: stdout carries the report and must stay parseable in --json mode
// QUOTE(TZ): n/a
// REF: req-logging-1
// SOURCE: n/a
// FORMAT THEOREM: ∀l: log(l) writes one logfmt line to stderr iff level(l) ≥ minimum
// PURITY: SHELL
// EFFECT: Layer<never>
// INVARIANT: --silent disables every log line
// COMPLEXITY: O(1)

export interface LogFlags {
  readonly silent: boolean
  readonly verbose: boolean
}

const stderrLogger = Logger.make((options) => {
  process.stderr.write(`${Logger.logfmtLogger.log(options)}\n`)
})

export const levelFromFlags = (flags: LogFlags): LogLevel.LogLevel => {
  if (flags.silent) {
    return LogLevel.None
  }
  return flags.verbose ? LogLevel.Debug : LogLevel.Info
}

export const stderrLoggerLayer: Layer.Layer<never> = Logger.replace(Logger.defaultLogger, stderrLogger)
