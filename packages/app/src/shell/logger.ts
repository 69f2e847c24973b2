import * as Logger from "effect/Logger"

// CHANGE: route diagnostic logs to stderr
// WHY: stdout carries the validated document in --pretty mode and must stay clean
// PURITY: SHELL
// EFFECT: Layer<never>
// INVARIANT: one line per log entry

const formatMessage = (message: unknown): string =>
  Array.isArray(message) ? message.map((part) => String(part)).join(" ") : String(message)

export const stderrLogger = Logger.make(({ logLevel, message }) => {
  process.stderr.write(`[${logLevel.label.toLowerCase()}] ${formatMessage(message)}\n`)
})

export const StderrLoggerLive = Logger.replace(Logger.defaultLogger, stderrLogger)
