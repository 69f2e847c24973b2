import * as Either from "effect/Either"

// CHANGE: parse validator CLI arguments into a typed configuration
// WHY: keep argument decoding pure and testable at the boundary
// QUOTE(RFC 8259): n/a
// REF: n/a
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → ¬(args.quiet ∧ args.verbose)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags and surplus positionals are rejected
// COMPLEXITY: O(n) where n = argv length

export interface CliArgs {
  readonly file: string | undefined
  readonly verbose: boolean
  readonly quiet: boolean
  readonly pretty: boolean
  readonly configPath: string
  readonly configExplicit: boolean
  readonly help: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const defaultConfigPath = "./.strict-json.json"

export const usage = [
  "Usage: strict-json [options] [file]",
  "",
  "Validate JSON from a file or stdin according to RFC 8259.",
  "",
  "Options:",
  "  -v, --verbose        show the offending source line on errors",
  "  -q, --quiet          print nothing, report through the exit code only",
  "  -p, --pretty         print the re-serialized document when valid",
  `  -c, --config <path>  read settings from <path> (default: ${defaultConfigPath})`,
  "  -h, --help           show this help",
  "",
  "Exit codes: 0 valid, 1 invalid JSON, 2 file not found or not readable,",
  "            3 input/output error, 4 invalid arguments or config"
].join("\n")

const defaultArgs: CliArgs = {
  file: undefined,
  verbose: false,
  quiet: false,
  pretty: false,
  configPath: defaultConfigPath,
  configExplicit: false,
  help: false
}

const shortFlags: Readonly<Record<string, string>> = {
  v: "verbose",
  q: "quiet",
  p: "pretty",
  c: "config",
  h: "help"
}

const valueFlags: ReadonlySet<string> = new Set(["config"])

// A lone "-" names stdin, not a flag.
const isFlag = (value: string): boolean => value.startsWith("-") && value !== "-"

type ParsedFlag = Either.Either<{ readonly next: CliArgs; readonly consumed: number }, CliError>

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => ParsedFlag

const switchFlag = (name: string, update: (args: CliArgs) => CliArgs): FlagParser => (current, inlineValue) =>
  inlineValue === undefined
    ? Either.right({ next: update(current), consumed: 1 })
    : Either.left(cliError(`Flag --${name} does not take a value`))

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

const flagParsers: Record<string, FlagParser> = {
  verbose: switchFlag("verbose", (args) => ({ ...args, verbose: true })),
  quiet: switchFlag("quiet", (args) => ({ ...args, quiet: true })),
  pretty: switchFlag("pretty", (args) => ({ ...args, pretty: true })),
  help: switchFlag("help", (args) => ({ ...args, help: true })),
  config: (current, inlineValue, nextValue) =>
    Either.map(readFlagValue("config", inlineValue, nextValue), (value) => ({
      next: { ...current, configPath: value, configExplicit: true },
      consumed: inlineValue === undefined ? 2 : 1
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): ParsedFlag => {
  const [name = "", inlineValue] = raw.slice(2).split(/=(.*)/s, 2)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

// "-qp" becomes ["--quiet", "--pretty"]; "-cpath" becomes ["--config=path"].
const expandShortCluster = (raw: string): Either.Either<ReadonlyArray<string>, CliError> => {
  const letters = raw.slice(1)
  const expanded: Array<string> = []
  for (let index = 0; index < letters.length; index++) {
    const letter = letters.charAt(index)
    const name = shortFlags[letter]
    if (name === undefined) {
      return Either.left(cliError(`Unknown flag: -${letter}`))
    }
    if (valueFlags.has(name) && index < letters.length - 1) {
      expanded.push(`--${name}=${letters.slice(index + 1)}`)
      return Either.right(expanded)
    }
    expanded.push(`--${name}`)
  }
  return Either.right(expanded)
}

const normalizeArgs = (
  rawArgs: ReadonlyArray<string>
): Either.Either<ReadonlyArray<string>, CliError> => {
  const result: Array<string> = []
  for (let index = 0; index < rawArgs.length; index++) {
    const current = rawArgs[index] ?? ""
    if (current === "--") {
      result.push(...rawArgs.slice(index))
      return Either.right(result)
    }
    if (isFlag(current) && !current.startsWith("--")) {
      const expanded = expandShortCluster(current)
      if (Either.isLeft(expanded)) {
        return Either.left(expanded.left)
      }
      result.push(...expanded.right)
    } else {
      result.push(current)
    }
  }
  return Either.right(result)
}

const parseTokens = (
  rawArgs: ReadonlyArray<string>,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
  let args = initial
  let index = 0
  let optionsEnded = false
  let sawPositional = false
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!optionsEnded && current === "--") {
      optionsEnded = true
      index += 1
      continue
    }
    if (optionsEnded || !isFlag(current)) {
      if (sawPositional) {
        return Either.left(cliError(`Unexpected positional argument: ${current}`))
      }
      args = { ...args, file: current === "-" ? undefined : current }
      sawPositional = true
      index += 1
      continue
    }
    const parsed = parseFlag(current, rawArgs[index + 1], args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant file is undefined when input comes from stdin
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const normalized = normalizeArgs(argv.slice(2))
  if (Either.isLeft(normalized)) {
    return Either.left(normalized.left)
  }
  const parsed = parseTokens(normalized.right, defaultArgs)
  if (Either.isLeft(parsed)) {
    return Either.left(parsed.left)
  }
  if (parsed.right.quiet && parsed.right.verbose) {
    return Either.left(cliError("Cannot use both --quiet and --verbose options together"))
  }
  return Either.right(parsed.right)
}
