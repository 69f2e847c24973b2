import type { CliArgs } from "./cli.js"

// CHANGE: define config merging rules and defaults
// WHY: CLI flags override the config file, which overrides defaults
// QUOTE(RFC 8259): "An implementation may set limits on the size of texts that it accepts."
// REF: RFC 8259 §9
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: indent ∈ [0, 10]
// COMPLEXITY: O(1)

export interface FileConfig {
  readonly pretty?: boolean
  readonly indent?: number
  readonly maxInputBytes?: number
}

export interface ResolvedConfig {
  readonly pretty: boolean
  readonly indent: number
  readonly maxInputBytes: number | undefined
}

export const defaultIndent = 2

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from the config file.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  pretty: cli.pretty || (fileConfig?.pretty ?? false),
  indent: fileConfig?.indent ?? defaultIndent,
  maxInputBytes: fileConfig?.maxInputBytes
})
