/**
 * @file types.ts
 * @description Shared types for the policy builder, the script tag renderer and the CLI
 */

import type {KNOWN_DIRECTIVES} from './constants.js'

/**
 * Directive names the library knows about. Any other string is accepted
 * and passed through unchanged.
 */
export type KnownDirective = (typeof KNOWN_DIRECTIVES)[number]

export type DirectiveName = KnownDirective | (string & {})

/**
 * A single source expression or keyword, e.g. `'self'` or a URL.
 * A leading boolean marks a flag directive.
 */
export type DirectiveToken = string | number | boolean | URL

/**
 * A scalar is treated as a one-token list.
 */
export type DirectiveValue = DirectiveToken | readonly DirectiveToken[]

/**
 * Directive name to value, in serialization order. `null` or `undefined`
 * means "not set".
 */
export type DirectiveMap = Readonly<
  Record<string, DirectiveValue | null | undefined>
>

/**
 * Shared logger interface used by the builder and the CLI.
 */
export interface Logger
  extends Pick<Console, 'error' | 'warn' | 'info' | 'debug'> {}

/**
 * Resolved, process-wide policy configuration. Never mutated by the builder.
 */
export interface PolicyConfig {
  readonly directives: DirectiveMap
  /**
   * Directives that receive the per-request nonce (default: ['default-src']).
   */
  readonly includeNonceIn?: readonly DirectiveName[]
  /**
   * Send the policy as Content-Security-Policy-Report-Only.
   */
  readonly reportOnly: boolean
  /**
   * Percentage (0..100) of requests for which reporting is enabled.
   */
  readonly reportPercentage: number
}

/**
 * User settings as read from a settings file. Missing fields fall back to defaults.
 */
export type PolicySettings = Partial<PolicyConfig>

/**
 * Per-request inputs to the builder.
 */
export interface PolicyOverrides {
  /**
   * Tokens appended to the directive after `replace` is applied.
   */
  update?: DirectiveMap
  /**
   * Values that supersede the base directive outright.
   */
  replace?: DirectiveMap
  nonce?: string
}

export interface PolicyBuilderOptions {
  /**
   * A logger implementing error, warn, info, debug (default: console).
   */
  logger?: Logger
}

export type ScriptAttrName =
  | 'nonce'
  | 'id'
  | 'src'
  | 'type'
  | 'async'
  | 'defer'
  | 'integrity'
  | 'nomodule'

/**
 * `string` renders name="value", `boolean` renders the bare name,
 * `async` additionally supports the explicit `async=false` form.
 */
export type ScriptAttrRule = 'string' | 'boolean' | 'async'

export type ScriptAttrs = Partial<
  Record<ScriptAttrName, string | boolean | null | undefined>
>

export type OutputFormat = 'header' | 'raw' | 'json'

/**
 * Options resolved by the CLI from flags and environment variables.
 */
export interface CliOptions {
  command: string
  configPath?: string
  update: DirectiveMap
  replace: DirectiveMap
  nonce?: string
  generateNonce: boolean
  reportOnly?: boolean
  outputFormat: OutputFormat
  verbose: boolean
  script: {
    content?: string
    attrs: ScriptAttrs
  }
}
