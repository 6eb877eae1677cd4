/**
 * @file policy-builder.ts
 * @description
 *   PolicyBuilder: assembles a Content-Security-Policy header value from a
 *   long-lived base configuration and per-request overrides:
 *     - `replace` values supersede the base directive outright
 *     - `update` values append tokens after the replaced value
 *     - flag directives (`true` / `false`) render bare or are omitted
 *     - `report-uri` is always serialized last
 *     - an optional nonce is appended to the configured directives
 *
 * @example
 * import {PolicyBuilder} from './policy-builder.js'
 *
 * const builder = new PolicyBuilder({
 *   directives: {'default-src': ["'self'"], 'script-src': ["'self'"]},
 *   includeNonceIn: ['script-src'],
 *   reportOnly: false,
 *   reportPercentage: 0,
 * })
 * builder.build({update: {'script-src': 'cdn.example.com'}, nonce: 'abc123'})
 * // => "default-src 'self'; script-src 'self' cdn.example.com 'nonce-abc123'"
 */

import {DEFAULT_NONCE_DIRECTIVES, REPORT_URI} from './constants.js'
import type {
  DirectiveMap,
  DirectiveToken,
  DirectiveValue,
  Logger,
  PolicyBuilderOptions,
  PolicyConfig,
  PolicyOverrides,
} from './types.js'

export function isTokenList(
  value: DirectiveValue,
): value is readonly DirectiveToken[] {
  return Array.isArray(value)
}

/**
 * Copies a directive value into a fresh token list, wrapping scalars.
 */
export function toTokens(value: DirectiveValue): DirectiveToken[] {
  return isTokenList(value) ? [...value] : [value]
}

export class PolicyBuilder {
  readonly config: PolicyConfig
  private readonly logger: Logger

  /**
   * @param config - Base configuration, shared across requests and never mutated
   * @param opts - Builder options
   */
  constructor(config: PolicyConfig, opts: PolicyBuilderOptions = {}) {
    const {logger = console} = opts
    this.config = config
    this.logger = logger
  }

  /**
   * Merges base, replace and update layers into fresh token lists,
   * in base order followed by names first seen in replace, then update.
   */
  private merge(
    update: DirectiveMap,
    replace: DirectiveMap,
  ): Map<string, DirectiveToken[]> {
    const merged = new Map<string, DirectiveToken[]>()
    const names = new Set([
      ...Object.keys(this.config.directives),
      ...Object.keys(replace),
    ])

    for (const name of names) {
      // A replace entry wins even when it is null: the directive is dropped
      const value = Object.hasOwn(replace, name)
        ? replace[name]
        : this.config.directives[name]
      if (value == null) continue
      merged.set(name, toTokens(value))
    }

    for (const [name, value] of Object.entries(update)) {
      if (value == null) continue
      const existing = merged.get(name)
      merged.set(
        name,
        existing ? [...existing, ...toTokens(value)] : toTokens(value),
      )
    }

    return merged
  }

  /**
   * Builds the policy string for one request.
   * @returns The header value, e.g. "default-src 'self'; script-src 'self' 'nonce-abc'"
   */
  public build({
    update = {},
    replace = {},
    nonce,
  }: PolicyOverrides = {}): string {
    const directives = this.merge(update, replace)

    const reportUri = directives.get(REPORT_URI)
    directives.delete(REPORT_URI)

    // Directive name -> serialized value (empty for flag directives)
    const parts = new Map<string, string>()
    for (const [name, tokens] of directives) {
      if (tokens[0] === true) {
        parts.set(name, '')
      } else if (tokens[0] === false) {
        continue
      } else {
        parts.set(name, tokens.join(' '))
      }
    }

    if (reportUri && reportUri.length) {
      parts.set(REPORT_URI, reportUri.map((uri) => String(uri)).join(' '))
    }

    if (nonce) {
      const targets = this.config.includeNonceIn ?? DEFAULT_NONCE_DIRECTIVES
      for (const name of targets) {
        const value = parts.get(name)
        if (value === undefined) {
          this.logger.debug(`Adding ${name} to carry the request nonce`)
        }
        parts.set(name, `${value ?? ''} 'nonce-${nonce}'`.trim())
      }
    }

    const fragments: string[] = []
    for (const [name, value] of parts) {
      if (name === REPORT_URI) continue
      fragments.push(`${name} ${value}`.trim())
    }
    const report = parts.get(REPORT_URI)
    if (report !== undefined) {
      fragments.push(`${REPORT_URI} ${report}`.trim())
    }

    return fragments.join('; ').trim()
  }
}

/**
 * Builds a policy string without keeping a builder around.
 */
export function buildPolicy(
  config: PolicyConfig,
  update?: DirectiveMap,
  replace?: DirectiveMap,
  nonce?: string,
): string {
  return new PolicyBuilder(config).build({update, replace, nonce})
}
