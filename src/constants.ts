/**
 * @file constants.ts
 * @description Shared constants for the policy builder and the script tag renderer
 */

import type {DirectiveValue, ScriptAttrName, ScriptAttrRule} from './types.js'

/**
 * List of known CSP directives
 * @see https://developer.mozilla.org/en-US/docs/Web/HTTP/Headers/Content-Security-Policy
 */
export const KNOWN_DIRECTIVES = [
  // Fetch directives
  'child-src',
  'connect-src',
  'default-src',
  'script-src',
  'script-src-attr',
  'script-src-elem',
  'object-src',
  'style-src',
  'style-src-attr',
  'style-src-elem',
  'font-src',
  'frame-src',
  'img-src',
  'manifest-src',
  'media-src',
  'prefetch-src', // deprecated
  // Document directives
  'base-uri',
  'plugin-types', // deprecated
  'sandbox',
  // Navigation directives
  'form-action',
  'frame-ancestors',
  'navigate-to',
  // Reporting directives
  'report-uri',
  'report-to',
  'require-sri-for',
  // Trusted Types directives
  'require-trusted-types-for',
  'trusted-types',
  // Other directives
  'webrtc',
  'worker-src',
  'upgrade-insecure-requests',
  'block-all-mixed-content', // deprecated
] as const

/**
 * Default value of every known directive. Only `default-src` is set;
 * the flag directives default to off.
 */
export const DEFAULT_DIRECTIVES: Readonly<
  Record<(typeof KNOWN_DIRECTIVES)[number], DirectiveValue | null>
> = Object.freeze({
  'child-src': null,
  'connect-src': null,
  'default-src': Object.freeze(["'self'"]),
  'script-src': null,
  'script-src-attr': null,
  'script-src-elem': null,
  'object-src': null,
  'style-src': null,
  'style-src-attr': null,
  'style-src-elem': null,
  'font-src': null,
  'frame-src': null,
  'img-src': null,
  'manifest-src': null,
  'media-src': null,
  'prefetch-src': null,
  'base-uri': null,
  'plugin-types': null,
  sandbox: null,
  'form-action': null,
  'frame-ancestors': null,
  'navigate-to': null,
  'report-uri': null,
  'report-to': null,
  'require-sri-for': null,
  'require-trusted-types-for': null,
  'trusted-types': null,
  webrtc: null,
  'worker-src': null,
  'upgrade-insecure-requests': false,
  'block-all-mixed-content': false,
})

export const DEFAULT_NONCE_DIRECTIVES = Object.freeze(['default-src'])

/**
 * Serialized last, whatever its position in the directive map.
 */
export const REPORT_URI = 'report-uri'

export const CSP_HEADER = 'Content-Security-Policy'
export const CSP_REPORT_ONLY_HEADER = 'Content-Security-Policy-Report-Only'

/**
 * Script tag attributes in render order, each with its formatting rule.
 */
export const SCRIPT_ATTRS: ReadonlyArray<
  readonly [ScriptAttrName, ScriptAttrRule]
> = [
  ['nonce', 'string'],
  ['id', 'string'],
  ['src', 'string'],
  ['type', 'string'],
  ['async', 'async'],
  ['defer', 'boolean'],
  ['integrity', 'string'],
  ['nomodule', 'boolean'],
]
